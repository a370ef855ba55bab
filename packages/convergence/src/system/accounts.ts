import { UnknownAccountError } from "../errors.js";
import { isNotFound } from "../fs-utils.js";
import type { FileSystem } from "../types.js";

export interface AccountEntry {
  name: string;
  id: number;
}

/**
 * Name/id lookups for users and groups. Reads the database on every call,
 * since a run may create groups along the way.
 */
export interface AccountDatabase {
  userId(name: string): Promise<number>;
  groupId(name: string): Promise<number>;
  /** Falls back to the numeric id when no entry matches. */
  userName(uid: number): Promise<string>;
  groupName(gid: number): Promise<string>;
  hasGroup(name: string): Promise<boolean>;
}

export interface AccountDatabaseOptions {
  passwdPath?: string;
  groupPath?: string;
}

/**
 * Parse colon-separated account files (/etc/passwd, /etc/group), where the
 * name is the first field and the id the third.
 */
export function parseAccountFile(content: string): AccountEntry[] {
  const entries: AccountEntry[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      continue;
    }
    const fields = trimmed.split(":");
    const name = fields[0];
    const id = Number.parseInt(fields[2] ?? "", 10);
    if (name && Number.isInteger(id)) {
      entries.push({ name, id });
    }
  }
  return entries;
}

export function createAccountDatabase(
  fs: FileSystem,
  options: AccountDatabaseOptions = {}
): AccountDatabase {
  const passwdPath = options.passwdPath ?? "/etc/passwd";
  const groupPath = options.groupPath ?? "/etc/group";

  const load = async (filePath: string): Promise<AccountEntry[]> => {
    try {
      return parseAccountFile(await fs.readFile(filePath, "utf8"));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  };

  const idOf = async (
    kind: "user" | "group",
    filePath: string,
    name: string
  ): Promise<number> => {
    const entry = (await load(filePath)).find((candidate) => candidate.name === name);
    if (!entry) {
      throw new UnknownAccountError(kind, name);
    }
    return entry.id;
  };

  const nameOf = async (filePath: string, id: number): Promise<string> => {
    const entry = (await load(filePath)).find((candidate) => candidate.id === id);
    return entry?.name ?? String(id);
  };

  return {
    userId: (name) => idOf("user", passwdPath, name),
    groupId: (name) => idOf("group", groupPath, name),
    userName: (uid) => nameOf(passwdPath, uid),
    groupName: (gid) => nameOf(groupPath, gid),
    async hasGroup(name) {
      return (await load(groupPath)).some((entry) => entry.name === name);
    }
  };
}
