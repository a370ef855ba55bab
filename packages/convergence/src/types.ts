import type { ApplyLog } from "./apply-log.js";
import type { AccountDatabase } from "./system/accounts.js";
import type { CommandRunner } from "./system/run-command.js";
import type { ElevationType } from "./system/elevation.js";

// ============================================================================
// FileSystem Interface
// ============================================================================

export interface EntryStats {
  mode: number;
  uid: number;
  gid: number;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface FileSystem {
  readFile(path: string): Promise<Uint8Array>;
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(path: string, content: string | Uint8Array): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<unknown>;
  readdir(path: string): Promise<string[]>;
  lstat(path: string): Promise<EntryStats>;
  stat(path: string): Promise<EntryStats>;
  readlink(path: string): Promise<string>;
  symlink(target: string, path: string): Promise<void>;
  unlink(path: string): Promise<void>;
  rm(path: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  chown(path: string, uid: number, gid: number): Promise<void>;
  lchown(path: string, uid: number, gid: number): Promise<void>;
}

// ============================================================================
// Apply Runtime
// ============================================================================

export interface HostUser {
  username: string;
  groupname: string;
  homeDir: string;
}

/**
 * Everything an assertion may touch while it is evaluated. Subjects never
 * reach for globals; a run builds one runtime and hands it down.
 */
export interface ApplyRuntime {
  fs: FileSystem;
  log: ApplyLog;
  /** When false, drift is recorded and reported but never acted upon. */
  shouldModify: boolean;
  accounts: AccountDatabase;
  commands: CommandRunner;
  platform: NodeJS.Platform;
  user: HostUser;
  elevation: ElevationType;
  env: Record<string, string | undefined>;
}
