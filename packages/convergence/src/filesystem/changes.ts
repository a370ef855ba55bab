import { Change, DiffLine } from "../change.js";
import { formatMode } from "../fs-utils.js";
import type { ApplyRuntime, FileSystem } from "../types.js";
import { byteDelta, contentDiff } from "./content-diff.js";

async function chownEntry(
  fs: FileSystem,
  target: string,
  ids: { uid?: number; gid?: number }
): Promise<void> {
  const stats = await fs.lstat(target);
  const uid = ids.uid ?? stats.uid;
  const gid = ids.gid ?? stats.gid;
  if (stats.isSymbolicLink()) {
    await fs.lchown(target, uid, gid);
  } else {
    await fs.chown(target, uid, gid);
  }
}

export class FileCreated extends Change {
  constructor(readonly path: string) {
    super("file created");
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.writeFile(this.path, "");
  }
}

export class DirectoryCreated extends Change {
  constructor(readonly path: string) {
    super("directory created");
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.mkdir(this.path);
  }
}

export class SymlinkCreated extends Change {
  constructor(
    readonly path: string,
    readonly target: string
  ) {
    super("symlink created", [DiffLine.add(target)]);
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.symlink(this.target, this.path);
  }
}

export class FileRemoved extends Change {
  constructor(readonly path: string) {
    super("file removed");
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.unlink(this.path);
  }
}

export class DirectoryRemoved extends Change {
  constructor(readonly path: string) {
    super("directory removed");
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.rm(this.path, { recursive: true });
  }
}

export class SymlinkRemoved extends Change {
  constructor(readonly path: string) {
    super("symlink removed");
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.unlink(this.path);
  }
}

export class SymlinkChanged extends Change {
  constructor(
    readonly path: string,
    oldTarget: string,
    readonly target: string
  ) {
    super("symlink changed", [DiffLine.remove(oldTarget), DiffLine.add(target)]);
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.unlink(this.path);
    await fs.symlink(this.target, this.path);
  }
}

export class UserChanged extends Change {
  constructor(
    readonly path: string,
    oldUser: string,
    readonly user: string
  ) {
    super("user changed", [DiffLine.remove(oldUser), DiffLine.add(user)]);
  }

  async execute({ fs, accounts }: ApplyRuntime): Promise<void> {
    await chownEntry(fs, this.path, { uid: await accounts.userId(this.user) });
  }
}

export class GroupChanged extends Change {
  constructor(
    readonly path: string,
    oldGroup: string,
    readonly group: string
  ) {
    super("group changed", [DiffLine.remove(oldGroup), DiffLine.add(group)]);
  }

  async execute({ fs, accounts }: ApplyRuntime): Promise<void> {
    await chownEntry(fs, this.path, { gid: await accounts.groupId(this.group) });
  }
}

export class ModeChanged extends Change {
  constructor(
    readonly path: string,
    oldMode: number,
    readonly mode: number
  ) {
    super("mode changed", [
      DiffLine.remove(formatMode(oldMode)),
      DiffLine.add(formatMode(mode))
    ]);
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.chmod(this.path, this.mode);
  }
}

export class ContentChanged extends Change {
  constructor(
    readonly path: string,
    from: string,
    readonly content: string
  ) {
    super("content changed", contentDiff(from, content));
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.writeFile(this.path, this.content);
  }
}

export class ContentChangedSummary extends Change {
  constructor(
    readonly path: string,
    readonly content: Uint8Array,
    delta: number
  ) {
    super("content changed", [DiffLine.detail(byteDelta(delta))]);
  }

  async execute({ fs }: ApplyRuntime): Promise<void> {
    await fs.writeFile(this.path, this.content);
  }
}
