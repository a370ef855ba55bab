import path from "node:path";
import { text } from "@hostform/design-system";
import { Assertion } from "../assertion.js";
import { MissingEntryError, UnsupportedEntryError } from "../errors.js";
import {
  entryKind,
  formatMode,
  kindOf,
  lstatIfExists,
  readFileIfExists,
  statIfExists,
  type EntryKind
} from "../fs-utils.js";
import type { ApplyRuntime, EntryStats } from "../types.js";
import {
  ContentChanged,
  ContentChangedSummary,
  DirectoryCreated,
  DirectoryRemoved,
  FileCreated,
  FileRemoved,
  GroupChanged,
  ModeChanged,
  SymlinkChanged,
  SymlinkCreated,
  SymlinkRemoved,
  UserChanged
} from "./changes.js";
import { Directory, type FsEntry } from "./entry.js";

type PresenceKind = "file" | "directory" | "symlink";

/** Directory permissions derived from a file mode: readable means listable. */
export function toDirectoryMode(fileMode: number): number {
  return fileMode | ((fileMode & 0o444) >> 2);
}

/**
 * Shared shape of IsFile / IsDirectory / IsSymlink: optional parent
 * synthesis during prepare, removal of an entry of another kind, creation.
 */
abstract class IsPresentAs extends Assertion {
  constructor(
    name: string,
    protected readonly entry: FsEntry,
    private readonly kind: PresenceKind,
    private readonly createParents: boolean
  ) {
    super(name);
  }

  override async prepare(runtime: ApplyRuntime): Promise<void> {
    if (!this.createParents) {
      return;
    }
    const parentPath = path.dirname(this.entry.path);
    if (parentPath === this.entry.path) {
      return;
    }
    if ((await entryKind(runtime.fs, parentPath)) !== "none") {
      return;
    }

    const parent = new Directory(parentPath, this.entry.options)
      .isPresent({ createParents: true })
      .annotate(`parent directory ${text.code(parentPath)}`);

    const mode = this.parentMode();
    if (mode !== undefined) {
      parent.hasMode(mode);
    }
    const owner = this.entry.getAssertion(HasOwner);
    if (owner) {
      parent.hasOwner(owner.user, owner.group);
    }

    this.entry.synthesizePrerequisite(parent);
  }

  protected parentMode(): number | undefined {
    return this.entry.getAssertion(HasMode)?.mode;
  }

  override async apply(runtime: ApplyRuntime): Promise<void> {
    const current = await this.currentKind(runtime);

    if (current === "other") {
      throw new UnsupportedEntryError(this.entry.path);
    }
    if (current === this.kind && (await this.matches(runtime))) {
      this.displayPassed(runtime.log);
      return;
    }

    if (current === this.kind) {
      await this.recordMismatch(runtime);
    } else {
      await this.recordRemoval(current, runtime);
      await this.recordCreation(runtime);
    }
    this.displayChanged(runtime.log);
  }

  /**
   * A symlink whose target is already a file (or directory) counts as one;
   * only IsSymlink looks at the link itself.
   */
  private async currentKind({ fs }: ApplyRuntime): Promise<EntryKind> {
    const current = kindOf(await lstatIfExists(fs, this.entry.path));
    if (current !== "symlink" || this.kind === "symlink") {
      return current;
    }
    const resolved = kindOf(await statIfExists(fs, this.entry.path));
    return resolved === this.kind ? resolved : current;
  }

  /** Whether an existing entry of the right kind already satisfies the assertion. */
  protected async matches(runtime: ApplyRuntime): Promise<boolean> {
    void runtime;
    return true;
  }

  protected async recordMismatch(runtime: ApplyRuntime): Promise<void> {
    void runtime;
  }

  protected abstract recordCreation(runtime: ApplyRuntime): Promise<void>;

  private async recordRemoval(current: EntryKind, runtime: ApplyRuntime): Promise<void> {
    const target = this.entry.path;
    if (current === "file") {
      await this.record(new FileRemoved(target), runtime);
    } else if (current === "directory") {
      await this.record(new DirectoryRemoved(target), runtime);
    } else if (current === "symlink") {
      await this.record(new SymlinkRemoved(target), runtime);
    }
  }
}

export class IsFile extends IsPresentAs {
  constructor(entry: FsEntry, createParents: boolean) {
    super("is file", entry, "file", createParents);
  }

  protected override parentMode(): number | undefined {
    const mode = super.parentMode();
    return mode === undefined ? undefined : toDirectoryMode(mode);
  }

  protected async recordCreation(runtime: ApplyRuntime): Promise<void> {
    await this.record(new FileCreated(this.entry.path), runtime);
  }
}

export class IsDirectory extends IsPresentAs {
  constructor(entry: FsEntry, createParents: boolean) {
    super("is directory", entry, "directory", createParents);
  }

  protected async recordCreation(runtime: ApplyRuntime): Promise<void> {
    await this.record(new DirectoryCreated(this.entry.path), runtime);
  }
}

export class IsSymlink extends IsPresentAs {
  constructor(
    entry: FsEntry,
    readonly target: string,
    createParents: boolean
  ) {
    super(`is symlink to ${text.code(target)}`, entry, "symlink", createParents);
  }

  protected override parentMode(): number | undefined {
    return undefined;
  }

  protected override async matches({ fs }: ApplyRuntime): Promise<boolean> {
    return (await fs.readlink(this.entry.path)) === this.target;
  }

  protected override async recordMismatch(runtime: ApplyRuntime): Promise<void> {
    const oldTarget = await runtime.fs.readlink(this.entry.path);
    await this.record(new SymlinkChanged(this.entry.path, oldTarget, this.target), runtime);
  }

  protected async recordCreation(runtime: ApplyRuntime): Promise<void> {
    await this.record(new SymlinkCreated(this.entry.path, this.target), runtime);
  }
}

export class IsAbsent extends Assertion {
  constructor(readonly path: string) {
    super("is absent");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const current = await entryKind(runtime.fs, this.path);
    if (current === "directory") {
      await this.record(new DirectoryRemoved(this.path), runtime);
    } else if (current === "file") {
      await this.record(new FileRemoved(this.path), runtime);
    } else if (current === "symlink") {
      await this.record(new SymlinkRemoved(this.path), runtime);
    } else if (current === "other") {
      throw new UnsupportedEntryError(this.path);
    }
    this.display(runtime.log);
  }
}

/**
 * Base for checks that read an existing entry. A missing entry is shown as
 * a failed check in pretend mode (an earlier assertion would have created
 * it) and is an error when modifying.
 */
abstract class EntryCheck extends Assertion {
  constructor(
    name: string,
    readonly path: string
  ) {
    super(name);
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const stats = await lstatIfExists(runtime.fs, this.path);
    if (stats === null) {
      if (runtime.shouldModify) {
        throw new MissingEntryError(this.path, this.name);
      }
      this.displayFailed(runtime.log);
      return;
    }
    await this.check(stats, runtime);
    this.display(runtime.log);
  }

  protected abstract check(stats: EntryStats, runtime: ApplyRuntime): Promise<void>;
}

export class HasOwner extends EntryCheck {
  constructor(
    target: string,
    readonly user: string | undefined,
    readonly group: string | undefined
  ) {
    const ownership = [
      user ? `user=${user}` : "",
      group ? `group=${group}` : ""
    ].filter((part) => part.length > 0);
    super(`has owner: ${ownership.join(" ")}`, target);
  }

  protected async check(stats: EntryStats, runtime: ApplyRuntime): Promise<void> {
    const { accounts } = runtime;
    if (this.user !== undefined) {
      const current = await accounts.userName(stats.uid);
      if (current !== this.user) {
        await this.record(new UserChanged(this.path, current, this.user), runtime);
      }
    }
    if (this.group !== undefined) {
      const current = await accounts.groupName(stats.gid);
      if (current !== this.group) {
        await this.record(new GroupChanged(this.path, current, this.group), runtime);
      }
    }
  }
}

export class HasMode extends EntryCheck {
  constructor(
    target: string,
    readonly mode: number
  ) {
    super(`has mode: ${formatMode(mode)}`, target);
  }

  protected async check(stats: EntryStats, runtime: ApplyRuntime): Promise<void> {
    const current = stats.mode & 0o777;
    if (current !== this.mode) {
      await this.record(new ModeChanged(this.path, current, this.mode), runtime);
    }
  }
}

export class HasContent extends Assertion {
  constructor(
    readonly path: string,
    readonly content: string
  ) {
    super("has content");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const existing = await readFileIfExists(runtime.fs, this.path);
    const current = existing === null ? "" : Buffer.from(existing).toString("utf8");
    if (existing === null || current !== this.content) {
      await this.record(new ContentChanged(this.path, current, this.content), runtime);
    }
    this.display(runtime.log);
  }
}

export class HasBinaryContent extends Assertion {
  constructor(
    readonly path: string,
    readonly content: Uint8Array
  ) {
    super("has content");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const existing = await readFileIfExists(runtime.fs, this.path);
    const current = existing ?? new Uint8Array();
    if (existing === null || !Buffer.from(current).equals(this.content)) {
      await this.record(
        new ContentChangedSummary(
          this.path,
          this.content,
          this.content.byteLength - current.byteLength
        ),
        runtime
      );
    }
    this.display(runtime.log);
  }
}
