// Types
export type { ApplyRuntime, EntryStats, FileSystem, HostUser } from "./types.js";

// Engine
export { ApplyLog } from "./apply-log.js";
export { Change, DiffLine } from "./change.js";
export type { DiffKind } from "./change.js";
export { Assertion } from "./assertion.js";
export { Subject } from "./subject.js";
export type { AssertionKind } from "./subject.js";
export { Handler } from "./handler.js";
export type { HandlerOptions, HandlerRegistry, HandlerState } from "./handler.js";
export { RoleContext } from "./role-context.js";

// Errors
export {
  CommandFailedError,
  ElevationNotAllowedError,
  EnsureFailedError,
  FileTreeError,
  MissingEntryError,
  UnknownAccountError,
  UnsupportedEntryError,
  UnsupportedPlatformError
} from "./errors.js";

// Filesystem
export {
  entryKind,
  formatMode,
  isNotFound,
  kindOf,
  lstatIfExists,
  readFileIfExists,
  statIfExists
} from "./fs-utils.js";
export type { EntryKind } from "./fs-utils.js";
export { File, Directory, Symlink, FsEntry } from "./filesystem/entry.js";
export type { CreateParentsOptions, FsEntryOptions, HasLinesOptions, Owner } from "./filesystem/entry.js";
export {
  HasBinaryContent,
  HasContent,
  HasMode,
  HasOwner,
  IsAbsent,
  IsDirectory,
  IsFile,
  IsSymlink,
  toDirectoryMode
} from "./filesystem/assertions.js";
export {
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
} from "./filesystem/changes.js";
export { contentDiff, unifiedDiffLines, MAX_DIFF_SIZE } from "./filesystem/content-diff.js";
export { FileTree, IsReplicatedTo, TEMPLATE_SUFFIX } from "./filesystem/file-tree.js";
export type { FileTreeOptions, ReplicateOptions, TemplateRenderer } from "./filesystem/file-tree.js";
export { createNodeFileSystem } from "./filesystem/node-fs.js";

// System
export { createAccountDatabase, parseAccountFile } from "./system/accounts.js";
export type { AccountDatabase, AccountDatabaseOptions, AccountEntry } from "./system/accounts.js";
export { runCommand, runChecked, runInteractive } from "./system/run-command.js";
export type {
  CommandRunner,
  CommandRunnerOptions,
  CommandRunnerResult,
  InteractiveRunner
} from "./system/run-command.js";
export { ELEVATION_TYPES, elevatedCommand, userCommand } from "./system/elevation.js";
export type { ElevationType } from "./system/elevation.js";
export { Group, GroupCreated, GroupIsPresent } from "./system/group.js";
export {
  DaemonReloaded,
  IsEnabled,
  IsReloaded,
  IsRestarted,
  IsStarted,
  ServiceEnabled,
  ServiceFile,
  ServiceRestarted,
  ServiceStarted,
  SystemdService,
  SystemdServiceError
} from "./system/systemd.js";
export type { SystemdScope, SystemdServiceOptions } from "./system/systemd.js";
