import path from "node:path";
import { text } from "@hostform/design-system";
import { Assertion } from "../assertion.js";
import { DiffLine } from "../change.js";
import { FileTreeError } from "../errors.js";
import { lstatIfExists } from "../fs-utils.js";
import { Subject } from "../subject.js";
import type { ApplyRuntime, FileSystem } from "../types.js";
import { Directory, File, type FsEntryOptions } from "./entry.js";

export const TEMPLATE_SUFFIX = ".mustache";

/** Renders a template file given its path relative to the role directory. */
export type TemplateRenderer = (relativePath: string) => Promise<string>;

export interface FileTreeOptions {
  /** Absolute directory the source path and template paths are relative to. */
  roleDir: string;
  render: TemplateRenderer;
  /** When false, `.mustache` files are copied verbatim. Defaults to true. */
  resolveTemplates?: boolean;
  entry?: FsEntryOptions;
}

export interface ReplicateOptions {
  /** Remove destination entries that are not part of the source tree. */
  exclusive?: boolean;
}

interface SourceFile {
  /** Relative to the role directory. */
  relative: string;
  absolute: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeText(bytes: Uint8Array): string | Uint8Array {
  try {
    return utf8.decode(bytes);
  } catch {
    return bytes;
  }
}

/**
 * A directory shipped with a role, replicated into one or more
 * destinations. The file and directory subjects are generated when the
 * tree is applied.
 */
export class FileTree extends Subject {
  readonly resolvedSource: string;

  constructor(
    readonly source: string,
    readonly options: FileTreeOptions
  ) {
    super();
    this.resolvedSource = path.resolve(options.roleDir, source);
  }

  replicatesSelfTo(...args: [...string[], ReplicateOptions] | string[]): this {
    return this.replicate(args, false);
  }

  replicatesChildrenTo(...args: [...string[], ReplicateOptions] | string[]): this {
    return this.replicate(args, true);
  }

  /** Applies to the files of the most recently added destination. */
  hasFileMode(mode: number): this {
    const assertion = this.getLastAssertion(IsReplicatedTo);
    if (assertion) {
      assertion.fileMode = mode;
    }
    return this;
  }

  hasDirectoryMode(mode: number): this {
    const assertion = this.getLastAssertion(IsReplicatedTo);
    if (assertion) {
      assertion.directoryMode = mode;
    }
    return this;
  }

  describe(): string {
    return `file tree ${text.code(this.source)}`;
  }

  private replicate(
    args: [...string[], ReplicateOptions] | string[],
    childrenOnly: boolean
  ): this {
    const destinations: string[] = [];
    let exclusive = false;
    for (const arg of args) {
      if (typeof arg === "string") {
        destinations.push(arg);
      } else {
        exclusive = arg.exclusive ?? false;
      }
    }
    for (const destination of destinations) {
      if (!path.isAbsolute(destination)) {
        throw new FileTreeError(`Destination path '${destination}' is not absolute`);
      }
      this.appendAssertion(new IsReplicatedTo(this, destination, exclusive, childrenOnly));
    }
    return this;
  }
}

export class IsReplicatedTo extends Assertion {
  fileMode: number | undefined;
  directoryMode: number | undefined;
  private subjects: Subject[] = [];

  constructor(
    private readonly tree: FileTree,
    readonly destination: string,
    readonly exclusive: boolean,
    readonly childrenOnly: boolean
  ) {
    super(
      childrenOnly
        ? `replicates children to ${text.code(destination)}`
        : `replicates self to ${text.code(destination)}`
    );
  }

  generatedSubjects(): readonly Subject[] {
    return this.subjects;
  }

  override changed(): boolean {
    return super.changed() || this.subjects.some((subject) => subject.changed());
  }

  override async prepare({ fs }: ApplyRuntime): Promise<void> {
    const source = this.tree.resolvedSource;
    const stats = await lstatIfExists(fs, source);
    if (stats === null || !stats.isDirectory()) {
      throw new FileTreeError(`Source path '${source}' does not exist`);
    }

    const subjects: Subject[] = [];
    const expectedDirectories = new Set<string>();
    const expectedFiles = new Set<string>();
    if (!this.childrenOnly) {
      expectedDirectories.add(this.destination);
    }

    const base = this.childrenOnly ? source : path.dirname(source);
    for await (const [sourceDir, files] of walk(fs, source, this.tree.options.roleDir)) {
      const destinationDir = path.join(this.destination, path.relative(base, sourceDir));
      expectedDirectories.add(destinationDir);
      subjects.push(this.directory(destinationDir));

      for (const file of files) {
        const subject = await this.file(fs, file, destinationDir);
        expectedFiles.add(subject.path);
        subjects.push(subject);
      }
    }

    if (this.exclusive) {
      subjects.push(
        ...(await strayEntries(fs, this.destination, expectedDirectories, expectedFiles, this.tree.options.entry))
      );
    }
    this.subjects = subjects;
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const { log } = runtime;
    await log.within(async () => {
      log.detail(DiffLine.detail(this.name));
      for (const subject of this.subjects) {
        await subject.apply(runtime);
      }
    });
  }

  private directory(destinationDir: string): Directory {
    const directory = new Directory(destinationDir, this.tree.options.entry).isPresent();
    if (this.directoryMode !== undefined) {
      directory.hasMode(this.directoryMode);
    }
    return directory;
  }

  private async file(
    fs: FileSystem,
    source: SourceFile,
    destinationDir: string
  ): Promise<File> {
    const { render, resolveTemplates = true, entry } = this.tree.options;
    const name = path.basename(source.absolute);
    const isTemplate = resolveTemplates && name.endsWith(TEMPLATE_SUFFIX);

    const file = isTemplate
      ? new File(path.join(destinationDir, name.slice(0, -TEMPLATE_SUFFIX.length)), entry).hasContent(
          await render(source.relative)
        )
      : new File(path.join(destinationDir, name), entry).hasContent(
          decodeText(await fs.readFile(source.absolute))
        );

    if (this.fileMode !== undefined) {
      file.hasMode(this.fileMode);
    }
    return file;
  }
}

async function* walk(
  fs: FileSystem,
  directory: string,
  roleDir: string
): AsyncGenerator<[string, SourceFile[]]> {
  const files: SourceFile[] = [];
  const subdirectories: string[] = [];
  for (const name of [...(await fs.readdir(directory))].sort()) {
    const absolute = path.join(directory, name);
    const stats = await fs.lstat(absolute);
    if (stats.isDirectory()) {
      subdirectories.push(absolute);
    } else {
      files.push({ absolute, relative: path.relative(roleDir, absolute) });
    }
  }
  yield [directory, files];
  for (const subdirectory of subdirectories) {
    yield* walk(fs, subdirectory, roleDir);
  }
}

async function strayEntries(
  fs: FileSystem,
  directory: string,
  expectedDirectories: ReadonlySet<string>,
  expectedFiles: ReadonlySet<string>,
  entry: FsEntryOptions | undefined
): Promise<Subject[]> {
  const stats = await lstatIfExists(fs, directory);
  if (stats === null || !stats.isDirectory()) {
    return [];
  }

  const subjects: Subject[] = [];
  for (const name of [...(await fs.readdir(directory))].sort()) {
    const absolute = path.join(directory, name);
    const child = await fs.lstat(absolute);
    if (child.isDirectory()) {
      if (expectedDirectories.has(absolute)) {
        subjects.push(...(await strayEntries(fs, absolute, expectedDirectories, expectedFiles, entry)));
      } else {
        subjects.push(new Directory(absolute, entry).isAbsent());
      }
    } else if (!expectedFiles.has(absolute)) {
      subjects.push(new File(absolute, entry).isAbsent());
    }
  }
  return subjects;
}
