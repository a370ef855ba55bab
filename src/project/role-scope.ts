import path from "node:path";
import {
  Directory,
  File,
  FileTree,
  Group,
  Symlink,
  SystemdService,
  type FsEntryOptions,
  type Handler,
  type ReplicateOptions,
  type RoleContext,
  type Subject,
  type SystemdScope
} from "@hostform/convergence";
import {
  TargetNotSupportedError,
  UnknownTargetError,
  type TargetRegistry
} from "@hostform/targets";
import type { VariableTree } from "@hostform/variables";
import type { HostInfo, RunContext } from "./run-context.js";
import { createRoleTemplates, type RoleTemplates, type TemplateView } from "./template.js";

export const ROLES_DIRECTORY = "roles";

export interface RoleScopeOptions {
  role: string;
  context: RoleContext;
  run: RunContext;
  targets: TargetRegistry;
  /** Values added to every template view. */
  templateGlobals?: Record<string, unknown>;
}

export interface FileTreeScopeOptions {
  /** Copy `.mustache` files verbatim instead of rendering them. */
  resolveTemplates?: boolean;
}

export interface SystemdServiceScopeOptions {
  scope?: SystemdScope;
}

function joinSubpath(base: string, subpath: string[]): string {
  return subpath.length > 0 ? path.join(base, ...subpath) : base;
}

/**
 * What a role's `configure()` works with: the run's variables and host,
 * subject factories, role-relative sources and the role context.
 */
export class RoleScope {
  readonly name: string;
  readonly roleDir: string;
  private readonly templates: RoleTemplates;
  private readonly entryOptions: FsEntryOptions;

  constructor(private readonly options: RoleScopeOptions) {
    const { run } = options;
    this.name = options.role;
    this.roleDir = path.join(run.root, ROLES_DIRECTORY, options.role);
    this.entryOptions =
      run.host.platform === "linux"
        ? { defaultOwner: { user: run.host.user.username, group: run.host.user.groupname } }
        : {};
    this.templates = createRoleTemplates({
      fs: options.context.runtime.fs,
      roleDir: this.roleDir,
      view: this.templateView()
    });
  }

  get vars(): VariableTree {
    return this.options.run.vars;
  }

  get host(): HostInfo {
    return this.options.run.host;
  }

  get env(): Readonly<Record<string, string>> {
    return this.options.run.env;
  }

  get target(): string {
    return this.options.run.target;
  }

  get root(): string {
    return this.options.run.root;
  }

  get shouldModify(): boolean {
    return this.options.context.runtime.shouldModify;
  }

  /** True when the applied target is `name` or requires it. */
  isTargeted(name: string): boolean {
    const { targets } = this.options;
    if (!targets.has(name)) {
      throw new UnknownTargetError(name);
    }
    return targets.get(this.target).includes(name);
  }

  /** Fail this role for the current target. */
  notSupported(): never {
    throw new TargetNotSupportedError(this.name, this.target);
  }

  do(...subjects: Subject[]): Promise<void> {
    return this.options.context.do(subjects);
  }

  ensure(...subjects: Subject[]): Promise<void> {
    return this.options.context.ensure(subjects);
  }

  handler(...subjects: Subject[]): Handler {
    return this.options.context.handler(...subjects);
  }

  file(filePath: string): File {
    return new File(filePath, this.entryOptions);
  }

  directory(directoryPath: string): Directory {
    return new Directory(directoryPath, this.entryOptions);
  }

  symlink(linkPath: string): Symlink {
    return new Symlink(linkPath, this.entryOptions);
  }

  fileTree(source: string, options: FileTreeScopeOptions = {}): FileTree {
    return new FileTree(source, {
      roleDir: this.roleDir,
      render: (relativePath) => this.templates.renderFile(relativePath),
      resolveTemplates: options.resolveTemplates,
      entry: this.entryOptions
    });
  }

  group(name: string): Group {
    return new Group(name);
  }

  systemdService(name: string, options: SystemdServiceScopeOptions = {}): SystemdService {
    return new SystemdService(name, {
      scope: options.scope,
      handlers: this.options.context,
      userConfigHome: this.xdgConfigHome(),
      entry: this.entryOptions
    });
  }

  /** Path of a file shipped with the role. */
  source(...segments: string[]): string {
    return path.join(this.roleDir, ...segments);
  }

  readSource(...segments: string[]): Promise<string> {
    return this.options.context.runtime.fs.readFile(this.source(...segments), "utf8");
  }

  /** Render a role template; `extraVars` are merged over `vars`. */
  template(relativePath: string, extraVars?: Record<string, unknown>): Promise<string> {
    return this.templates.renderFile(relativePath, extraVars);
  }

  home(...subpath: string[]): string {
    return joinSubpath(this.host.user.homeDir, subpath);
  }

  xdgConfigHome(...subpath: string[]): string {
    return joinSubpath(this.env.XDG_CONFIG_HOME ?? this.home(".config"), subpath);
  }

  xdgDataHome(...subpath: string[]): string {
    return joinSubpath(this.env.XDG_DATA_HOME ?? this.home(".local", "share"), subpath);
  }

  private templateView(): TemplateView {
    const { run, targets, templateGlobals } = this.options;
    const current = targets.get(run.target);
    const targeted: Record<string, boolean> = {};
    for (const target of targets.all()) {
      targeted[target.name] = current.includes(target.name);
    }
    return {
      ...templateGlobals,
      root: run.root,
      target: run.target,
      elevation: run.elevation,
      host: run.host,
      env: run.env,
      vars: run.vars,
      role: this.name,
      targeted
    };
  }
}
