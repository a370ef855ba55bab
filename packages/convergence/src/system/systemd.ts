import path from "node:path";
import { text } from "@hostform/design-system";
import { Assertion } from "../assertion.js";
import { Change } from "../change.js";
import { File, type FsEntryOptions } from "../filesystem/entry.js";
import { Handler, type HandlerRegistry } from "../handler.js";
import { Subject } from "../subject.js";
import type { ApplyRuntime } from "../types.js";
import { elevatedCommand, userCommand } from "./elevation.js";
import { runChecked } from "./run-command.js";

export type SystemdScope = "system" | "user";

/** systemctl exit status for "no such unit". */
const UNIT_NOT_FOUND = 4;

export interface SystemdServiceOptions {
  scope?: SystemdScope;
  /** Where generated handlers for the unit file are registered. */
  handlers: HandlerRegistry;
  /** `$XDG_CONFIG_HOME`, used for user units. */
  userConfigHome: string;
  entry?: FsEntryOptions;
}

export class SystemdServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SystemdServiceError";
  }
}

export class SystemdService extends Subject {
  readonly scope: SystemdScope;
  private unitFile: ServiceFile | undefined;

  constructor(
    readonly name: string,
    readonly options: SystemdServiceOptions
  ) {
    super();
    this.scope = options.scope ?? "system";
  }

  /** Manage the unit file; it is applied before the service assertions. */
  file(configure: (file: ServiceFile) => void): this {
    const file = new ServiceFile(this);
    configure(file);
    this.unitFile = file;
    return this.addPrerequisite(file);
  }

  get serviceFile(): ServiceFile | undefined {
    return this.unitFile;
  }

  isStarted(): this {
    return this.addAssertion(new IsStarted(this));
  }

  isEnabled(): this {
    return this.addAssertion(new IsEnabled(this));
  }

  isRestarted(): this {
    return this.addAssertion(new IsRestarted(this));
  }

  isReloaded(): this {
    return this.addAssertion(new IsReloaded(this.scope));
  }

  describe(): string {
    return `service ${text.subject(this.name)}`;
  }

  async property(runtime: ApplyRuntime, property: string): Promise<string> {
    const [command = "systemctl", ...args] = queryCommand(runtime, this.scope, [
      "status",
      this.name
    ]);
    const status = await runtime.commands(command, args, { env: runtime.env });
    if (status.exitCode === UNIT_NOT_FOUND) {
      throw new SystemdServiceError(
        `Systemd unit '${this.name}' does not exist in ${this.scope} scope`
      );
    }
    const result = await runChecked(
      runtime.commands,
      queryCommand(runtime, this.scope, ["show", "--value", "--property", property, this.name]),
      { env: runtime.env }
    );
    return result.stdout.trimEnd();
  }
}

/**
 * The unit file of a service. By default a change to it reloads the
 * daemon through a generated handler; `restartsService` adds a restart.
 */
export class ServiceFile extends File {
  private handler: Handler | undefined;
  private reload = false;
  private restart = false;

  constructor(private readonly service: SystemdService) {
    super(unitPath(service), service.options.entry);
    this.annotate(`${service.scope} service file`);
    this.reloadsDaemon();
  }

  reloadsDaemon(): this {
    this.reload = true;
    return this.rebuildHandler();
  }

  doesNotReloadDaemon(): this {
    this.reload = false;
    return this.rebuildHandler();
  }

  restartsService(): this {
    this.restart = true;
    return this.rebuildHandler();
  }

  doesNotRestartService(): this {
    this.restart = false;
    return this.rebuildHandler();
  }

  private rebuildHandler(): this {
    this.handler?.remove();
    this.handler = undefined;
    if (!this.reload && !this.restart) {
      return this;
    }

    const { name, options } = this.service;
    const reaction = new SystemdService(name, options);
    if (this.reload) {
      reaction.isReloaded();
    }
    if (this.restart) {
      reaction.isRestarted();
    }

    const registry = options.handlers;
    this.handler = new Handler([reaction], { registry, generated: true });
    registry.addHandler(this.handler);
    this.handler.listen(this);
    return this;
  }
}

function unitPath(service: SystemdService): string {
  if (service.scope === "system") {
    return path.posix.join("/etc/systemd/system", service.name);
  }
  return path.join(service.options.userConfigHome, "systemd", "user", service.name);
}

function userSystemctl(runtime: ApplyRuntime, args: string[]): string[] {
  return userCommand(runtime.elevation, runtime.user.username, [
    "systemctl",
    "--user",
    ...args
  ]);
}

function queryCommand(runtime: ApplyRuntime, scope: SystemdScope, args: string[]): string[] {
  return scope === "system" ? ["systemctl", ...args] : userSystemctl(runtime, args);
}

/** A state-changing systemctl invocation; system units need elevation. */
function systemctl(runtime: ApplyRuntime, scope: SystemdScope, args: string[]): string[] {
  if (scope === "system") {
    return elevatedCommand(runtime.elevation, ["systemctl", ...args]);
  }
  return userSystemctl(runtime, args);
}

class SystemctlChange extends Change {
  constructor(
    name: string,
    private readonly scope: SystemdScope,
    private readonly args: string[]
  ) {
    super(name);
  }

  async execute(runtime: ApplyRuntime): Promise<void> {
    await runChecked(runtime.commands, systemctl(runtime, this.scope, this.args), {
      env: runtime.env
    });
  }
}

export class ServiceStarted extends SystemctlChange {
  constructor(service: SystemdService) {
    super("started", service.scope, ["start", service.name]);
  }
}

export class ServiceEnabled extends SystemctlChange {
  constructor(service: SystemdService) {
    super("enabled", service.scope, ["enable", service.name]);
  }
}

export class ServiceRestarted extends SystemctlChange {
  constructor(service: SystemdService) {
    super("restarted", service.scope, ["restart", service.name]);
  }
}

export class DaemonReloaded extends SystemctlChange {
  constructor(scope: SystemdScope) {
    super("reloaded", scope, ["daemon-reload"]);
  }
}

export class IsStarted extends Assertion {
  constructor(private readonly service: SystemdService) {
    super("is started");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const state = await this.service.property(runtime, "ActiveState");
    if (state === "inactive") {
      await this.record(new ServiceStarted(this.service), runtime);
    } else if (state !== "active") {
      throw new SystemdServiceError(
        `Unknown state for service '${this.service.name}': ActiveState=${state}`
      );
    }
    this.display(runtime.log);
  }
}

export class IsEnabled extends Assertion {
  constructor(private readonly service: SystemdService) {
    super("is enabled");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    const state = await this.service.property(runtime, "UnitFileState");
    if (state === "disabled") {
      await this.record(new ServiceEnabled(this.service), runtime);
    } else if (state !== "enabled") {
      throw new SystemdServiceError(
        `Unknown state for service '${this.service.name}': UnitFileState=${state}`
      );
    }
    this.display(runtime.log);
  }
}

/** Always records a restart. Meant for handlers. */
export class IsRestarted extends Assertion {
  constructor(private readonly service: SystemdService) {
    super("is restarted");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    await this.record(new ServiceRestarted(this.service), runtime);
    this.display(runtime.log);
  }
}

export class IsReloaded extends Assertion {
  constructor(private readonly scope: SystemdScope) {
    super(`systemd ${scope} daemon is reloaded`);
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    await this.record(new DaemonReloaded(this.scope), runtime);
    this.display(runtime.log);
  }
}
