import { RoleContext, type ApplyRuntime } from "@hostform/convergence";
import { text } from "@hostform/design-system";
import type { RoleRegistry } from "./role.js";
import type { Target } from "./target.js";

export type RoleOutcomeStatus = "applied" | "failed" | "skipped";

export interface RoleOutcome {
  target: string;
  role: string;
  status: RoleOutcomeStatus;
  error?: Error;
}

export interface TargetRunnerLogger {
  info(message: string): void;
  logException(error: Error, operation: string): void;
}

export interface ExecuteOptions {
  /** Only apply these roles. */
  roleLimit?: readonly string[];
  skipRoles?: readonly string[];
}

export interface TargetRunnerOptions<TScope> {
  roles: RoleRegistry<TScope>;
  runtime: ApplyRuntime;
  logger: TargetRunnerLogger;
  createScope(role: string, context: RoleContext): TScope;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Applies targets: required targets first, then the target's own roles.
 *
 * A failing role is logged and recorded; the remaining roles and targets
 * still run. A target required along two paths runs once per path.
 */
export class TargetRunner<TScope> {
  constructor(private readonly options: TargetRunnerOptions<TScope>) {}

  async execute(target: Target, options: ExecuteOptions = {}): Promise<RoleOutcome[]> {
    const outcomes: RoleOutcome[] = [];
    await this.executeInto(target, options, outcomes);
    return outcomes;
  }

  async applyRole(target: string, name: string): Promise<RoleOutcome> {
    const { roles, runtime, logger, createScope } = this.options;
    return runtime.log.within(async (): Promise<RoleOutcome> => {
      runtime.log.noChange(`Role ${text.target(name)}`);
      try {
        const role = roles.get(name);
        const context = new RoleContext(runtime);
        await role.configure(createScope(name, context));
        await context.runHandlers();
        return { target, role: name, status: "applied" };
      } catch (caught) {
        const error = toError(caught);
        logger.logException(error, `apply role ${name}`);
        return { target, role: name, status: "failed", error };
      }
    });
  }

  private async executeInto(
    target: Target,
    options: ExecuteOptions,
    outcomes: RoleOutcome[]
  ): Promise<void> {
    const { logger } = this.options;
    for (const dependency of target.dependencies()) {
      logger.info(`Target ${text.target(target.name)} requires ${text.target(dependency.name)}`);
      await this.executeInto(dependency, options, outcomes);
    }

    logger.info(`Applying target ${text.target(target.name)}`);
    for (const role of target.roles()) {
      if (isExcluded(role, options)) {
        outcomes.push({ target: target.name, role, status: "skipped" });
        continue;
      }
      outcomes.push(await this.applyRole(target.name, role));
    }
  }
}

function isExcluded(role: string, { roleLimit, skipRoles = [] }: ExecuteOptions): boolean {
  return (roleLimit !== undefined && !roleLimit.includes(role)) || skipRoles.includes(role);
}
