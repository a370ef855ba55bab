import type { Command } from "commander";
import { ApplyLog, type ApplyRuntime } from "@hostform/convergence";
import { TargetRunner, resolveOrder } from "@hostform/targets";
import { text } from "@hostform/design-system";
import { detectHost } from "../../project/host.js";
import { RoleScope } from "../../project/role-scope.js";
import {
  RunContextError,
  definedEnv,
  parseRunContext,
  serializeRunContext,
  type RunContext
} from "../../project/run-context.js";
import type { CliContainer } from "../container.js";
import { CliError, SilentError } from "../errors.js";
import { RoleFailureExit } from "../exit-signals.js";
import type { ScopedLogger } from "../logger.js";
import { createCommandLogger, parseList, readTargetFile, requireTarget } from "./shared.js";

export interface ApplyCommandOptions {
  dryRun?: boolean;
  role?: string;
  skipRole?: string;
  elevate?: boolean;
  showContext?: boolean;
  context?: string;
}

export function registerApplyCommand(program: Command, container: CliContainer): Command {
  return program
    .command("apply")
    .description("Apply a target to this machine.")
    .argument("[target]", "Target to apply (defaults to the contents of .target)")
    .option("--dry-run", "Report changes without making them")
    .option("--role <roles>", "Only apply these comma-separated roles")
    .option("--skip-role <roles>", "Skip these comma-separated roles")
    .option("--elevate", "Run the whole command through sudo")
    .option("--show-context", "Print the run context as JSON and exit")
    .option("--context <json>", "Use a serialized run context")
    .action(async (target: string | undefined, options: ApplyCommandOptions) => {
      await executeApply(program, container, target, options);
    });
}

export async function executeApply(
  program: Command,
  container: CliContainer,
  targetArgument: string | undefined,
  options: ApplyCommandOptions
): Promise<void> {
  const dryRun = Boolean(options.dryRun);
  const logger = createCommandLogger(container, program, "apply", dryRun);

  const run =
    options.context !== undefined
      ? parseContextOption(options.context)
      : await createRunContext(container, targetArgument, Boolean(options.elevate));

  if (options.elevate && options.context === undefined) {
    await reexecElevated(container, logger, run);
    return;
  }

  if (options.showContext) {
    container.stdout(JSON.stringify(run, null, 2));
    return;
  }

  const { project } = container;
  requireTarget(container, run.target);
  const runtime = createRuntime(container, run, dryRun);
  const runner = new TargetRunner({
    roles: project.roles,
    runtime,
    logger,
    createScope: (role, context) =>
      new RoleScope({
        role,
        context,
        run,
        targets: project.targets,
        templateGlobals: project.settings.templateGlobals
      })
  });

  const roleLimit = parseList(options.role);
  const skipRoles = parseList(options.skipRole);
  for (const name of [...(roleLimit ?? []), ...(skipRoles ?? [])]) {
    if (!project.roles.has(name)) {
      logger.warn(`Role '${name}' is not defined; ignoring it.`);
    }
  }

  const outcomes = await runner.execute(project.targets.get(run.target), {
    roleLimit,
    skipRoles
  });

  const failed = outcomes.filter((outcome) => outcome.status === "failed");
  if (failed.length > 0) {
    const names = failed.map((outcome) => outcome.role);
    logger.error(`${failed.length} role(s) failed: ${names.join(", ")}`);
    throw new RoleFailureExit(names);
  }

  logger.success(
    dryRun
      ? `Dry run of ${text.target(run.target)} complete; nothing was changed.`
      : `Applied ${text.target(run.target)}.`
  );
}

function parseContextOption(serialized: string): RunContext {
  try {
    return parseRunContext(serialized);
  } catch (error) {
    if (error instanceof RunContextError) {
      throw new CliError(error.message, { isUserError: true, cause: error });
    }
    throw error;
  }
}

async function createRunContext(
  container: CliContainer,
  targetArgument: string | undefined,
  elevate: boolean
): Promise<RunContext> {
  const { env, project } = container;
  const target = targetArgument ?? (await readTargetFile(container));
  if (target === undefined) {
    throw new CliError("No target given and no .target file found.", { isUserError: true });
  }
  requireTarget(container, target);

  if (elevate && env.platform === "win32") {
    throw new CliError("Elevation is not supported on Windows.", { isUserError: true });
  }
  const elevation = elevate ? "elevated" : env.platform === "win32" ? "none" : "just-in-time";

  const host = await detectHost({
    platform: env.platform,
    osType: container.osType,
    user: container.userInfo(),
    accounts: container.accounts
  });

  const password = container.password({ elevation, username: host.user.username });
  const order = resolveOrder(project.targets.get(target)).map((resolved) => resolved.name);
  const vars = await container.variableLoader(password).loadAll(container.root, order);

  return {
    root: container.root,
    target,
    elevation,
    host,
    env: definedEnv(env.variables),
    vars
  };
}

async function reexecElevated(
  container: CliContainer,
  logger: ScopedLogger,
  run: RunContext
): Promise<void> {
  const args = container.argv.slice(1).filter((arg) => arg !== "--elevate");
  logger.verbose(`Re-running with sudo: ${args.join(" ")}`);
  const exitCode = await container.interactiveRunner("sudo", [
    container.execPath,
    ...args,
    "--context",
    serializeRunContext(run)
  ]);
  if (exitCode !== 0) {
    throw new SilentError("", { exitCode });
  }
}

function createRuntime(container: CliContainer, run: RunContext, dryRun: boolean): ApplyRuntime {
  const { username, groupname, homeDir } = run.host.user;
  return {
    fs: container.fs,
    log: new ApplyLog(container.applyLog),
    shouldModify: !dryRun,
    accounts: container.accounts,
    commands: container.commandRunner,
    platform: run.host.platform,
    user: { username, groupname, homeDir },
    elevation: run.elevation,
    env: run.env
  };
}
