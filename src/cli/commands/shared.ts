import path from "node:path";
import type { Command } from "commander";
import { isNotFound } from "@hostform/convergence";
import type { CliContainer } from "../container.js";
import { TARGET_FILE } from "../environment.js";
import { CliError } from "../errors.js";
import type { ScopedLogger } from "../logger.js";

export interface CommandFlags {
  verbose: boolean;
}

export function resolveCommandFlags(program: Command): CommandFlags {
  const opts = program.optsWithGlobals();
  return {
    verbose: Boolean(opts.verbose)
  };
}

export function createCommandLogger(
  container: CliContainer,
  program: Command,
  scope: string,
  dryRun = false
): ScopedLogger {
  const flags = resolveCommandFlags(program);
  return container.loggerFactory.create({ dryRun, verbose: flags.verbose, scope });
}

/** `a,b, c` to `["a", "b", "c"]`. */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** The target named in the project's `.target` file, if there is one. */
export async function readTargetFile(container: CliContainer): Promise<string | undefined> {
  try {
    const content = await container.fs.readFile(path.join(container.root, TARGET_FILE), "utf8");
    const target = content.trim();
    return target.length > 0 ? target : undefined;
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

export function requireTarget(container: CliContainer, name: string): void {
  if (!container.project.targets.has(name)) {
    throw new CliError(`Target '${name}' does not exist.`, { isUserError: true });
  }
}
