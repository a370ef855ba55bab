import { homedir } from "node:os";
import { createNodeFileSystem } from "@hostform/convergence";
import { log } from "@hostform/design-system";
import { CommanderError, type Command } from "commander";
import type { Project } from "../project/define-project.js";
import { CliError, SilentError } from "./errors.js";
import type { CliDependencies } from "./program.js";

export function createCliMain(
  project: Project,
  programFactory: (dependencies: CliDependencies) => Command
): (argv?: string[]) => Promise<void> {
  return async function runCli(argv: string[] = process.argv): Promise<void> {
    const program = programFactory({
      project,
      fs: createNodeFileSystem(),
      env: {
        cwd: process.cwd(),
        homeDir: homedir(),
        platform: process.platform,
        variables: process.env
      },
      argv,
      exitOverride: true
    });

    try {
      await program.parseAsync(argv);
    } catch (error) {
      process.exitCode = exitCodeFor(error);
    }
  };
}

function exitCodeFor(error: unknown): number {
  if (error instanceof SilentError) {
    return error.exitCode;
  }
  if (error instanceof CommanderError) {
    // commander already printed the problem
    return error.exitCode;
  }
  if (error instanceof CliError && error.isUserError) {
    log.error(error.message);
    return error.exitCode;
  }
  const message = error instanceof Error ? error.message : String(error);
  log.error(`Error: ${message}`);
  if (error instanceof Error && error.stack) {
    log.message(error.stack);
  }
  return 1;
}
