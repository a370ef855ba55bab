import { createCliMain } from "./cli/bootstrap.js";
import { createProgram } from "./cli/program.js";
import type { Project } from "./project/define-project.js";

export * from "./project/index.js";
export { createProgram } from "./cli/program.js";
export type { CliDependencies } from "./cli/container.js";
export { CliError, SilentError } from "./cli/errors.js";

/**
 * Run the command line for `project`:
 *
 *   await runCli(defineProject({ targets, roles }));
 */
export function runCli(project: Project, argv?: string[]): Promise<void> {
  return createCliMain(project, createProgram)(argv);
}
