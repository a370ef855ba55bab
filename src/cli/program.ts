import { Command } from "commander";
import { createRequire } from "node:module";
import { text } from "@hostform/design-system";
import { throwCommandNotFound } from "./command-not-found.js";
import { createCliContainer, type CliContainer, type CliDependencies } from "./container.js";
import { SilentError } from "./errors.js";
import { registerApplyCommand } from "./commands/apply.js";
import { registerSecretCommands } from "./commands/secrets.js";
import { registerTargetCommand } from "./commands/target.js";
import { registerVersionOption } from "./commands/version.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

function packageVersion(): string {
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  program
    .name("hostform")
    .description(text.heading("Converge this machine toward a declared configuration."))
    .option("--verbose", "Show verbose logs.")
    .helpOption("-h, --help", "Display help for command");

  registerVersionOption(program, container, packageVersion());
  registerApplyCommand(program, container);
  registerTargetCommand(program, container);
  registerSecretCommands(program, container);

  program.action(() => {
    const [unknown] = program.args;
    if (unknown !== undefined) {
      throwCommandNotFound(container, unknown);
    }
    program.outputHelp();
    throw new SilentError("", { exitCode: 1 });
  });

  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
