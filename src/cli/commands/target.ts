import type { Command } from "commander";
import { text } from "@hostform/design-system";
import { CyclicTargetError, resolveOrder, type Target } from "@hostform/targets";
import type { CliContainer } from "../container.js";
import { CliError } from "../errors.js";
import { requireTarget } from "./shared.js";

export interface TargetCommandOptions {
  full?: boolean;
}

export function registerTargetCommand(program: Command, container: CliContainer): Command {
  return program
    .command("target")
    .description("List targets, or show what a target depends on.")
    .argument("[name]", "Target to show")
    .option("--full", "Include roles")
    .action((name: string | undefined, options: TargetCommandOptions) => {
      executeTarget(container, name, options);
    });
}

export function executeTarget(
  container: CliContainer,
  name: string | undefined,
  options: TargetCommandOptions
): void {
  const full = Boolean(options.full);
  const { targets } = container.project;

  if (name === undefined) {
    for (const target of targets.all()) {
      container.stdout(target.name);
      if (full) {
        const roles = target.roles();
        roles.forEach((role, index) => {
          const branch = index + 1 === roles.length ? "└╌╌╌" : "├╌╌╌";
          container.stdout(`${branch}${text.target(role)}`);
        });
      }
    }
    return;
  }

  requireTarget(container, name);
  let lines: string[];
  try {
    lines = dependencyTree(targets.get(name), full);
  } catch (error) {
    if (error instanceof CyclicTargetError) {
      throw new CliError(`${error.message}.`, { isUserError: true, cause: error });
    }
    throw error;
  }
  container.stdout(`Dependencies of ${name}:`);
  container.stdout("");
  for (const line of lines) {
    container.stdout(line);
  }
}

/**
 *   laptop
 *   ├───base
 *   │   └╌╌╌shell
 *   └╌╌╌desktop
 */
export function dependencyTree(target: Target, full: boolean): string[] {
  resolveOrder(target);
  const lines: string[] = [];
  const padding: string[] = [];

  const item = (label: string, last: boolean, char: string): void => {
    let line = padding.slice(0, -1).join("");
    if (padding.length > 0) {
      line += `${last ? "└" : "├"}${char.repeat(3)}`;
    }
    lines.push(line + label);
  };

  const visit = (current: Target, last: boolean): void => {
    item(current.name, last, "─");
    const dependencies = current.dependencies();
    const roles = full ? current.roles() : [];

    dependencies.forEach((dependency, index) => {
      const isLast = index + 1 === dependencies.length + roles.length;
      padding.push(isLast ? "    " : "│   ");
      visit(dependency, isLast);
      padding.pop();
    });

    roles.forEach((role, index) => {
      const isLast = index + 1 === roles.length;
      padding.push(isLast ? "    " : "│   ");
      item(text.target(role), isLast, "╌");
      padding.pop();
    });
  };

  visit(target, true);
  return lines;
}
