import { formatCommandNotFoundPanel } from "@hostform/design-system";
import type { CliContainer } from "./container.js";
import { SilentError } from "./errors.js";

export function throwCommandNotFound(container: CliContainer, unknownCommand: string): never {
  const panel = formatCommandNotFoundPanel({
    unknownCommand,
    helpCommand: "hostform --help"
  });
  const logger = container.loggerFactory.create({ scope: "cli" });
  logger.error(`${panel.label}\n${panel.footer}`);
  throw new SilentError(`Unknown command: ${unknownCommand}`, { exitCode: 1 });
}
