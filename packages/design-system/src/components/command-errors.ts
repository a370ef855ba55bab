import { typography } from "../tokens/typography.js";
import { text } from "./text.js";

export function formatCommandNotFoundPanel(input: {
  unknownCommand: string;
  helpCommand: string;
  title?: string;
}): { title: string; label: string; footer: string } {
  const unknown = input.unknownCommand.length > 0
    ? input.unknownCommand
    : "<command>";

  return {
    title: input.title ?? "command not found",
    label: `${typography.bold("Unknown command:")} ${text.command(unknown)}`,
    footer: `${text.muted("Run")} ${text.usageCommand(input.helpCommand)} ${text.muted("for available commands.")}`
  };
}
