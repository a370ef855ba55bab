import chalk from "chalk";
import { getTheme } from "../internal/theme.js";

function orQuotes(content: string): string {
  return content === "" ? "''" : content;
}

export const text = {
  heading(content: string): string {
    const theme = getTheme();
    return theme.header(content);
  },
  command(content: string): string {
    const theme = getTheme();
    return theme.accent(content);
  },
  usageCommand(content: string): string {
    return chalk.green(content);
  },
  muted(content: string): string {
    const theme = getTheme();
    return theme.muted(content);
  },
  /** Target and role names. */
  target(content: string): string {
    return chalk.cyan.bold(orQuotes(content));
  },
  /** Names of managed resources (packages, services, groups). */
  subject(content: string): string {
    const theme = getTheme();
    return theme.subject(orQuotes(content));
  },
  /** Paths, modes and other literal values. */
  code(content: string): string {
    const theme = getTheme();
    return theme.code(orQuotes(content));
  }
} as const;
