import chalk from "chalk";

export const symbols = {
  get info(): string {
    return chalk.green("●");
  },
  get success(): string {
    return chalk.green("◆");
  },
  bar: "│",
  // apply tree markers
  noChange: "*",
  change: "≈",
  pass: "✓",
  pending: "⟳",
  fail: "×"
} as const;
