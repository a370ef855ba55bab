import chalk from "chalk";

export const typography = {
  bold: (text: string) => chalk.bold(text),
  dim: (text: string) => chalk.dim(text)
} as const;
