import chalk from "chalk";

export const brand = "#2f9e6f";

export const dark = {
  header: (text: string) => chalk.greenBright.bold(text),
  accent: (text: string) => chalk.cyan(text),
  muted: (text: string) => chalk.dim(text),
  subject: (text: string) => chalk.blue(text),
  code: (text: string) => chalk.gray(text)
};

export const light = {
  header: (text: string) => chalk.hex(brand).bold(text),
  accent: (text: string) => chalk.hex("#006699").bold(text),
  muted: (text: string) => chalk.hex("#666666")(text),
  subject: (text: string) => chalk.hex("#1f4fa0")(text),
  code: (text: string) => chalk.hex("#555555")(text)
};

export type ThemeName = "dark" | "light";
export type ThemePalette = typeof dark;
