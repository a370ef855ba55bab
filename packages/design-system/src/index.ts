// Tokens
export { brand, dark, light } from "./tokens/colors.js";
export type { ThemeName, ThemePalette } from "./tokens/colors.js";
export { typography } from "./tokens/typography.js";

// Components
export { text } from "./components/text.js";
export { symbols } from "./components/symbols.js";
export { createLogger, stderrLines } from "./components/logger.js";
export type { LoggerOutput, LineEmitter } from "./components/logger.js";
export { formatCommandNotFoundPanel } from "./components/command-errors.js";

// Prompts
export { password, isCancel, cancel, log } from "./prompts/index.js";
export type { PasswordOptions } from "./prompts/index.js";

// Internal utilities
export { getTheme, resolveThemeName } from "./internal/theme.js";
export type { ThemeEnv } from "./internal/theme.js";
export { isPlainOutput } from "./internal/plain-output.js";
export { stripAnsi } from "./internal/ansi.js";
