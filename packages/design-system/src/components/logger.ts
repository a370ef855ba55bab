import { log } from "@clack/prompts";
import chalk from "chalk";
import { isPlainOutput } from "../internal/plain-output.js";
import { stripAnsi } from "../internal/ansi.js";
import { symbols } from "./symbols.js";

export type LineEmitter = (line: string) => void;

export interface LoggerOutput {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  message(message: string, symbol?: string): void;
}

export function createLogger(emitter?: LineEmitter): LoggerOutput {
  const emit = (
    level: "info" | "success" | "warn" | "error",
    message: string
  ): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (isPlainOutput()) {
      process.stdout.write(stripAnsi(message) + "\n");
      return;
    }
    if (level === "success") {
      log.message(message, { symbol: symbols.success });
      return;
    }
    if (level === "warn") {
      log.warn(message);
      return;
    }
    if (level === "error") {
      log.error(message);
      return;
    }
    log.message(message, { symbol: symbols.info });
  };

  return {
    info(message: string): void {
      emit("info", message);
    },
    success(message: string): void {
      emit("success", message);
    },
    warn(message: string): void {
      emit("warn", message);
    },
    error(message: string): void {
      emit("error", message);
    },
    message(message: string, symbol?: string): void {
      if (emitter) {
        emitter(message);
        return;
      }
      log.message(message, { symbol: symbol ?? chalk.gray(symbols.bar) });
    }
  };
}

/**
 * Emitter for the indented apply tree. Lines go to stderr so that
 * stdout stays usable for `decrypt` and `view` output.
 */
export const stderrLines: LineEmitter = (line) => {
  process.stderr.write(line + "\n");
};
