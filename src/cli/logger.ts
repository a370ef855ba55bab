import { createLogger, type LineEmitter, type LoggerOutput } from "@hostform/design-system";
import { TemplateRenderError } from "../project/template.js";

export interface LoggerContext {
  dryRun?: boolean;
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "dryRun" | "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** The error, where it happened and, in verbose mode, its stack. */
  logException(error: Error, operation: string): void;
  verbose(message: string): void;
  child(context: Partial<LoggerContext>): ScopedLogger;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
}

function exceptionDetails(error: Error): string[] {
  if (error instanceof TemplateRenderError) {
    const { file, line, column, source } = error.location;
    const shown = source.replace(/\t/g, "    ");
    const caretOffset = source.slice(0, column - 1).replace(/\t/g, "    ").length;
    return [
      `In '${file}' at line ${line}, column ${column}:`,
      "",
      `  ${shown}`,
      `  ${" ".repeat(caretOffset)}^`
    ];
  }
  return [`${error.name}: ${error.message}`];
}

function stackLines(error: Error): string[] {
  return (error.stack ?? "").split("\n").slice(1).map((line) => line.trim()).filter(Boolean);
}

export function createLoggerFactory(emitter?: LineEmitter): LoggerFactory {
  const output: LoggerOutput = createLogger(emitter);

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const dryRun = context.dryRun ?? false;
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    const scoped: ScopedLogger = {
      context: { dryRun, verbose, scope },
      info(message) {
        output.info(formatMessage(message));
      },
      success(message) {
        output.success(message);
      },
      warn(message) {
        output.warn(formatMessage(message));
      },
      error(message) {
        output.error(formatMessage(message));
      },
      logException(error, operation) {
        output.error(formatMessage(`Error during ${operation}: ${error.message}`));
        for (const line of exceptionDetails(error)) {
          output.message(`    ${line}`);
        }
        if (verbose) {
          for (const line of stackLines(error)) {
            output.message(`      ${line}`);
          }
        }
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        output.message(formatMessage(message));
      },
      child(next) {
        return create({
          dryRun: next.dryRun ?? dryRun,
          verbose: next.verbose ?? verbose,
          scope: next.scope ?? scope
        });
      }
    };

    return scoped;
  };

  return { create };
}
