export interface CliErrorOptions {
  /** Shown without the "Error:" prefix and without a stack trace. */
  isUserError?: boolean;
  exitCode?: number;
  cause?: unknown;
}

export class CliError extends Error {
  readonly isUserError: boolean;
  readonly exitCode: number;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? false;
    this.exitCode = options.exitCode ?? 1;
  }
}

/** Ends the command with its exit code; everything was already reported. */
export class SilentError extends CliError {
  constructor(message = "", options: CliErrorOptions = {}) {
    super(message, options);
    this.name = "SilentError";
  }
}

export class OperationCancelledError extends CliError {
  constructor() {
    super("Operation cancelled.", { isUserError: true });
    this.name = "OperationCancelledError";
  }
}
