import { spawn } from "node:child_process";
import { CommandFailedError } from "../errors.js";

export interface CommandRunnerResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunnerOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  stdin?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandRunnerOptions
) => Promise<CommandRunnerResult>;

export function runCommand(
  command: string,
  args: string[],
  options?: CommandRunnerOptions
): Promise<CommandRunnerResult> {
  return new Promise((resolve) => {
    const stdin = options?.stdin;
    const child = spawn(command, args, {
      stdio: [stdin === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      cwd: options?.cwd,
      env: options?.env ? { ...process.env, ...options.env } : undefined
    });
    let stdout = "";
    let stderr = "";

    if (stdin !== undefined && child.stdin) {
      child.stdin.on("error", (error: Error) => {
        stderr += error.message;
      });
      child.stdin.end(stdin);
    }

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      const exitCode = typeof error.errno === "number" ? error.errno : 127;
      resolve({
        stdout,
        stderr: stderr ? `${stderr}${error.message}` : error.message,
        exitCode
      });
    });

    child.on("close", (code) => {
      resolve({
        stdout,
        stderr,
        exitCode: code ?? 0
      });
    });
  });
}

/**
 * Run `argv` and throw a CommandFailedError on a non-zero exit code.
 */
export async function runChecked(
  runner: CommandRunner,
  argv: readonly string[],
  options?: CommandRunnerOptions
): Promise<CommandRunnerResult> {
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new Error("Cannot run an empty command");
  }
  const result = await runner(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError([...argv], result.exitCode, result.stdout + result.stderr);
  }
  return result;
}

/** Runs a command on the caller's terminal and resolves with its exit code. */
export type InteractiveRunner = (
  command: string,
  args: string[],
  options?: Omit<CommandRunnerOptions, "stdin">
) => Promise<number>;

export function runInteractive(
  command: string,
  args: string[],
  options?: Omit<CommandRunnerOptions, "stdin">
): Promise<number> {
  const child = spawn(command, args, {
    cwd: options?.cwd,
    env: options?.env ? { ...process.env, ...options.env } : undefined,
    stdio: "inherit"
  });

  return new Promise<number>((resolve, reject) => {
    child.on("error", (error) => {
      reject(error);
    });

    child.on("close", (code) => {
      resolve(code ?? 1);
    });
  });
}
