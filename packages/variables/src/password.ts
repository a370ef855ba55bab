import {
  runChecked,
  userCommand,
  type CommandRunner,
  type ElevationType
} from "@hostform/convergence";

export type PasswordLoader = () => Promise<string>;

export interface PasswordProvider {
  /** Loads the password on first use and returns the same value afterwards. */
  get(): Promise<string>;
}

export function createPasswordProvider(loader: PasswordLoader): PasswordProvider {
  let cached: Promise<string> | undefined;
  return {
    get() {
      if (!cached) {
        cached = loader().catch((error: unknown) => {
          cached = undefined;
          throw error;
        });
      }
      return cached;
    }
  };
}

export interface CommandPasswordLoaderOptions {
  commands: CommandRunner;
  elevation: ElevationType;
  /** The invoking user; the command runs as this user when elevated. */
  username: string;
  env?: Record<string, string | undefined>;
}

/**
 * A loader that takes the password from the standard output of `argv`,
 * e.g. `["pass", "show", "hostform"]`.
 */
export function commandPasswordLoader(
  argv: readonly string[],
  options: CommandPasswordLoaderOptions
): PasswordLoader {
  return async () => {
    const result = await runChecked(
      options.commands,
      userCommand(options.elevation, options.username, argv),
      { env: options.env }
    );
    return result.stdout.replace(/[\r\n]+$/, "");
  };
}
