export class EnsureFailedError extends Error {
  constructor(readonly subject: string) {
    super(`Assertion failed for ${subject}`);
    this.name = "EnsureFailedError";
  }
}

export class UnsupportedEntryError extends Error {
  constructor(readonly path: string) {
    super(`'${path}' is not a file, directory or symlink`);
    this.name = "UnsupportedEntryError";
  }
}

export class MissingEntryError extends Error {
  constructor(
    readonly path: string,
    readonly assertion: string
  ) {
    super(`Cannot check '${assertion}': '${path}' does not exist`);
    this.name = "MissingEntryError";
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly command: string[],
    readonly exitCode: number,
    readonly output: string
  ) {
    const trimmed = output.trim();
    super(
      `Command failed with exit code ${exitCode}: ${command.join(" ")}` +
        (trimmed.length > 0 ? `\n${trimmed}` : "")
    );
    this.name = "CommandFailedError";
  }
}

export class UnsupportedPlatformError extends Error {
  constructor(
    readonly feature: string,
    readonly platform: string
  ) {
    super(`${feature} is not supported on ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

export class UnknownAccountError extends Error {
  constructor(
    readonly kind: "user" | "group",
    readonly account: string
  ) {
    super(`Unknown ${kind}: ${account}`);
    this.name = "UnknownAccountError";
  }
}

export class ElevationNotAllowedError extends Error {
  constructor(readonly command: string[]) {
    super(
      `Cannot run '${command.join(" ")}' with elevated privileges, because elevation is not allowed`
    );
    this.name = "ElevationNotAllowedError";
  }
}

export class FileTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileTreeError";
  }
}
