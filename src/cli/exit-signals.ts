import { SilentError } from "./errors.js";

export class VersionExit extends SilentError {
  constructor() {
    super("", { isUserError: false, exitCode: 0 });
    this.name = "VersionExit";
  }
}

/** Some roles failed; they were logged as they failed. */
export class RoleFailureExit extends SilentError {
  constructor(readonly failedRoles: readonly string[]) {
    super(`Failed roles: ${failedRoles.join(", ")}`, { exitCode: 1 });
    this.name = "RoleFailureExit";
  }
}
