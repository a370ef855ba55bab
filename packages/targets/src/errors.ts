export class UnknownTargetError extends Error {
  constructor(readonly target: string) {
    super(`Target '${target}' does not exist`);
    this.name = "UnknownTargetError";
  }
}

export class CyclicTargetError extends Error {
  constructor(readonly path: readonly string[]) {
    super(`Targets depend on each other: ${path.join(" -> ")}`);
    this.name = "CyclicTargetError";
  }
}

export class RoleNotFoundError extends Error {
  constructor(readonly role: string) {
    super(`Role '${role}' is not defined`);
    this.name = "RoleNotFoundError";
  }
}

export class TargetNotSupportedError extends Error {
  constructor(
    readonly role: string,
    readonly target: string
  ) {
    super(`The role '${role}' does not support the target '${target}'`);
    this.name = "TargetNotSupportedError";
  }
}
