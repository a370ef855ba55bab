export { Target, TargetRegistry } from "./target.js";
export { resolveOrder } from "./resolve-order.js";
export { RoleRegistry } from "./role.js";
export type { RoleDefinition } from "./role.js";
export { TargetRunner } from "./runner.js";
export type {
  ExecuteOptions,
  RoleOutcome,
  RoleOutcomeStatus,
  TargetRunnerLogger,
  TargetRunnerOptions
} from "./runner.js";
export {
  CyclicTargetError,
  RoleNotFoundError,
  TargetNotSupportedError,
  UnknownTargetError
} from "./errors.js";
