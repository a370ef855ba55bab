export {
  isVariableTree,
  variableTreeSchema,
  variableValueSchema
} from "./types.js";
export type { VariableScalar, VariableTree, VariableValue } from "./types.js";
export {
  CONFLICT_HINT,
  InvalidMergeStrategyError,
  MergeConflictError,
  unify
} from "./merge.js";
export type { MergeStrategy } from "./merge.js";
export {
  ALL_KEY,
  TARGETS_DIRECTORY,
  VARS_DIRECTORY,
  VariableFileError,
  VariableLoader
} from "./loader.js";
export type { VariableLoaderDeps } from "./loader.js";
export {
  DEFAULT_SCRYPT_PARAMS,
  SECRET_HEADER,
  SECRET_MARKER,
  SECRET_VERSION,
  SecretCodec,
  SecretDecryptionError,
  SecretFormatError,
  isSecret
} from "./secrets.js";
export type { EncryptOptions, ScryptParams } from "./secrets.js";
export { commandPasswordLoader, createPasswordProvider } from "./password.js";
export type {
  CommandPasswordLoaderOptions,
  PasswordLoader,
  PasswordProvider
} from "./password.js";
