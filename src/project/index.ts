export { defineProject, defineRole } from "./define-project.js";
export type {
  Project,
  ProjectDefinition,
  ProjectSettings,
  TargetDeclaration
} from "./define-project.js";
export { ROLES_DIRECTORY, RoleScope } from "./role-scope.js";
export type {
  FileTreeScopeOptions,
  RoleScopeOptions,
  SystemdServiceScopeOptions
} from "./role-scope.js";
export {
  RunContextError,
  definedEnv,
  parseRunContext,
  runContextSchema,
  serializeRunContext
} from "./run-context.js";
export type { HostInfo, RunContext } from "./run-context.js";
export { detectHost } from "./host.js";
export type { HostProbe } from "./host.js";
export { TemplateRenderError, createRoleTemplates, renderTemplate } from "./template.js";
export type { RoleTemplates, TemplateLocation, TemplateView } from "./template.js";
