import { RoleRegistry, TargetRegistry, type RoleDefinition } from "@hostform/targets";
import type { PasswordLoader } from "@hostform/variables";
import type { RoleScope } from "./role-scope.js";

export interface TargetDeclaration {
  requires?: string[];
  roles?: string[];
}

export interface ProjectSettings {
  /**
   * Where the secrets password comes from: a command whose standard output
   * is the password, or a loader. Prompts for it when unset.
   */
  password?: readonly string[] | PasswordLoader;
  /** Extra values available to every template. */
  templateGlobals?: Record<string, unknown>;
}

export interface ProjectDefinition {
  /** Project directory holding `vars/` and `roles/`. Defaults to the working directory. */
  root?: string;
  targets: Record<string, TargetDeclaration>;
  roles: RoleDefinition<RoleScope>[];
  settings?: ProjectSettings;
}

export interface Project {
  root: string | undefined;
  targets: TargetRegistry;
  roles: RoleRegistry<RoleScope>;
  settings: ProjectSettings;
}

export function defineProject(definition: ProjectDefinition): Project {
  const targets = new TargetRegistry();
  for (const [name, declaration] of Object.entries(definition.targets)) {
    targets
      .target(name)
      .dependsOn(...(declaration.requires ?? []))
      .hasRoles(...(declaration.roles ?? []));
  }
  return {
    root: definition.root,
    targets,
    roles: new RoleRegistry(definition.roles),
    settings: definition.settings ?? {}
  };
}

export function defineRole(
  name: string,
  configure: (role: RoleScope) => void | Promise<void>
): RoleDefinition<RoleScope> {
  return { name, configure };
}
