import { RoleNotFoundError } from "./errors.js";

/**
 * A role: the configuration applied to the machine by a target. `configure`
 * declares subjects and applies them through its scope.
 */
export interface RoleDefinition<TScope> {
  name: string;
  configure(scope: TScope): void | Promise<void>;
}

export class RoleRegistry<TScope> {
  private readonly roles = new Map<string, RoleDefinition<TScope>>();

  constructor(roles: Iterable<RoleDefinition<TScope>> = []) {
    for (const role of roles) {
      this.register(role);
    }
  }

  register(role: RoleDefinition<TScope>): void {
    if (this.roles.has(role.name)) {
      throw new Error(`Role '${role.name}' is defined twice`);
    }
    this.roles.set(role.name, role);
  }

  has(name: string): boolean {
    return this.roles.has(name);
  }

  get(name: string): RoleDefinition<TScope> {
    const role = this.roles.get(name);
    if (!role) {
      throw new RoleNotFoundError(name);
    }
    return role;
  }

  names(): string[] {
    return [...this.roles.keys()];
  }
}
