import { CyclicTargetError, UnknownTargetError } from "./errors.js";

/**
 * A named configuration profile: the targets it requires and the roles it
 * applies, both in declaration order.
 */
export class Target {
  private readonly requires: string[] = [];
  private readonly roleNames: string[] = [];

  constructor(
    readonly name: string,
    private readonly registry: TargetRegistry
  ) {}

  dependsOn(...names: string[]): this {
    this.requires.push(...names);
    return this;
  }

  hasRoles(...roles: string[]): this {
    this.roleNames.push(...roles);
    return this;
  }

  roles(): readonly string[] {
    return this.roleNames;
  }

  requiredNames(): readonly string[] {
    return this.requires;
  }

  dependencies(): Target[] {
    return this.requires.map((name) => this.registry.target(name));
  }

  /** True for this target and everything it requires, transitively. */
  includes(name: string): boolean {
    return this.includesVia(name, []);
  }

  private includesVia(name: string, path: readonly string[]): boolean {
    if (path.includes(this.name)) {
      throw new CyclicTargetError([...path, this.name]);
    }
    if (this.name === name) {
      return true;
    }
    const next = [...path, this.name];
    return this.dependencies().some((dependency) => dependency.includesVia(name, next));
  }
}

/**
 * Targets by name. Looking a name up creates the target, so dependencies can
 * be declared before the targets they name.
 */
export class TargetRegistry {
  private readonly targets = new Map<string, Target>();

  target(name: string): Target {
    let target = this.targets.get(name);
    if (!target) {
      target = new Target(name, this);
      this.targets.set(name, target);
    }
    return target;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  /** An existing target; unlike `target()` this never creates one. */
  get(name: string): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return target;
  }

  all(): Target[] {
    return [...this.targets.values()];
  }
}
