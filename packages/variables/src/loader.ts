import path from "node:path";
import YAML from "yaml";
import { kindOf, lstatIfExists, type FileSystem } from "@hostform/convergence";
import { unify } from "./merge.js";
import type { PasswordProvider } from "./password.js";
import { isSecret, type SecretCodec } from "./secrets.js";
import { variableTreeSchema, type VariableTree } from "./types.js";

export const VARS_DIRECTORY = "vars";
export const ALL_KEY = "all";
export const TARGETS_DIRECTORY = path.join(VARS_DIRECTORY, "targets");

export class VariableFileError extends Error {
  constructor(
    readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid variables file ${filePath}: ${reason}`, options);
    this.name = "VariableFileError";
  }
}

export interface VariableLoaderDeps {
  fs: FileSystem;
  secrets: SecretCodec;
  password: PasswordProvider;
}

function isVarsFile(name: string): boolean {
  return name.endsWith(".yaml") || name.endsWith(".yml");
}

/**
 * Loads YAML variable trees from a project's `vars/` directory.
 *
 * For a key, the first of these wins:
 * - `<dir>/<key>/` with every `*.yaml` / `*.yml` file, merged in name order
 * - `<dir>/<key>.yaml`
 * - `<dir>/<key>.yml`
 */
export class VariableLoader {
  constructor(private readonly deps: VariableLoaderDeps) {}

  async loadVars(directory: string, key: string): Promise<VariableTree> {
    const { fs } = this.deps;
    const base = path.join(directory, key);

    const stats = await lstatIfExists(fs, base);
    if (stats?.isDirectory()) {
      let vars: VariableTree = {};
      for (const name of [...(await fs.readdir(base))].sort()) {
        const filePath = path.join(base, name);
        if (!isVarsFile(name) || kindOf(await lstatIfExists(fs, filePath)) !== "file") {
          continue;
        }
        vars = unify(vars, await this.loadFile(filePath));
      }
      return vars;
    }

    for (const candidate of [`${base}.yaml`, `${base}.yml`]) {
      if (kindOf(await lstatIfExists(fs, candidate)) === "file") {
        return unify({}, await this.loadFile(candidate));
      }
    }
    return {};
  }

  /**
   * `vars/all` merged with `vars/targets/<name>` for each target, in the
   * given order.
   */
  async loadAll(root: string, targets: readonly string[]): Promise<VariableTree> {
    let vars = await this.loadVars(path.join(root, VARS_DIRECTORY), ALL_KEY);
    for (const target of targets) {
      vars = unify(vars, await this.loadVars(path.join(root, TARGETS_DIRECTORY), target));
    }
    return vars;
  }

  async loadFile(filePath: string): Promise<VariableTree> {
    let content = await this.deps.fs.readFile(filePath, "utf8");
    if (isSecret(content)) {
      const password = await this.deps.password.get();
      content = (await this.deps.secrets.decrypt(content, password)).toString("utf8");
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(content);
    } catch (error) {
      throw new VariableFileError(
        filePath,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }

    const result = variableTreeSchema.safeParse(parsed);
    if (!result.success) {
      throw new VariableFileError(filePath, "expected a mapping of variables");
    }
    return result.data;
  }
}
