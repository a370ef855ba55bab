import { ELEVATION_TYPES, type ElevationType } from "@hostform/convergence";
import { variableTreeSchema, type VariableTree } from "@hostform/variables";
import { z } from "zod";

const PLATFORMS = [
  "aix",
  "android",
  "darwin",
  "freebsd",
  "haiku",
  "linux",
  "openbsd",
  "sunos",
  "win32",
  "cygwin",
  "netbsd"
] as const satisfies readonly NodeJS.Platform[];

const hostUserSchema = z.object({
  username: z.string(),
  groupname: z.string(),
  uid: z.number().int().optional(),
  gid: z.number().int().optional(),
  homeDir: z.string()
});

const hostSchema = z.object({
  os: z.string(),
  platform: z.enum(PLATFORMS),
  user: hostUserSchema
});

export const runContextSchema = z.object({
  root: z.string(),
  target: z.string(),
  elevation: z.enum(ELEVATION_TYPES),
  host: hostSchema,
  env: z.record(z.string()),
  vars: variableTreeSchema
});

export type HostInfo = z.infer<typeof hostSchema>;

/**
 * Everything a run needs to apply a target. `apply --elevate` passes it to
 * the elevated process as JSON so both see the same user and variables.
 */
export interface RunContext {
  root: string;
  target: string;
  elevation: ElevationType;
  host: HostInfo;
  env: Record<string, string>;
  vars: VariableTree;
}

export class RunContextError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RunContextError";
  }
}

export function serializeRunContext(context: RunContext): string {
  return JSON.stringify(context);
}

export function parseRunContext(serialized: string): RunContext {
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (error) {
    throw new RunContextError("Invalid --context: not JSON", { cause: error });
  }
  const result = runContextSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new RunContextError(`Invalid --context${where}: ${issue?.message ?? "unknown error"}`);
  }
  return result.data;
}

/** Environment variables with a value; unset entries are dropped. */
export function definedEnv(env: Record<string, string | undefined>): Record<string, string> {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      defined[key] = value;
    }
  }
  return defined;
}
