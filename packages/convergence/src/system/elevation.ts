import { ElevationNotAllowedError } from "../errors.js";

/**
 * - `none`: elevated commands are refused.
 * - `just-in-time`: elevated commands are prefixed with sudo.
 * - `elevated`: the process already runs as root; user commands drop back
 *   to the invoking user.
 */
export const ELEVATION_TYPES = ["none", "just-in-time", "elevated"] as const;

export type ElevationType = (typeof ELEVATION_TYPES)[number];

export function elevatedCommand(
  elevation: ElevationType,
  argv: readonly string[]
): string[] {
  switch (elevation) {
    case "none":
      throw new ElevationNotAllowedError([...argv]);
    case "just-in-time":
      return ["sudo", ...argv];
    case "elevated":
      return [...argv];
  }
}

export function userCommand(
  elevation: ElevationType,
  username: string,
  argv: readonly string[]
): string[] {
  if (elevation === "elevated") {
    return ["sudo", "--preserve-env", "--user", username, ...argv];
  }
  return [...argv];
}
