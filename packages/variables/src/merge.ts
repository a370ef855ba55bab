import { isVariableTree, type VariableTree } from "./types.js";

/** Reserved key naming the merge strategy of the level it appears on. */
export const CONFLICT_HINT = "$conflict";

export type MergeStrategy = "merge" | "replace" | "error";

const STRATEGIES: readonly MergeStrategy[] = ["merge", "replace", "error"];

export class MergeConflictError extends Error {
  constructor() {
    super("Refusing to merge conflicting variables ($conflict: error)");
    this.name = "MergeConflictError";
  }
}

export class InvalidMergeStrategyError extends Error {
  constructor(readonly value: unknown) {
    super(
      `Invalid ${CONFLICT_HINT} value ${JSON.stringify(value)}; expected one of ${STRATEGIES.join(", ")}`
    );
    this.name = "InvalidMergeStrategyError";
  }
}

function isMergeStrategy(value: unknown): value is MergeStrategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

function hintOf(tree: VariableTree): MergeStrategy | undefined {
  if (!Object.hasOwn(tree, CONFLICT_HINT)) {
    return undefined;
  }
  const value = tree[CONFLICT_HINT];
  if (!isMergeStrategy(value)) {
    throw new InvalidMergeStrategyError(value);
  }
  return value;
}

/**
 * Merge `overlay` onto `base`.
 *
 * A `$conflict` key (overlay first, then base) overrides `strategy` for
 * this level and is carried into the result. Nested levels default to
 * "merge" again.
 */
export function unify(
  base: VariableTree,
  overlay: VariableTree,
  strategy: MergeStrategy = "merge"
): VariableTree {
  const hint = hintOf(overlay) ?? hintOf(base);
  const unified: VariableTree = {};
  if (hint !== undefined) {
    unified[CONFLICT_HINT] = hint;
  }

  const effective = hint ?? strategy;
  if (effective === "error") {
    throw new MergeConflictError();
  }

  if (effective === "replace") {
    for (const [key, value] of Object.entries(overlay)) {
      if (key !== CONFLICT_HINT) {
        unified[key] = value;
      }
    }
    return unified;
  }

  const keys = new Set([...Object.keys(base), ...Object.keys(overlay)]);
  keys.delete(CONFLICT_HINT);
  for (const key of keys) {
    const baseValue = Object.hasOwn(base, key) ? base[key] : undefined;
    const overlayValue = Object.hasOwn(overlay, key) ? overlay[key] : undefined;
    if (overlayValue === undefined) {
      if (baseValue !== undefined) {
        unified[key] = baseValue;
      }
    } else if (isVariableTree(baseValue) && isVariableTree(overlayValue)) {
      unified[key] = unify(baseValue, overlayValue, effective);
    } else {
      unified[key] = overlayValue;
    }
  }
  return unified;
}
