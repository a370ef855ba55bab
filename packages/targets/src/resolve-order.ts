import { CyclicTargetError } from "./errors.js";
import type { Target } from "./target.js";

/**
 * Every target reachable from `target`, most indirectly required first.
 *
 * Each target sits at the minimum depth it can be reached at; ties are
 * broken by name. Variables are merged in this order, so closer targets
 * override farther ones.
 */
export function resolveOrder(target: Target): Target[] {
  const depths = new Map<Target, number>();

  const visit = (current: Target, depth: number, path: readonly string[]): void => {
    if (path.includes(current.name)) {
      throw new CyclicTargetError([...path, current.name]);
    }
    const known = depths.get(current);
    depths.set(current, known === undefined ? depth : Math.min(known, depth));
    for (const dependency of current.dependencies()) {
      visit(dependency, depth + 1, [...path, current.name]);
    }
  };
  visit(target, 0, []);

  return [...depths.entries()]
    .sort(([a, depthA], [b, depthB]) =>
      depthB - depthA || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
    )
    .map(([resolved]) => resolved);
}
