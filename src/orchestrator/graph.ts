import { WorkflowError } from "./errors.js";

export interface GraphNode {
  key: string;
  deps?: readonly string[];
}

/**
 * Topologically sort entries by dependencies using Kahn's algorithm.
 *
 * Determinism: entries that become ready together keep their input order.
 */
export function topoSort<T extends GraphNode>(entries: readonly T[]): T[] {
  const byKey = new Map<string, T>();
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const entry of entries) {
    if (byKey.has(entry.key)) {
      throw new WorkflowError("DUPLICATE_COMPONENT", `Duplicate component key "${entry.key}"`, {
        key: entry.key,
      });
    }
    byKey.set(entry.key, entry);
    inDegree.set(entry.key, 0);
    dependents.set(entry.key, []);
  }

  for (const entry of entries) {
    for (const dep of entry.deps ?? []) {
      if (!byKey.has(dep)) {
        throw new WorkflowError(
          "MISSING_DEPENDENCY",
          `Component "${entry.key}" depends on unknown component "${dep}"`,
          { key: entry.key, missing_dep: dep },
        );
      }
      inDegree.set(entry.key, (inDegree.get(entry.key) ?? 0) + 1);
      dependents.get(dep)?.push(entry.key);
    }
  }

  const queue: string[] = [];
  for (const [key, degree] of inDegree) {
    if (degree === 0) queue.push(key);
  }

  const sorted: T[] = [];
  while (queue.length > 0) {
    const key = queue.shift();
    if (key === undefined) break;
    const entry = byKey.get(key);
    if (entry) sorted.push(entry);
    for (const dependent of dependents.get(key) ?? []) {
      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) queue.push(dependent);
    }
  }

  if (sorted.length !== entries.length) {
    const cycle = [...inDegree.entries()].filter(([_, d]) => d > 0).map(([key]) => key);
    throw new WorkflowError(
      "CYCLE_DETECTED",
      `Dependency cycle detected involving: ${cycle.join(", ")}`,
      { cycle },
    );
  }

  return sorted;
}
