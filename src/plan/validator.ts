import type { TaskSpec } from "./types.js";

const WHITE = 0, GRAY = 1, BLACK = 2;

/** Anything with an ID and dependency edges. */
interface DependencyNode {
  id: string;
  dependsOn?: string[];
}

/**
 * Detect a cycle in the task dependency graph.
 * Returns the cycle path if found (first node repeated at the end), null if acyclic.
 * Edges to unknown IDs are ignored here; see findDanglingEdges.
 */
export function detectCycles(nodes: DependencyNode[]): string[] | null {
  const color = new Map<string, number>();
  const edges = new Map<string, string[]>();

  for (const node of nodes) {
    color.set(node.id, WHITE);
    edges.set(node.id, node.dependsOn ?? []);
  }

  for (const node of nodes) {
    if (color.get(node.id) === WHITE) {
      const cycle = dfsVisit(node.id, color, (id) => edges.get(id) ?? []);
      if (cycle) return cycle;
    }
  }
  return null;
}

/**
 * DFS visit with gray-node cycle detection.
 * Returns the cycle path when a back-edge is found, null otherwise.
 */
function dfsVisit(
  node: string,
  color: Map<string, number>,
  getNeighbors: (id: string) => string[],
  path: string[] = [],
): string[] | null {
  color.set(node, GRAY);
  path.push(node);

  for (const neighbor of getNeighbors(node)) {
    if (color.get(neighbor) === GRAY) {
      const cycleStart = path.indexOf(neighbor);
      return [...path.slice(cycleStart), neighbor];
    }
    if (color.has(neighbor) && color.get(neighbor) !== BLACK) {
      const cycle = dfsVisit(neighbor, color, getNeighbors, path);
      if (cycle) return cycle;
    }
  }

  path.pop();
  color.set(node, BLACK);
  return null;
}

/** Find dependency edges that point at IDs not present in the plan. */
export function findDanglingEdges(
  nodes: DependencyNode[],
): Array<{ from: string; to: string }> {
  const ids = new Set(nodes.map((n) => n.id));
  const dangling: Array<{ from: string; to: string }> = [];

  for (const node of nodes) {
    for (const dep of node.dependsOn ?? []) {
      if (!ids.has(dep)) {
        dangling.push({ from: node.id, to: dep });
      }
    }
  }

  return dangling;
}

/** Return IDs declared more than once, in first-seen order. */
export function findDuplicateIds(specs: TaskSpec[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const spec of specs) {
    if (seen.has(spec.id) && !duplicates.includes(spec.id)) {
      duplicates.push(spec.id);
    }
    seen.add(spec.id);
  }
  return duplicates;
}
