import { posix } from "node:path";
import { canRetry, getTask, isReady, isTerminal } from "./model.js";
import type { ProjectPlan, Task, TaskOutput, TaskStatus } from "./types.js";

// ── Helpers ──────────────────────────────────────────────────────────

/** Normalize a project-relative path for comparison: posix separators, no ./ or trailing /. */
export function normalizeProjectPath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.replace(/^\.\//, "").replace(/\/+$/, "") || ".";
}

/**
 * Longest dependency chain below each task (roots have depth 0).
 * Assumes an acyclic plan; a cycle would already have failed construction.
 */
export function dependencyDepths(plan: ProjectPlan): Map<string, number> {
  const depths = new Map<string, number>();

  function depth(task: Task): number {
    const known = depths.get(task.id);
    if (known !== undefined) return known;
    let max = -1;
    for (const depId of task.dependsOn) {
      const dep = getTask(plan, depId);
      if (dep) max = Math.max(max, depth(dep));
    }
    depths.set(task.id, max + 1);
    return max + 1;
  }

  for (const task of plan.tasks) depth(task);
  return depths;
}

// ── Query Functions ──────────────────────────────────────────────────

/**
 * Returns tasks that can be proposed now:
 * - status "pending" or "failed", with attempts left
 * - every dependency "accepted"
 * - not in `exclude` (tasks a worker already holds)
 *
 * Sorted by: dependency depth asc, then insertion order.
 */
export function findReady(plan: ProjectPlan, exclude?: ReadonlySet<string>): Task[] {
  const depths = dependencyDepths(plan);
  const ready: Array<{ task: Task; order: number }> = [];

  plan.tasks.forEach((task, order) => {
    if (exclude?.has(task.id)) return;
    const schedulable = task.status === "pending" || task.status === "failed";
    if (!schedulable || !canRetry(task, plan.maxAttempts)) return;
    if (!isReady(task, plan)) return;
    ready.push({ task, order });
  });

  ready.sort((a, b) => {
    const da = depths.get(a.task.id) ?? 0;
    const db = depths.get(b.task.id) ?? 0;
    if (da !== db) return da - db;
    return a.order - b.order;
  });

  return ready.map((r) => r.task);
}

/** BFS over reverse dependency edges. Returns IDs in plan order, excluding the start. */
export function transitiveDependents(plan: ProjectPlan, taskId: string): string[] {
  const visited = new Set<string>();
  const queue = [taskId];
  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    for (const task of plan.tasks) {
      if (task.dependsOn.includes(current) && !visited.has(task.id)) {
        visited.add(task.id);
        queue.push(task.id);
      }
    }
  }
  return plan.tasks.filter((t) => visited.has(t.id)).map((t) => t.id);
}

/**
 * DFS over dependency edges. Returns IDs in topological order
 * (dependencies first), excluding the task itself.
 */
export function transitiveDependencies(plan: ProjectPlan, taskId: string): string[] {
  const result: string[] = [];
  const visited = new Set<string>();

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    for (const depId of getTask(plan, id)?.dependsOn ?? []) {
      visit(depId);
    }
    result.push(id);
  }

  visit(taskId);
  return result.filter((id) => id !== taskId);
}

/** Normalized output paths of every accepted task. */
export function acceptedPaths(plan: ProjectPlan): Set<string> {
  const paths = new Set<string>();
  for (const task of plan.tasks) {
    if (task.status === "accepted" && task.output) {
      paths.add(normalizeProjectPath(task.output.path));
    }
  }
  return paths;
}

/** True when every task is terminal. */
export function isPlanComplete(plan: ProjectPlan): boolean {
  return plan.tasks.every((t) => isTerminal(t, plan.maxAttempts));
}

/** IDs of tasks in the given status, in plan order. */
export function idsWithStatus(plan: ProjectPlan, status: TaskStatus): string[] {
  return plan.tasks.filter((t) => t.status === status).map((t) => t.id);
}

/** Failed tasks that have used up their attempts. */
export function exhaustedTasks(plan: ProjectPlan): string[] {
  return plan.tasks
    .filter((t) => t.status === "failed" && !canRetry(t, plan.maxAttempts))
    .map((t) => t.id);
}

export type PlanSummary = Record<TaskStatus, number> & { total: number };

/** Count tasks by status. */
export function summarizePlan(plan: ProjectPlan): PlanSummary {
  const summary: PlanSummary = {
    total: plan.tasks.length,
    pending: 0,
    "in-progress": 0,
    "awaiting-validation": 0,
    accepted: 0,
    failed: 0,
    blocked: 0,
  };
  for (const task of plan.tasks) {
    summary[task.status]++;
  }
  return summary;
}

/** Context handed to the generation adapter alongside the task itself. */
export interface TaskContext {
  goal: string;
  /** Accepted outputs of all transitive dependencies, dependencies first. */
  ancestors: TaskOutput[];
  /** Other tasks planned in the same parent directory. */
  siblings: Array<{ id: string; kind: Task["kind"]; path: string }>;
  /** Entries already present on disk in the task's parent directory. */
  existing: string[];
}

/** Gather plan-level context for a task. `existing` is filled by the caller. */
export function buildTaskContext(plan: ProjectPlan, taskId: string): TaskContext {
  const task = getTask(plan, taskId);
  const ancestors: TaskOutput[] = [];
  for (const depId of transitiveDependencies(plan, taskId)) {
    const output = getTask(plan, depId)?.output;
    if (output) ancestors.push(output);
  }

  const parent = task ? posix.dirname(normalizeProjectPath(task.path)) : ".";
  const siblings = plan.tasks
    .filter((t) => t.id !== taskId && posix.dirname(normalizeProjectPath(t.path)) === parent)
    .map((t) => ({ id: t.id, kind: t.kind, path: t.path }));

  return { goal: plan.goal, ancestors, siblings, existing: [] };
}
