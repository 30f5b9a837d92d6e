import { ConfigurationError, InvalidDependencyError } from "../errors.js";
import { TASK_KINDS } from "./schemas.js";
import type {
  ProjectPlan,
  Task,
  TaskKind,
  TaskPhase,
  TaskSpec,
  TaskStatus,
} from "./types.js";
import { detectCycles, findDanglingEdges, findDuplicateIds } from "./validator.js";

/**
 * Allowed status moves. Guards on retry budget and readiness live in the tracker.
 * pending → failed only retires a task whose budget was lowered on resume.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["in-progress", "blocked", "failed"],
  "in-progress": ["awaiting-validation", "pending"],
  "awaiting-validation": ["accepted", "failed", "pending"],
  failed: ["in-progress"],
  accepted: [],
  blocked: [],
};

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Map a task status onto the feedback loop's per-task phase. */
export function phaseOf(status: TaskStatus): TaskPhase {
  switch (status) {
    case "pending":
      return "NotStarted";
    case "in-progress":
      return "Proposing";
    case "awaiting-validation":
      return "Validating";
    case "accepted":
      return "Accepted";
    case "failed":
      return "Rejected";
    case "blocked":
      return "Blocked";
  }
}

export function getTask(plan: ProjectPlan, id: string): Task | undefined {
  return plan.tasks.find((t) => t.id === id);
}

/** True when every dependency of the task is accepted. */
export function isReady(task: Task, plan: ProjectPlan): boolean {
  return task.dependsOn.every((depId) => getTask(plan, depId)?.status === "accepted");
}

/** True while the task has attempts left in its budget. */
export function canRetry(task: Task, maxAttempts: number): boolean {
  return task.attempts < maxAttempts;
}

/** Accepted, blocked, or failed with no attempts left. */
export function isTerminal(task: Task, maxAttempts: number): boolean {
  if (task.status === "accepted" || task.status === "blocked") return true;
  return task.status === "failed" && !canRetry(task, maxAttempts);
}

/** Create a fresh pending task from a validated spec. */
export function createTask(spec: TaskSpec & { kind: TaskKind }): Task {
  return {
    id: spec.id,
    description: spec.description,
    kind: spec.kind,
    path: spec.path,
    status: "pending",
    attempts: 0,
    dependsOn: [...new Set(spec.dependsOn ?? [])],
    feedback: [],
  };
}

/**
 * Build a plan from task specs.
 *
 * Throws ConfigurationError for an invalid budget, unknown kinds, duplicate
 * IDs or a dependency cycle, and InvalidDependencyError when a task depends
 * on an ID outside the plan.
 */
export function createPlan(
  goal: string,
  specs: TaskSpec[],
  maxAttempts: number,
): ProjectPlan {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`, {
      maxAttempts,
    });
  }
  if (specs.length === 0) {
    throw new ConfigurationError("A plan needs at least one task");
  }

  const tasks: Task[] = [];
  for (const spec of specs) {
    const kind = spec.kind;
    if (!isTaskKind(kind)) {
      throw new ConfigurationError(
        `Task "${spec.id}" has invalid kind "${kind}" (expected one of: ${TASK_KINDS.join(", ")})`,
        { id: spec.id, kind },
      );
    }
    tasks.push(createTask({ ...spec, kind }));
  }

  const duplicates = findDuplicateIds(specs);
  if (duplicates.length > 0) {
    throw new ConfigurationError(`Duplicate task IDs: ${duplicates.join(", ")}`, {
      duplicates,
    });
  }

  const dangling = findDanglingEdges(tasks);
  if (dangling.length > 0) {
    throw new InvalidDependencyError(dangling[0].from, dangling[0].to);
  }

  const cycle = detectCycles(tasks);
  if (cycle) {
    throw new ConfigurationError(`Task dependency cycle: ${cycle.join(" → ")}`, { cycle });
  }

  return { goal, maxAttempts, tasks, acceptanceOrder: [] };
}
