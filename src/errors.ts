import type { TaskStatus } from "./plan/types.js";

/**
 * Fatal setup problem: cyclic dependencies, unknown task kinds, a broken
 * config or plan file. Raised before any task generation call.
 */
export class ConfigurationError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "ConfigurationError";
    this.context = context;
  }
}

/** A task references a dependency that is not part of the same plan. */
export class InvalidDependencyError extends Error {
  readonly taskId: string;
  readonly dependencyId: string;

  constructor(taskId: string, dependencyId: string) {
    super(`Task "${taskId}" depends on non-existent task "${dependencyId}"`);
    this.name = "InvalidDependencyError";
    this.taskId = taskId;
    this.dependencyId = dependencyId;
  }
}

/** A status change outside the task state machine was requested. */
export class IllegalTransitionError extends Error {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus, detail?: string) {
    super(
      `Task "${taskId}" cannot move from ${from} to ${to}${detail ? `: ${detail}` : ""}`,
    );
    this.name = "IllegalTransitionError";
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

/** Narrow an unknown thrown value to a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
