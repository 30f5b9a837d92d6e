import { IllegalTransitionError } from "../errors.js";
import type { Verdict } from "../gates/index.js";
import { canRetry, canTransition, getTask, isReady } from "../plan/model.js";
import {
  acceptedPaths,
  exhaustedTasks,
  findReady,
  isPlanComplete,
  transitiveDependents,
} from "../plan/query.js";
import type { ProjectPlan, Task, TaskStatus } from "../plan/types.js";
import { checkPlanGraph } from "../state/checkpoint.js";
import type { CheckpointStore } from "../state/checkpoint.js";
import type { RunEvent } from "../types.js";

export interface TrackerOptions {
  store: CheckpointStore;
  onEvent?: (event: RunEvent) => void;
  /** Clock for checkpoint and audit timestamps. */
  now?: () => Date;
}

/** Outcome of judging one proposal. */
export type Settlement =
  | { outcome: "accepted"; task: Task }
  | { outcome: "retry"; task: Task }
  | { outcome: "exhausted"; task: Task; blocked: string[] };

/** Decides a verdict for the task under validation, given the accepted paths at that moment. */
export type Judge = (task: Task, acceptedPaths: ReadonlySet<string>) => Verdict;

const IN_FLIGHT: readonly TaskStatus[] = ["in-progress", "awaiting-validation"];

/**
 * Sole owner of a project plan. Every mutation runs through a single-writer
 * queue and is followed by a checkpoint write, so the persisted snapshot
 * never diverges from the in-memory plan.
 */
export class PlanTracker {
  private readonly plan: ProjectPlan;
  private readonly store: CheckpointStore;
  private readonly onEvent: (event: RunEvent) => void;
  private readonly now: () => Date;
  private readonly createdAt: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(plan: ProjectPlan, opts: TrackerOptions, createdAt?: string) {
    this.plan = structuredClone(plan);
    this.store = opts.store;
    this.onEvent = opts.onEvent ?? (() => {});
    this.now = opts.now ?? (() => new Date());
    this.createdAt = createdAt ?? this.now().toISOString();
  }

  /**
   * Rehydrate from the store's checkpoint. Returns null when there is none;
   * throws ConfigurationError when its task graph is broken.
   * In-flight tasks go back to pending and escalation is re-applied, so a
   * crashed or cancelled run resumes from a consistent state.
   */
  static async resume(
    opts: TrackerOptions,
    overrides: { maxAttempts?: number } = {},
  ): Promise<PlanTracker | null> {
    const checkpoint = await opts.store.load();
    if (!checkpoint) return null;

    const plan = checkpoint.plan;
    checkPlanGraph(plan);
    if (overrides.maxAttempts !== undefined) {
      plan.maxAttempts = overrides.maxAttempts;
    }
    const tracker = new PlanTracker(plan, opts, checkpoint.createdAt);
    await tracker.recover();
    return tracker;
  }

  // ── Reads (always copies) ───────────────────────────────────────────

  snapshot(): ProjectPlan {
    return structuredClone(this.plan);
  }

  get maxAttempts(): number {
    return this.plan.maxAttempts;
  }

  getTask(id: string): Task | undefined {
    const task = getTask(this.plan, id);
    return task ? structuredClone(task) : undefined;
  }

  /** Next schedulable task: lowest dependency depth, then insertion order. */
  nextReady(exclude?: ReadonlySet<string>): Task | undefined {
    const [next] = findReady(this.plan, exclude);
    return next ? structuredClone(next) : undefined;
  }

  isComplete(): boolean {
    return isPlanComplete(this.plan);
  }

  /** Nothing ready, nothing in flight, and not complete. */
  isDeadlocked(): boolean {
    if (this.isComplete()) return false;
    if (this.plan.tasks.some((t) => IN_FLIGHT.includes(t.status))) return false;
    return findReady(this.plan).length === 0;
  }

  acceptedPaths(): Set<string> {
    return acceptedPaths(this.plan);
  }

  /** Accepted tasks whose output has not been written yet, in acceptance order. */
  pendingMaterialization(): Task[] {
    const result: Task[] = [];
    for (const id of this.plan.acceptanceOrder) {
      const task = getTask(this.plan, id);
      if (task && task.status === "accepted" && !task.materializedAt) {
        result.push(structuredClone(task));
      }
    }
    return result;
  }

  // ── Writes (serialized) ─────────────────────────────────────────────

  /** Persist the current plan without changing it. */
  persist(): Promise<void> {
    return this.exclusive(() => this.save());
  }

  /** pending | retryable failed → in-progress. Consumes one attempt. */
  begin(id: string): Promise<Task> {
    return this.exclusive(async () => {
      const task = this.require(id);
      if (!canRetry(task, this.plan.maxAttempts)) {
        throw new IllegalTransitionError(id, task.status, "in-progress", "no attempts left");
      }
      if (!isReady(task, this.plan)) {
        throw new IllegalTransitionError(id, task.status, "in-progress", "dependencies not accepted");
      }
      await this.transition(task, "in-progress", () => {
        task.attempts += 1;
      });
      return structuredClone(task);
    });
  }

  /**
   * in-progress → awaiting-validation → accepted | failed, in one queued
   * section so the judge sees a stable set of accepted paths. A rejection
   * that exhausts the budget blocks every transitive dependent.
   */
  settle(id: string, judge: Judge): Promise<Settlement> {
    return this.exclusive(async () => {
      const task = this.require(id);
      await this.transition(task, "awaiting-validation");

      const verdict = judge(structuredClone(task), acceptedPaths(this.plan));
      const at = this.now().toISOString();

      if (verdict.verdict === "accepted") {
        await this.transition(task, "accepted", () => {
          task.output = verdict.output;
          task.acceptedAt = at;
          this.plan.acceptanceOrder.push(task.id);
        });
        return { outcome: "accepted", task: structuredClone(task) };
      }

      await this.transition(task, "failed", () => {
        task.feedback.push({
          attempt: task.attempts,
          code: verdict.code,
          reason: verdict.reason,
          at,
        });
      });
      this.onEvent({
        type: "rejected",
        taskId: id,
        attempt: task.attempts,
        code: verdict.code,
        reason: verdict.reason,
      });

      if (canRetry(task, this.plan.maxAttempts)) {
        return { outcome: "retry", task: structuredClone(task) };
      }
      const blocked = await this.escalate(task.id);
      return { outcome: "exhausted", task: structuredClone(task), blocked };
    });
  }

  /** Record that an accepted task's output has been written. */
  markMaterialized(id: string): Promise<void> {
    return this.exclusive(async () => {
      const task = this.require(id);
      task.materializedAt = this.now().toISOString();
      await this.save();
    });
  }

  /**
   * in-progress | awaiting-validation → pending. The abandoned attempt is
   * returned to the budget. Returns the reverted IDs.
   */
  revertInFlight(): Promise<string[]> {
    return this.exclusive(() => this.revertUnlocked());
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async recover(): Promise<void> {
    await this.exclusive(async () => {
      await this.revertUnlocked();
      await this.retireOverBudget();
      for (const id of exhaustedTasks(this.plan)) {
        await this.escalate(id);
      }
      await this.save();
    });
  }

  private async revertUnlocked(): Promise<string[]> {
    const reverted: string[] = [];
    for (const task of this.plan.tasks) {
      if (!IN_FLIGHT.includes(task.status)) continue;
      await this.transition(task, "pending", () => {
        task.attempts = Math.max(0, task.attempts - 1);
      });
      reverted.push(task.id);
    }
    return reverted;
  }

  /** pending → failed for tasks the current budget no longer covers. */
  private async retireOverBudget(): Promise<void> {
    for (const task of this.plan.tasks) {
      if (task.status === "pending" && !canRetry(task, this.plan.maxAttempts)) {
        await this.transition(task, "failed");
      }
    }
  }

  /** Block every pending transitive dependent of a task that ran out of attempts. */
  private async escalate(id: string): Promise<string[]> {
    const blocked: string[] = [];
    for (const depId of transitiveDependents(this.plan, id)) {
      const dependent = this.require(depId);
      if (dependent.status !== "pending") continue;
      await this.transition(dependent, "blocked");
      blocked.push(depId);
    }
    if (blocked.length > 0) {
      this.onEvent({ type: "escalated", taskId: id, blocked });
    }
    return blocked;
  }

  private async transition(task: Task, to: TaskStatus, mutate?: () => void): Promise<void> {
    const from = task.status;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(task.id, from, to);
    }
    mutate?.();
    task.status = to;
    await this.save();
    this.onEvent({ type: "transition", taskId: task.id, from, to, attempt: task.attempts });
  }

  private require(id: string): Task {
    const task = getTask(this.plan, id);
    if (!task) throw new Error(`Task not found in plan: ${id}`);
    return task;
  }

  private async save(): Promise<void> {
    await this.store.save({
      createdAt: this.createdAt,
      updatedAt: this.now().toISOString(),
      plan: structuredClone(this.plan),
    });
  }

  /** Single-writer queue: each call starts after the previous one settles. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
