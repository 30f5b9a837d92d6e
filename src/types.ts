import type { z } from "zod";
import type { stubsmithConfigSchema } from "./config/schema.js";
import type { ProjectPlan, RejectionCode, TaskStatus } from "./plan/types.js";

/** Configuration from .stubsmith.json, defaults applied. */
export type StubsmithConfig = z.output<typeof stubsmithConfigSchema>;

/** Outcome of a run. */
export type PlanResult =
  | { kind: "completed"; plan: ProjectPlan }
  | {
      kind: "partially-blocked";
      /** Tasks excluded because a dependency failed. */
      blocked: string[];
      /** Tasks that used up their attempts. */
      failed: string[];
      plan: ProjectPlan;
    }
  | {
      kind: "deadlocked";
      /** Non-terminal tasks that can never become ready. */
      stuck: string[];
      plan: ProjectPlan;
    }
  | {
      kind: "cancelled";
      /** In-flight tasks reverted to pending. */
      reverted: string[];
      plan: ProjectPlan;
    };

export type PlanResultKind = PlanResult["kind"];

/** Progress notifications emitted by the engine. */
export type RunEvent =
  | { type: "plan-ready"; tasks: number; resumed: boolean }
  | { type: "transition"; taskId: string; from: TaskStatus; to: TaskStatus; attempt: number }
  | { type: "rejected"; taskId: string; attempt: number; code: RejectionCode; reason: string }
  | { type: "adapter-retry"; taskId: string; retry: number; delayMs: number; error: string }
  | { type: "escalated"; taskId: string; blocked: string[] }
  | { type: "materialized"; taskId: string; path: string; dryRun: boolean }
  | { type: "finished"; result: PlanResultKind; reportPath: string | null };
