import { summarizePlan } from "../plan/query.js";
import type { Checkpoint } from "../state/checkpoint.js";
import type { PlanResult } from "../types.js";

export function formatJsonReport(result: PlanResult): string {
  return JSON.stringify({ ...result, summary: summarizePlan(result.plan) }, null, 2);
}

export function formatJsonStatus(checkpoint: Checkpoint): string {
  return JSON.stringify(
    { ...checkpoint, summary: summarizePlan(checkpoint.plan) },
    null,
    2,
  );
}
