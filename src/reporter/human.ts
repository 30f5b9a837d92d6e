import { summarizePlan } from "../plan/query.js";
import type { ProjectPlan, Task } from "../plan/types.js";
import type { Checkpoint } from "../state/checkpoint.js";
import type { PlanResult, PlanResultKind } from "../types.js";

const RESULT_LABELS: Record<PlanResultKind, string> = {
  completed: "COMPLETED",
  "partially-blocked": "PARTIALLY BLOCKED",
  deadlocked: "DEADLOCKED",
  cancelled: "CANCELLED",
};

function checkbox(task: Task): string {
  switch (task.status) {
    case "accepted":
      return "[x]";
    case "blocked":
      return "[-]";
    default:
      return "[ ]";
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function taskLine(task: Task): string {
  return `- ${checkbox(task)} ${task.id}: ${task.kind} \`${task.path}\` ${task.status} (${plural(task.attempts, "attempt")})`;
}

function idList(title: string, ids: readonly string[]): string[] {
  if (ids.length === 0) return [];
  return [`### ${title}`, ...ids.map((id) => `- ${id}`), ""];
}

function rejectionSection(plan: ProjectPlan): string[] {
  const withFeedback = plan.tasks.filter((t) => t.feedback.length > 0);
  if (withFeedback.length === 0) return [];

  const lines = ["### Rejections"];
  for (const task of withFeedback) {
    lines.push(`#### ${task.id}`);
    for (const record of task.feedback) {
      lines.push(`- Attempt ${record.attempt} [${record.code}]: ${record.reason}`);
    }
    lines.push("");
  }
  return lines;
}

/** Markdown report for a finished run. */
export function formatRunReport(result: PlanResult): string {
  const { plan } = result;
  const summary = summarizePlan(plan);
  const lines: string[] = [];

  lines.push("## Run Report");
  lines.push(`**Goal:** ${plan.goal}`);
  lines.push(`**Result:** ${RESULT_LABELS[result.kind]}`);
  lines.push(`**Accepted:** ${summary.accepted}/${summary.total}`);
  lines.push("");

  lines.push("### Tasks");
  for (const task of plan.tasks) {
    lines.push(taskLine(task));
  }
  lines.push("");

  switch (result.kind) {
    case "completed":
      break;
    case "partially-blocked":
      lines.push(...idList("Failed", result.failed));
      lines.push(...idList("Blocked", result.blocked));
      break;
    case "deadlocked":
      lines.push(...idList("Stuck", result.stuck));
      break;
    case "cancelled":
      lines.push(...idList("Reverted to pending", result.reverted));
      break;
  }

  lines.push(...rejectionSection(plan));
  return lines.join("\n").trimEnd();
}

/** Short summary of a checkpoint for `stubsmith status`. */
export function formatStatus(checkpoint: Checkpoint): string {
  const { plan } = checkpoint;
  const s = summarizePlan(plan);
  const lines = [
    `Goal: ${plan.goal}`,
    `Updated: ${checkpoint.updatedAt}`,
    `Tasks: ${s.total} total, ${s.accepted} accepted, ${s.pending} pending, ${s.failed} failed, ${s.blocked} blocked, ${s["in-progress"] + s["awaiting-validation"]} in flight`,
    "",
  ];
  for (const task of plan.tasks) {
    lines.push(taskLine(task));
  }
  return lines.join("\n");
}

/** Everything recorded about one task, for `stubsmith status <task-id>`. */
export function formatTaskDetail(task: Task, maxAttempts: number): string {
  const lines = [
    `## Task ${task.id}`,
    `**Kind:** ${task.kind} \`${task.path}\``,
    `**Status:** ${task.status} (${task.attempts}/${maxAttempts} attempts)`,
    `**Depends on:** ${task.dependsOn.length > 0 ? task.dependsOn.join(", ") : "none"}`,
  ];
  if (task.description) lines.push(`**Description:** ${task.description}`);
  if (task.acceptedAt) lines.push(`**Accepted:** ${task.acceptedAt}`);
  if (task.materializedAt) lines.push(`**Written:** ${task.materializedAt}`);
  lines.push("");

  if (task.feedback.length === 0) {
    lines.push("No rejections.");
    return lines.join("\n");
  }
  lines.push("### Rejections");
  for (const record of task.feedback) {
    lines.push(`- Attempt ${record.attempt} [${record.code}] ${record.at}: ${record.reason}`);
  }
  return lines.join("\n");
}
