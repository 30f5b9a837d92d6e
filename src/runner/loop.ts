import { posix } from "node:path";
import { validateCandidate } from "../gates/index.js";
import type { Verdict } from "../gates/index.js";
import type { ProjectFs } from "../materialize/fs.js";
import { buildTaskContext, normalizeProjectPath } from "../plan/query.js";
import type { Task } from "../plan/types.js";
import type { PlanTracker, Settlement } from "../scheduler/tracker.js";
import type { GenerationAdapter, GenerationFailure, ProposalResult } from "./adapter.js";

export interface FeedbackLoopOptions {
  tracker: PlanTracker;
  adapter: GenerationAdapter;
  fs: ProjectFs;
  /** Absolute output directory, used to normalize absolute candidate paths. */
  projectRoot: string;
  signal?: AbortSignal;
}

export type TaskOutcome = Settlement | { outcome: "cancelled"; taskId: string };

/** Turn an adapter failure into the rejection the next attempt will see. */
export function failureVerdict(
  error: Exclude<GenerationFailure, { kind: "aborted" }>,
): Extract<Verdict, { verdict: "rejected" }> {
  switch (error.kind) {
    case "malformed_response":
      return {
        verdict: "rejected",
        code: "malformed_response",
        reason: `response was not parseable (${error.message}); reply with the JSON envelope only`,
      };
    case "adapter_unavailable":
      return {
        verdict: "rejected",
        code: "adapter_unavailable",
        reason: `generation failed after ${error.calls} call(s): ${error.message}`,
      };
  }
}

function judgeProposal(
  proposal: ProposalResult,
  projectRoot: string,
): (task: Task, accepted: ReadonlySet<string>) => Verdict {
  return (task, accepted) => {
    if (!proposal.success) {
      if (proposal.error.kind === "aborted") {
        throw new Error(`Aborted proposal for ${task.id} reached validation`);
      }
      return failureVerdict(proposal.error);
    }
    return validateCandidate(task, proposal.data, { projectRoot, acceptedPaths: accepted });
  };
}

/**
 * Drive one task through propose → validate until it is accepted or out of
 * attempts. Every attempt sees the full rejection history. A cancelled run
 * leaves the task in flight; the caller reverts it.
 */
export async function processTask(taskId: string, opts: FeedbackLoopOptions): Promise<TaskOutcome> {
  const { tracker, adapter, fs, projectRoot, signal } = opts;

  for (;;) {
    if (signal?.aborted) return { outcome: "cancelled", taskId };

    const task = await tracker.begin(taskId);
    const context = buildTaskContext(tracker.snapshot(), taskId);
    context.existing = fs.listChildren(posix.dirname(normalizeProjectPath(task.path)));

    const proposal = await adapter.propose(task, { feedback: task.feedback, context }, signal);
    if (signal?.aborted || (!proposal.success && proposal.error.kind === "aborted")) {
      return { outcome: "cancelled", taskId };
    }

    const settlement = await tracker.settle(taskId, judgeProposal(proposal, projectRoot));
    if (settlement.outcome !== "retry") return settlement;
  }
}
