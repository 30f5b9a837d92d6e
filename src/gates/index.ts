import type { Candidate, RejectionCode, Task, TaskOutput } from "../plan/types.js";
import { RULES, resolveCandidatePath } from "./rules.js";
import type { ValidationContext } from "./rules.js";

export type Verdict =
  | { verdict: "accepted"; output: TaskOutput }
  | { verdict: "rejected"; code: RejectionCode; reason: string };

/**
 * Check a candidate against the structural rules. Rules run in order and the
 * first failure short-circuits. Pure: no I/O, no generation calls.
 */
export function validateCandidate(
  task: Task,
  candidate: Candidate,
  ctx: ValidationContext,
): Verdict {
  for (const rule of RULES) {
    const rejection = rule(task, candidate, ctx);
    if (rejection) {
      return { verdict: "rejected", ...rejection };
    }
  }

  const path = resolveCandidatePath(candidate.path, ctx.projectRoot);
  switch (candidate.kind) {
    case "directory":
      return {
        verdict: "accepted",
        output: { kind: "directory", path, children: candidate.children.map((c) => c.trim()) },
      };
    case "file":
    case "content-stub":
      return {
        verdict: "accepted",
        output: { kind: candidate.kind, path, content: candidate.content },
      };
  }
}

export type { ValidationContext, ValidationRule, Rejection } from "./rules.js";
export { RULES, resolveCandidatePath } from "./rules.js";
