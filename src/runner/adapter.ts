import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage } from "../errors.js";
import type { Candidate, Task } from "../plan/types.js";
import type { GenerationCapability } from "./capability.js";
import { parseResponse } from "./parse.js";
import { buildTaskPrompt } from "./prompt.js";
import type { ProposalHistory } from "./prompt.js";

export type GenerationFailure =
  /** The capability answered, but not in the expected envelope. */
  | { kind: "malformed_response"; message: string }
  /** The capability kept failing after every retry. */
  | { kind: "adapter_unavailable"; message: string; calls: number }
  /** The run was cancelled while waiting. */
  | { kind: "aborted"; message: string };

export type ProposalResult =
  | { success: true; data: Candidate }
  | { success: false; error: GenerationFailure };

export interface GenerationAdapterOptions {
  capability: GenerationCapability;
  /** Extra capability calls after the first failure. */
  maxAdapterRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Called before each backoff sleep. */
  onRetry?: (info: { taskId: string; retry: number; delayMs: number; error: string }) => void;
}

/** Exponential backoff: base * 2^(retry-1), capped. */
export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** (retry - 1), maxMs);
}

/**
 * Wraps the generation capability: builds the prompt, retries infrastructure
 * failures with backoff, and parses the response into a candidate.
 */
export class GenerationAdapter {
  private readonly opts: GenerationAdapterOptions;

  constructor(opts: GenerationAdapterOptions) {
    this.opts = opts;
  }

  async propose(task: Task, history: ProposalHistory, signal?: AbortSignal): Promise<ProposalResult> {
    const { prompt, context } = buildTaskPrompt(task, history);
    const { capability, maxAdapterRetries, backoffBaseMs, backoffMaxMs, onRetry } = this.opts;

    let lastError = "";
    for (let call = 1; call <= maxAdapterRetries + 1; call++) {
      if (signal?.aborted) return aborted();

      if (call > 1) {
        const retry = call - 1;
        const delayMs = backoffDelay(retry, backoffBaseMs, backoffMaxMs);
        onRetry?.({ taskId: task.id, retry, delayMs, error: lastError });
        try {
          await sleep(delayMs, undefined, { signal });
        } catch (err) {
          if (signal?.aborted) return aborted();
          throw err;
        }
      }

      let raw: string;
      try {
        raw = await capability.generate(prompt, context, signal);
      } catch (err) {
        if (signal?.aborted) return aborted();
        lastError = errorMessage(err);
        continue;
      }

      const parsed = parseResponse(task, raw);
      if (!parsed.success) {
        return { success: false, error: { kind: "malformed_response", message: parsed.error } };
      }
      return parsed;
    }

    return {
      success: false,
      error: {
        kind: "adapter_unavailable",
        message: lastError,
        calls: maxAdapterRetries + 1,
      },
    };
  }
}

function aborted(): ProposalResult {
  return { success: false, error: { kind: "aborted", message: "run cancelled" } };
}
