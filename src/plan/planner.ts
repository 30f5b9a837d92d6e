import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as yamlParse } from "yaml";
import { ConfigurationError, InvalidDependencyError, errorMessage } from "../errors.js";
import type { GenerationCapability } from "../runner/capability.js";
import { extractJsonObject, stripCodeFences } from "../runner/parse.js";
import { createPlan } from "./model.js";
import { TASK_KINDS, planFileSchema } from "./schemas.js";
import type { PlanFile } from "./schemas.js";
import type { ProjectPlan } from "./types.js";

export interface DecomposeOptions {
  /** Planning attempts, and the per-task budget of the resulting plan. */
  maxAttempts: number;
  signal?: AbortSignal;
}

type PlanParse = { success: true; data: PlanFile } | { success: false; error: string };

// ── Prompt ───────────────────────────────────────────────────────────

export function buildPlanningPrompt(goal: string, feedback: readonly string[]): string {
  const lines = [
    "# Plan a project scaffold",
    "",
    "## Goal",
    goal,
    "",
    "## Instructions",
    "Break the goal into tasks. Each task produces exactly one artifact:",
    "- `directory`: a folder, declared by its immediate child names",
    "- `file`: a complete file",
    "- `content-stub`: a placeholder or config fragment",
    "",
    "Paths are relative to the project root. A task that needs another task's",
    "output lists that task's id in `dependsOn`. No cycles.",
  ];

  if (feedback.length > 0) {
    lines.push("", "## Previous attempts");
    feedback.forEach((f, i) => lines.push(`- Attempt ${i + 1} rejected: ${f}`));
  }

  lines.push(
    "",
    "## Response format",
    "Reply with ONLY a JSON object, optionally inside a ```json code fence:",
    '{"tasks": [{"id": "<id>", "description": "<what>", "kind": "<kind>", "path": "<path>", "dependsOn": ["<id>"]}]}',
    `- \`kind\` is one of: ${TASK_KINDS.join(", ")}`,
  );
  return lines.join("\n");
}

// ── Parsing ──────────────────────────────────────────────────────────

export function parsePlanResponse(raw: string): PlanParse {
  const body = extractJsonObject(stripCodeFences(raw));
  if (body === null) {
    return { success: false, error: "response did not contain a JSON object" };
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return { success: false, error: `response JSON is invalid: ${errorMessage(err)}` };
  }

  const result = planFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      success: false,
      error: `task list has the wrong shape at ${issue.path.join(".") || "(root)"}: ${issue.message}`,
    };
  }
  return { success: true, data: result.data };
}

// ── Entry Points ─────────────────────────────────────────────────────

/**
 * Ask the generator for a task list and build a plan from it.
 *
 * Unparseable lists, generation errors and references to unknown tasks are
 * fed back into the next planning prompt. Cycles and unknown kinds fail
 * immediately. Throws ConfigurationError once attempts run out.
 */
export async function decomposeGoal(
  goal: string,
  capability: GenerationCapability,
  opts: DecomposeOptions,
): Promise<ProjectPlan> {
  const feedback: string[] = [];

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    let raw: string;
    try {
      raw = await capability.generate(buildPlanningPrompt(goal, feedback), "", opts.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw err;
      feedback.push(`generation failed: ${errorMessage(err)}`);
      continue;
    }

    const parsed = parsePlanResponse(raw);
    if (!parsed.success) {
      feedback.push(parsed.error);
      continue;
    }

    try {
      return createPlan(goal, parsed.data.tasks, opts.maxAttempts);
    } catch (err) {
      if (err instanceof InvalidDependencyError) {
        feedback.push(err.message);
        continue;
      }
      throw err;
    }
  }

  throw new ConfigurationError(
    `Could not decompose goal after ${opts.maxAttempts} attempt(s): ${feedback.join("; ")}`,
    { feedback },
  );
}

/** Read a task list from a YAML or JSON file. Any read or shape problem is a ConfigurationError. */
export async function loadPlanFile(path: string): Promise<PlanFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Could not read plan file ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = extname(path) === ".json" ? JSON.parse(raw) : yamlParse(raw);
  } catch (err) {
    throw new ConfigurationError(`Plan file ${path} could not be parsed: ${errorMessage(err)}`);
  }

  const result = planFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Plan file ${path} is malformed: ${issues}`);
  }
  return result.data;
}
