import type { TaskContext } from "../plan/query.js";
import type { RejectionRecord, Task, TaskKind, TaskOutput } from "../plan/types.js";

/** Everything the adapter knows about a task beyond the task itself. */
export interface ProposalHistory {
  /** Every rejection so far, oldest first. */
  feedback: readonly RejectionRecord[];
  context: TaskContext;
}

export interface TaskPrompt {
  prompt: string;
  context: string;
}

/** Dependency outputs are quoted into the context up to this many characters each. */
const ANCESTOR_CONTENT_LIMIT = 2_000;

function formatInstructions(kind: TaskKind, path: string): string {
  switch (kind) {
    case "directory":
      return [
        "Reply with ONLY a JSON object, optionally inside a ```json code fence:",
        `{"path": "${path}", "children": ["<name>", ...]}`,
        "- `children` lists the immediate entries of the directory, one name each, no nested paths.",
        "- Do NOT include file contents.",
      ].join("\n");
    case "file":
      return [
        "Reply with ONLY a JSON object, optionally inside a ```json code fence:",
        `{"path": "${path}", "content": "<full file contents>"}`,
        "- `content` is the complete file, JSON-escaped.",
      ].join("\n");
    case "content-stub":
      return [
        "Reply with ONLY a JSON object, optionally inside a ```json code fence:",
        `{"path": "${path}", "content": "<stub contents>"}`,
        "- `content` is a minimal placeholder or config fragment: structure and TODO markers, not a full implementation.",
      ].join("\n");
  }
}

/** Format the cumulative rejection history for the next attempt. */
export function formatFeedback(feedback: readonly RejectionRecord[]): string {
  const lines = feedback.map(
    (r) => `- Attempt ${r.attempt} rejected [${r.code}]: ${r.reason}`,
  );
  return `${lines.join("\n")}\n\nFix every issue listed above in this attempt.`;
}

function describeOutput(output: TaskOutput): string {
  switch (output.kind) {
    case "directory":
      return `- directory \`${output.path}\` (children: ${output.children.join(", ") || "none"})`;
    case "file":
    case "content-stub": {
      const body =
        output.content.length > ANCESTOR_CONTENT_LIMIT
          ? `${output.content.slice(0, ANCESTOR_CONTENT_LIMIT)}\n(TRUNCATED)`
          : output.content;
      return `- ${output.kind} \`${output.path}\`:\n\`\`\`\n${body}\n\`\`\``;
    }
  }
}

function buildContextBlock(context: TaskContext): string {
  const sections: string[] = [];

  if (context.ancestors.length > 0) {
    sections.push(`## Accepted dependencies\n${context.ancestors.map(describeOutput).join("\n")}`);
  }
  if (context.siblings.length > 0) {
    const lines = context.siblings.map((s) => `- ${s.id}: ${s.kind} \`${s.path}\``);
    sections.push(`## Other planned entries in the same directory\n${lines.join("\n")}`);
  }
  if (context.existing.length > 0) {
    sections.push(
      `## Already on disk in the same directory\n${context.existing.map((e) => `- ${e}`).join("\n")}`,
    );
  }

  return sections.join("\n\n");
}

/** Build the prompt and context for one proposal attempt. */
export function buildTaskPrompt(task: Task, history: ProposalHistory): TaskPrompt {
  const attemptState =
    history.feedback.length > 0
      ? formatFeedback(history.feedback)
      : "First attempt, no previous feedback.";

  const prompt = `# Task ${task.id}: ${task.kind} \`${task.path}\`

## Project goal
${history.context.goal}

## What to produce
${task.description || "(no description)"}

## Previous attempts
${attemptState}

## Response format
${formatInstructions(task.kind, task.path)}`;

  return { prompt, context: buildContextBlock(history.context) };
}
