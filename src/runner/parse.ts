import { z } from "zod";
import type { Candidate, Task } from "../plan/types.js";

/** The JSON envelope every generation response must carry. */
export const responseEnvelopeSchema = z.object({
  path: z.string().optional(),
  content: z.string().optional(),
  children: z.array(z.string()).optional(),
});

export type ParseResult =
  | { success: true; data: Candidate }
  | { success: false; error: string };

/**
 * Return the body of the fenced block, or the trimmed text when there is none.
 * The block runs from the first fence that opens a line to the last fence that
 * closes one, so fences inside a JSON string value stay in the body.
 */
export function stripCodeFences(text: string): string {
  const match = /^```[a-zA-Z0-9_-]*[^\S\n]*\n([\s\S]*)```[^\S\n]*$/m.exec(text);
  return (match ? match[1] : text).trim();
}

/** Cut the outermost {...} span so stray prose around the JSON does not break parsing. */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) return null;
  return text.slice(start, end + 1);
}

/**
 * Parse a raw generation response into a candidate of the task's kind.
 * Never throws: unparseable input comes back as `{ success: false }`.
 */
export function parseResponse(task: Task, raw: string): ParseResult {
  const body = extractJsonObject(stripCodeFences(raw));
  if (body === null) {
    return { success: false, error: "response did not contain a JSON object" };
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return {
      success: false,
      error: `response JSON is invalid: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const envelope = responseEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    return {
      success: false,
      error: `response JSON has the wrong shape at ${issue.path.join(".") || "(root)"}: ${issue.message}`,
    };
  }

  const { path, content, children } = envelope.data;
  const target = path ?? task.path;

  switch (task.kind) {
    case "directory":
      if (children === undefined) {
        return { success: false, error: 'directory response is missing the "children" array' };
      }
      return {
        success: true,
        data: { kind: "directory", path: target, children, content: content ?? "" },
      };
    case "file":
    case "content-stub":
      if (content === undefined) {
        return { success: false, error: `${task.kind} response is missing the "content" string` };
      }
      return { success: true, data: { kind: task.kind, path: target, content } };
  }
}
