import { posix } from "node:path";
import { normalizeProjectPath } from "../plan/query.js";
import type { Task, TaskOutput } from "../plan/types.js";
import type { PlanTracker } from "../scheduler/tracker.js";
import type { ProjectFs } from "./fs.js";

export const DIRECTORY_MARKER = ".gitkeep";

/** The single write an accepted output turns into. */
export interface WriteOp {
  path: string;
  content: string;
}

export function toWriteOp(output: TaskOutput): WriteOp {
  const path = normalizeProjectPath(output.path);
  switch (output.kind) {
    case "directory":
      return { path: posix.join(path, DIRECTORY_MARKER), content: "" };
    case "file":
      return { path, content: output.content };
    case "content-stub":
      return { path, content: `${output.content.replace(/\n+$/, "")}\n` };
  }
}

/**
 * Writes accepted outputs in acceptance order, once each. The tracker
 * records `materializedAt`, so a resumed run picks up where writing stopped.
 */
export class Materializer {
  private readonly fs: ProjectFs;
  private readonly onWrite: (task: Task, op: WriteOp) => void;
  private readonly written = new Set<string>();

  constructor(fs: ProjectFs, onWrite: (task: Task, op: WriteOp) => void = () => {}) {
    this.fs = fs;
    this.onWrite = onWrite;
  }

  /** Write every accepted, unmaterialized task. Returns the IDs written by this call. */
  async flush(tracker: PlanTracker): Promise<string[]> {
    const batch: Task[] = [];
    for (const task of tracker.pendingMaterialization()) {
      if (this.written.has(task.id) || !task.output) continue;
      const op = toWriteOp(task.output);
      this.fs.write(op.path, op.content);
      this.written.add(task.id);
      this.onWrite(task, op);
      batch.push(task);
    }

    for (const task of batch) {
      await tracker.markMaterialized(task.id);
    }
    return batch.map((t) => t.id);
  }
}
