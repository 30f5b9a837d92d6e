/** Kind of structural artifact a task produces. */
export type TaskKind = "directory" | "file" | "content-stub";

/** Task status lifecycle. */
export type TaskStatus =
  | "pending"
  | "in-progress"
  | "awaiting-validation"
  | "accepted"
  | "failed"
  | "blocked";

/** Per-task engine phase, derived from status. */
export type TaskPhase =
  | "NotStarted"
  | "Proposing"
  | "Validating"
  | "Accepted"
  | "Rejected"
  | "Blocked";

/** Why a candidate (or a proposal attempt) was rejected. */
export type RejectionCode =
  | "empty_output"
  | "unsafe_path"
  | "structure_mismatch"
  | "path_conflict"
  | "malformed_response"
  | "adapter_unavailable";

/** One entry of a task's rejection history. */
export interface RejectionRecord {
  /** Attempt number (1-based) that was rejected. */
  attempt: number;
  code: RejectionCode;
  /** Human-readable reason, fed back into the next prompt. */
  reason: string;
  /** ISO 8601 timestamp. */
  at: string;
}

/** Accepted output of a directory task: child names only. */
export interface DirectoryOutput {
  kind: "directory";
  path: string;
  children: string[];
}

/** Accepted output of a file or content-stub task. */
export interface ContentOutput {
  kind: "file" | "content-stub";
  path: string;
  content: string;
}

export type TaskOutput = DirectoryOutput | ContentOutput;

/** Candidate produced by the generation adapter, before validation. */
export type Candidate =
  | {
      kind: "directory";
      path: string;
      children: string[];
      /** Content bytes the generator attached. Must be empty to pass validation. */
      content: string;
    }
  | ContentOutput;

/** A unit of plan work. */
export interface Task {
  /** Unique identifier, stable across runs. */
  id: string;
  /** What this task should produce. */
  description: string;
  kind: TaskKind;
  /** Planned path, relative to the project root. */
  path: string;
  status: TaskStatus;
  /** Proposal attempts consumed so far. */
  attempts: number;
  /** Task IDs that must be accepted before this one starts. */
  dependsOn: string[];
  /** Set when the task is accepted. */
  output?: TaskOutput;
  /** Ordered rejection history. The last entry is the latest feedback. */
  feedback: RejectionRecord[];
  /** ISO 8601 timestamp, set on acceptance. */
  acceptedAt?: string;
  /** ISO 8601 timestamp, set once the output has been written. */
  materializedAt?: string;
}

/** Input shape for a task when building a plan. */
export interface TaskSpec {
  id: string;
  description: string;
  kind: string;
  path: string;
  dependsOn?: string[];
}

/** The full plan for one goal. */
export interface ProjectPlan {
  goal: string;
  maxAttempts: number;
  /** Tasks in insertion order. */
  tasks: Task[];
  /** Task IDs in the order they were accepted. */
  acceptanceOrder: string[];
}
