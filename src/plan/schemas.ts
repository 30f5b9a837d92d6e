import { z } from "zod";

export const TASK_KINDS = ["directory", "file", "content-stub"] as const;

export const taskKindEnum = z.enum(TASK_KINDS);

export const taskStatusEnum = z.enum([
  "pending",
  "in-progress",
  "awaiting-validation",
  "accepted",
  "failed",
  "blocked",
]);

export const rejectionCodeEnum = z.enum([
  "empty_output",
  "unsafe_path",
  "structure_mismatch",
  "path_conflict",
  "malformed_response",
  "adapter_unavailable",
]);

export const rejectionRecordSchema = z.object({
  attempt: z.number().int().positive(),
  code: rejectionCodeEnum,
  reason: z.string(),
  at: z.string().min(1),
});

export const taskOutputSchema = z.union([
  z.object({
    kind: z.literal("directory"),
    path: z.string(),
    children: z.array(z.string()),
  }),
  z.object({
    kind: z.enum(["file", "content-stub"]),
    path: z.string(),
    content: z.string(),
  }),
]);

/** Validates one persisted task. */
export const taskSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  kind: taskKindEnum,
  path: z.string(),
  status: taskStatusEnum,
  attempts: z.number().int().nonnegative(),
  dependsOn: z.array(z.string()).default([]),
  output: taskOutputSchema.optional(),
  feedback: z.array(rejectionRecordSchema).default([]),
  acceptedAt: z.string().optional(),
  materializedAt: z.string().optional(),
});

/**
 * Validates a task declaration from a plan file or a generated plan.
 * `kind` stays a plain string here: plan construction reports unknown kinds
 * as configuration errors with the offending task ID.
 */
export const taskSpecSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(""),
  kind: z.string().min(1),
  path: z.string(),
  dependsOn: z.array(z.string()).default([]),
});

/** Validates a plan file (YAML or JSON) or a generated task list. */
export const planFileSchema = z.object({
  goal: z.string().optional(),
  tasks: z.array(taskSpecSchema).min(1),
});

export const CHECKPOINT_VERSION = 1;

/** Validates a persisted checkpoint. */
export const checkpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1),
  goal: z.string(),
  maxAttempts: z.number().int().positive(),
  acceptanceOrder: z.array(z.string()).default([]),
  tasks: z.array(taskSchema),
});

export type CheckpointData = z.infer<typeof checkpointSchema>;
export type PlanFile = z.infer<typeof planFileSchema>;
