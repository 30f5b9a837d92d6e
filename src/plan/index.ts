export type {
  Candidate,
  ContentOutput,
  DirectoryOutput,
  ProjectPlan,
  RejectionCode,
  RejectionRecord,
  Task,
  TaskKind,
  TaskOutput,
  TaskPhase,
  TaskSpec,
  TaskStatus,
} from "./types.js";
export {
  canRetry,
  canTransition,
  createPlan,
  createTask,
  getTask,
  isReady,
  isTaskKind,
  isTerminal,
  phaseOf,
} from "./model.js";
export {
  acceptedPaths,
  buildTaskContext,
  dependencyDepths,
  findReady,
  isPlanComplete,
  normalizeProjectPath,
  summarizePlan,
  transitiveDependencies,
  transitiveDependents,
} from "./query.js";
export type { PlanSummary, TaskContext } from "./query.js";
export { detectCycles, findDanglingEdges, findDuplicateIds } from "./validator.js";
export { decomposeGoal, loadPlanFile, parsePlanResponse } from "./planner.js";
export { TASK_KINDS, checkpointSchema, planFileSchema, taskSpecSchema } from "./schemas.js";
