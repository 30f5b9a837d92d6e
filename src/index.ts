export * from "./plan/index.js";
export { validateCandidate } from "./gates/index.js";
export type { ValidationContext, Verdict } from "./gates/index.js";
export { GenerationAdapter, backoffDelay } from "./runner/adapter.js";
export type { GenerationFailure, ProposalResult } from "./runner/adapter.js";
export { createCliCapability } from "./runner/capability.js";
export type { GenerationCapability } from "./runner/capability.js";
export { processTask } from "./runner/loop.js";
export { PlanTracker } from "./scheduler/tracker.js";
export type { Settlement } from "./scheduler/tracker.js";
export { FileCheckpointStore } from "./state/checkpoint.js";
export type { Checkpoint, CheckpointStore } from "./state/checkpoint.js";
export { Materializer, toWriteOp } from "./materialize/materializer.js";
export { createNodeFs } from "./materialize/fs.js";
export type { ProjectFs } from "./materialize/fs.js";
export { run } from "./go/run.js";
export type { RunOptions } from "./go/run.js";
export { loadConfig } from "./config/loader.js";
export {
  ConfigurationError,
  IllegalTransitionError,
  InvalidDependencyError,
} from "./errors.js";
export type { PlanResult, RunEvent, StubsmithConfig } from "./types.js";
