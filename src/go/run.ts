import { join, resolve } from "node:path";
import { loadConfig, withOverrides } from "../config/loader.js";
import { ConfigurationError } from "../errors.js";
import { Materializer } from "../materialize/materializer.js";
import { createDryRunFs, createNodeFs } from "../materialize/fs.js";
import type { ProjectFs } from "../materialize/fs.js";
import { createPlan, isTerminal } from "../plan/model.js";
import { decomposeGoal, loadPlanFile } from "../plan/planner.js";
import { exhaustedTasks, idsWithStatus } from "../plan/query.js";
import type { ProjectPlan } from "../plan/types.js";
import { GenerationAdapter } from "../runner/adapter.js";
import { createCliCapability } from "../runner/capability.js";
import type { GenerationCapability } from "../runner/capability.js";
import { processTask } from "../runner/loop.js";
import { PlanTracker } from "../scheduler/tracker.js";
import type { TrackerOptions } from "../scheduler/tracker.js";
import { DetachedCheckpointStore, FileCheckpointStore } from "../state/checkpoint.js";
import type { CheckpointStore } from "../state/checkpoint.js";
import { writeRunReport } from "../state/run-log.js";
import type { PlanResult, RunEvent, StubsmithConfig } from "../types.js";
import { log } from "../utils/log.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Directory holding .stubsmith.json; outputDir and stateDir resolve against it. */
  projectDir?: string;
  /** Pre-loaded config. When absent, .stubsmith.json is read from projectDir. */
  config?: StubsmithConfig;
  maxAttempts?: number;
  concurrency?: number;
  /** Read the task list from this YAML/JSON file instead of asking the generator. */
  planFile?: string;
  /** Resume from this checkpoint file. It must exist. */
  resumeFrom?: string;
  /** Archive any existing checkpoint and plan from scratch. */
  fresh?: boolean;
  signal?: AbortSignal;
  onEvent?: (event: RunEvent) => void;
  /**
   * Generate and validate as usual, but write nothing: no project files, no
   * checkpoint, no report. An existing checkpoint is still read.
   */
  dryRun?: boolean;
  /** Write <stateDir>/runs/<timestamp>/report.md. Defaults to true. */
  report?: boolean;
  capability?: GenerationCapability;
  fs?: ProjectFs;
  store?: CheckpointStore;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

async function resolveConfig(opts: RunOptions, projectDir: string): Promise<StubsmithConfig> {
  const overrides = { maxAttempts: opts.maxAttempts, concurrency: opts.concurrency };
  return opts.config
    ? withOverrides(opts.config, overrides)
    : loadConfig(projectDir, overrides);
}

function resolveStore(opts: RunOptions, config: StubsmithConfig, stateDir: string): CheckpointStore {
  if (opts.store) return opts.store;
  if (opts.resumeFrom) {
    return new FileCheckpointStore({
      path: resolve(opts.resumeFrom),
      archiveDir: join(stateDir, "archive"),
      keepArchive: config.archiveCheckpoints,
    });
  }
  return FileCheckpointStore.inStateDir(stateDir, config.archiveCheckpoints);
}

async function openTracker(
  goal: string,
  opts: RunOptions,
  config: StubsmithConfig,
  store: CheckpointStore,
  capability: GenerationCapability,
  trackerOpts: TrackerOptions,
): Promise<{ tracker: PlanTracker; resumed: boolean }> {
  if (opts.fresh && !opts.resumeFrom) {
    await store.archive();
  } else {
    const resumed = await PlanTracker.resume(trackerOpts, { maxAttempts: opts.maxAttempts });
    if (resumed) {
      const planGoal = resumed.snapshot().goal;
      if (goal && goal !== planGoal) {
        log.warn(`Resuming checkpoint for goal "${planGoal}"; ignoring new goal "${goal}" (use --fresh to start over)`);
      }
      return { tracker: resumed, resumed: true };
    }
    if (opts.resumeFrom) {
      throw new ConfigurationError(`No checkpoint found at ${opts.resumeFrom}`);
    }
  }

  let plan: ProjectPlan;
  if (opts.planFile) {
    const file = await loadPlanFile(opts.planFile);
    plan = createPlan(goal || file.goal || "", file.tasks, config.maxAttempts);
  } else {
    if (!goal) throw new ConfigurationError("A goal is required to plan a new project");
    plan = await decomposeGoal(goal, capability, {
      maxAttempts: config.maxAttempts,
      signal: opts.signal,
    });
  }

  const tracker = new PlanTracker(plan, trackerOpts);
  await tracker.persist();
  return { tracker, resumed: false };
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

async function classify(tracker: PlanTracker, cancelled: boolean): Promise<PlanResult> {
  if (cancelled && !tracker.isComplete()) {
    const reverted = await tracker.revertInFlight();
    return { kind: "cancelled", reverted, plan: tracker.snapshot() };
  }

  const plan = tracker.snapshot();
  if (!tracker.isComplete()) {
    const stuck = plan.tasks.filter((t) => !isTerminal(t, plan.maxAttempts)).map((t) => t.id);
    return { kind: "deadlocked", stuck, plan };
  }

  const failed = exhaustedTasks(plan);
  const blocked = idsWithStatus(plan, "blocked");
  if (failed.length === 0 && blocked.length === 0) {
    return { kind: "completed", plan };
  }
  return { kind: "partially-blocked", blocked, failed, plan };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Plan (or resume) a project and drive every task to a terminal state.
 *
 * Up to `concurrency` independent tasks are in flight at once. Accepted
 * outputs are written in acceptance order as they land. Aborting the signal
 * abandons in-flight generation and reverts those tasks to pending.
 *
 * Throws ConfigurationError for a bad config, plan or checkpoint, before any
 * task generation call. Cancelling during planning ends the run as cancelled
 * with an empty plan.
 */
export async function run(goal: string, opts: RunOptions = {}): Promise<PlanResult> {
  const projectDir = resolve(opts.projectDir ?? process.cwd());
  const config = await resolveConfig(opts, projectDir);
  const outputDir = resolve(projectDir, config.outputDir);
  const stateDir = resolve(projectDir, config.stateDir);
  const emit = opts.onEvent ?? (() => {});
  const signal = opts.signal;

  const capability =
    opts.capability ?? createCliCapability({ ...config.generator, cwd: outputDir });
  const dryRun = opts.dryRun ?? false;
  const projectFs = opts.fs ?? createNodeFs(outputDir);
  const fs = dryRun ? createDryRunFs(projectFs) : projectFs;
  const projectStore = resolveStore(opts, config, stateDir);
  const store = dryRun ? new DetachedCheckpointStore(projectStore) : projectStore;
  const trackerOpts: TrackerOptions = { store, onEvent: emit, now: opts.now };

  const finish = async (result: PlanResult): Promise<PlanResult> => {
    if (result.kind === "completed") {
      await store.archive();
    }
    const reportPath =
      opts.report === false || dryRun ? null : await writeRunReport(stateDir, result, opts.now?.());
    emit({ type: "finished", result: result.kind, reportPath });
    return result;
  };

  let opened: { tracker: PlanTracker; resumed: boolean };
  try {
    opened = await openTracker(goal, opts, config, store, capability, trackerOpts);
  } catch (err) {
    if (!signal?.aborted) throw err;
    // Cancelled while planning: nothing was persisted, so nothing to revert
    return finish({
      kind: "cancelled",
      reverted: [],
      plan: { goal, maxAttempts: config.maxAttempts, tasks: [], acceptanceOrder: [] },
    });
  }
  const { tracker, resumed } = opened;
  emit({ type: "plan-ready", tasks: tracker.snapshot().tasks.length, resumed });

  const materializer = new Materializer(fs, (task, op) =>
    emit({ type: "materialized", taskId: task.id, path: op.path, dryRun }),
  );
  await materializer.flush(tracker);

  const adapter = new GenerationAdapter({
    capability,
    maxAdapterRetries: config.maxAdapterRetries,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
    onRetry: (info) => emit({ type: "adapter-retry", ...info }),
  });
  const loopOpts = { tracker, adapter, fs, projectRoot: outputDir, signal };

  const worker = async (taskId: string): Promise<void> => {
    const outcome = await processTask(taskId, loopOpts);
    if (outcome.outcome === "accepted") {
      await materializer.flush(tracker);
    }
  };

  const inFlight = new Map<string, Promise<void>>();
  try {
    for (;;) {
      while (!signal?.aborted && inFlight.size < config.concurrency) {
        const next = tracker.nextReady(new Set(inFlight.keys()));
        if (!next) break;
        inFlight.set(
          next.id,
          worker(next.id).finally(() => inFlight.delete(next.id)),
        );
      }
      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
    }
  } catch (err) {
    await Promise.allSettled(inFlight.values());
    throw err;
  }

  return finish(await classify(tracker, signal?.aborted ?? false));
}
