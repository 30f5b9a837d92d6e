import { describe, it, expect, afterEach } from "vitest";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { stubsmithConfigSchema } from "../../src/config/schema.js";
import { ConfigurationError } from "../../src/errors.js";
import { run } from "../../src/go/run.js";
import type { RunOptions } from "../../src/go/run.js";
import type { ProjectPlan } from "../../src/plan/types.js";
import type { GenerationCapability } from "../../src/runner/capability.js";
import { PlanTracker } from "../../src/scheduler/tracker.js";
import type { RunEvent, StubsmithConfig } from "../../src/types.js";
import {
  MemoryCheckpointStore,
  RecordingFs,
  dirReply,
  fileReply,
  makePlan,
  scriptedCapability,
  spec,
} from "../fakes.js";

// ── Helpers ──────────────────────────────────────────────────────────

function tempDir() {
  return join(tmpdir(), `stubsmith-run-test-${randomUUID()}`);
}

function testConfig(overrides: Partial<StubsmithConfig> = {}): StubsmithConfig {
  return stubsmithConfigSchema.parse({
    maxAdapterRetries: 0,
    backoffBaseMs: 0,
    backoffMaxMs: 0,
    ...overrides,
  });
}

function planReply(tasks: Array<{ id: string; kind: string; path: string; dependsOn?: string[] }>): string {
  return JSON.stringify({ tasks });
}

/** Task state that must match across runs, without audit timestamps. */
function withoutTimestamps(plan: ProjectPlan) {
  return {
    acceptanceOrder: plan.acceptanceOrder,
    tasks: plan.tasks.map((t) => ({
      id: t.id,
      status: t.status,
      attempts: t.attempts,
      output: t.output,
      feedback: t.feedback.map((f) => ({ attempt: f.attempt, code: f.code, reason: f.reason })),
    })),
  };
}

const README_AND_SRC = planReply([
  { id: "readme", kind: "file", path: "README.md" },
  { id: "src", kind: "directory", path: "src" },
]);

function harness(extra: Partial<RunOptions> = {}) {
  const store = new MemoryCheckpointStore();
  const fs = new RecordingFs();
  const events: RunEvent[] = [];
  const opts: RunOptions = {
    projectDir: "/work/project",
    config: testConfig(),
    report: false,
    store,
    fs,
    onEvent: (e) => events.push(e),
    ...extra,
  };
  return { store, fs, events, opts };
}

// ── Outcomes ─────────────────────────────────────────────────────────

describe("run", () => {
  it("completes a two-task goal with one write per task", async () => {
    const { capability, generate } = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply("# Project\n")],
      src: [dirReply([])],
    });
    const { store, fs, opts } = harness({ capability });

    const result = await run("init empty repo with README and src/", opts);

    expect(result.kind).toBe("completed");
    expect(fs.writes).toEqual([
      { path: "README.md", content: "# Project\n" },
      { path: "src/.gitkeep", content: "" },
    ]);
    expect(generate).toHaveBeenCalledTimes(3);
    const last = store.saves[store.saves.length - 1];
    expect(last.plan.tasks.map((t) => t.status)).toEqual(["accepted", "accepted"]);
    expect(store.archived).toBe(1);
  });

  it("retries an empty output and accepts the second attempt", async () => {
    const { capability } = scriptedCapability({
      "": [planReply([{ id: "readme", kind: "file", path: "README.md" }])],
      readme: [fileReply(""), fileReply("# Readme\n")],
    });
    const { fs, opts } = harness({ capability });

    const result = await run("readme only", opts);

    expect(result.kind).toBe("completed");
    const readme = result.plan.tasks[0];
    expect(readme.attempts).toBe(2);
    expect(readme.feedback.map((f) => f.code)).toEqual(["empty_output"]);
    expect(fs.writes).toEqual([{ path: "README.md", content: "# Readme\n" }]);
  });

  it("blocks dependents when a task exhausts its budget", async () => {
    const { capability, calls } = scriptedCapability({
      "": [
        planReply([
          { id: "a", kind: "file", path: "a.txt" },
          { id: "b", kind: "file", path: "b.txt", dependsOn: ["a"] },
        ]),
      ],
      a: [fileReply("")],
    });
    const { fs, opts } = harness({ capability, maxAttempts: 1 });

    const result = await run("g", opts);

    expect(result).toMatchObject({ kind: "partially-blocked", failed: ["a"], blocked: ["b"] });
    expect(calls.filter((c) => c.taskId === "b")).toHaveLength(0);
    expect(fs.writes).toEqual([]);
  });

  it("keeps independent branches going after a failure", async () => {
    const { capability } = scriptedCapability({
      "": [
        planReply([
          { id: "a", kind: "file", path: "a.txt" },
          { id: "b", kind: "file", path: "b.txt", dependsOn: ["a"] },
          { id: "c", kind: "file", path: "c.txt" },
        ]),
      ],
      a: [new Error("offline")],
      c: [fileReply("C")],
    });
    const { fs, opts } = harness({ capability, maxAttempts: 1 });

    const result = await run("g", opts);

    expect(result).toMatchObject({ kind: "partially-blocked", failed: ["a"], blocked: ["b"] });
    expect(result.plan.tasks[2].status).toBe("accepted");
    expect(fs.writes).toEqual([{ path: "c.txt", content: "C" }]);
  });

  it("does not let a task claim another task's planned path", async () => {
    const { capability } = scriptedCapability({
      "": [
        planReply([
          { id: "readme", kind: "file", path: "README.md" },
          { id: "main", kind: "file", path: "src/main.ts" },
        ]),
      ],
      readme: [fileReply("stolen", "src/main.ts"), fileReply("# R\n")],
      main: [fileReply("export {};\n")],
    });
    const { fs, opts } = harness({ capability });

    const result = await run("g", opts);

    expect(result.kind).toBe("completed");
    expect(result.plan.tasks[0].feedback.map((f) => f.code)).toEqual(["structure_mismatch"]);
    expect(result.plan.tasks[1].attempts).toBe(1);
    expect(fs.writes).toEqual([
      { path: "README.md", content: "# R\n" },
      { path: "src/main.ts", content: "export {};\n" },
    ]);
  });

  it("never makes more proposals than the plan's total attempt budget", async () => {
    const { capability, calls } = scriptedCapability({
      "": [
        planReply([
          { id: "a", kind: "file", path: "a.txt" },
          { id: "b", kind: "file", path: "b.txt", dependsOn: ["a"] },
          { id: "c", kind: "file", path: "c.txt" },
        ]),
      ],
      a: [fileReply(""), fileReply("")],
      c: [fileReply(""), fileReply("")],
    });
    const { opts } = harness({ capability, maxAttempts: 2 });

    const result = await run("g", opts);

    const proposals = calls.filter((c) => c.taskId !== "");
    expect(proposals).toHaveLength(4);
    expect(proposals.length).toBeLessThanOrEqual(result.plan.tasks.length * result.plan.maxAttempts);
    expect(result).toMatchObject({ kind: "partially-blocked", failed: ["a", "c"], blocked: ["b"] });
  });

  it("reports a deadlock when pending work can never start", async () => {
    const plan = makePlan([spec("a", "file", "a.txt"), spec("b", "file", "b.txt", ["a"])]);
    plan.tasks[0].status = "blocked";
    const store = new MemoryCheckpointStore({
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
      plan,
    });
    const { capability, generate } = scriptedCapability({});
    const { opts } = harness({ capability, store });

    const result = await run("test goal", opts);

    expect(result).toMatchObject({ kind: "deadlocked", stuck: ["b"] });
    expect(generate).not.toHaveBeenCalled();
  });

  it("fails with a configuration error before generating anything", async () => {
    const dir = tempDir();
    await mkdir(dir, { recursive: true });
    const planFile = join(dir, "plan.yaml");
    await writeFile(
      planFile,
      [
        "tasks:",
        "  - { id: a, kind: file, path: a.txt, dependsOn: [b] }",
        "  - { id: b, kind: file, path: b.txt, dependsOn: [a] }",
      ].join("\n"),
      "utf-8",
    );
    const { capability, generate } = scriptedCapability({});
    const { opts } = harness({ capability, planFile });

    try {
      await expect(run("g", opts)).rejects.toThrow(ConfigurationError);
      expect(generate).not.toHaveBeenCalled();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

// ── Cancellation & resume ────────────────────────────────────────────

describe("run: cancellation and resume", () => {
  it("reverts in-flight work on cancel and finishes on resume", async () => {
    const controller = new AbortController();
    const first = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply("# R\n")],
      src: [
        () => {
          controller.abort();
          return dirReply([]);
        },
      ],
    });
    const { store, fs, opts } = harness({ capability: first.capability, signal: controller.signal });

    const cancelled = await run("init", opts);
    expect(cancelled).toMatchObject({ kind: "cancelled", reverted: ["src"] });
    expect(store.current?.plan.tasks[1]).toMatchObject({ status: "pending", attempts: 0 });

    const second = scriptedCapability({ src: [dirReply([])] });
    const events: RunEvent[] = [];
    const resumed = await run("init", {
      ...opts,
      signal: undefined,
      capability: second.capability,
      onEvent: (e) => events.push(e),
    });

    expect(resumed.kind).toBe("completed");
    expect(events[0]).toEqual({ type: "plan-ready", tasks: 2, resumed: true });
    expect(second.calls.map((c) => c.taskId)).toEqual(["src"]);
    expect(fs.writes.map((w) => w.path)).toEqual(["README.md", "src/.gitkeep"]);
  });

  it("finishes a cancelled run in the same state as an uninterrupted one", async () => {
    const straight = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply(""), fileReply("# R\n")],
      src: [dirReply(["index.ts"])],
    });
    const baseline = await run("init", harness({ capability: straight.capability }).opts);
    expect(baseline.kind).toBe("completed");

    const controller = new AbortController();
    const first = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply(""), fileReply("# R\n")],
      src: [
        () => {
          controller.abort();
          return dirReply(["index.ts"]);
        },
      ],
    });
    const { opts } = harness({ capability: first.capability, signal: controller.signal });
    expect((await run("init", opts)).kind).toBe("cancelled");

    const second = scriptedCapability({ src: [dirReply(["index.ts"])] });
    const resumed = await run("init", { ...opts, signal: undefined, capability: second.capability });

    expect(resumed.kind).toBe("completed");
    expect(withoutTimestamps(resumed.plan)).toEqual(withoutTimestamps(baseline.plan));
  });

  it("ends as cancelled when interrupted while planning", async () => {
    const controller = new AbortController();
    const { capability } = scriptedCapability({
      "": [
        () => {
          controller.abort();
          throw new Error("Generation aborted");
        },
      ],
    });
    const { store, events, opts } = harness({ capability, signal: controller.signal });

    const result = await run("init", opts);

    expect(result).toEqual({
      kind: "cancelled",
      reverted: [],
      plan: { goal: "init", maxAttempts: 3, tasks: [], acceptanceOrder: [] },
    });
    expect(store.saves).toHaveLength(0);
    expect(events).toEqual([{ type: "finished", result: "cancelled", reportPath: null }]);
  });

  it("writes accepted but unwritten output first on resume", async () => {
    const store = new MemoryCheckpointStore();
    const tracker = new PlanTracker(
      makePlan([spec("readme", "file", "README.md"), spec("src", "directory", "src")]),
      { store },
    );
    await tracker.begin("readme");
    await tracker.settle("readme", () => ({
      verdict: "accepted",
      output: { kind: "file", path: "README.md", content: "# R\n" },
    }));

    const { capability } = scriptedCapability({ src: [dirReply([])] });
    const { fs, events, opts } = harness({ capability, store });
    const result = await run("test goal", opts);

    expect(result.kind).toBe("completed");
    expect(fs.writes.map((w) => w.path)).toEqual(["README.md", "src/.gitkeep"]);
    const firstWrite = events.findIndex((e) => e.type === "materialized");
    const firstAttempt = events.findIndex((e) => e.type === "transition" && e.to === "in-progress");
    expect(firstWrite).toBeLessThan(firstAttempt);
  });

  it("starts over with --fresh", async () => {
    const store = new MemoryCheckpointStore({
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
      plan: makePlan([spec("old", "file", "old.txt")]),
    });
    const { capability } = scriptedCapability({
      "": [planReply([{ id: "readme", kind: "file", path: "README.md" }])],
      readme: [fileReply("# R\n")],
    });
    const { opts } = harness({ capability, store, fresh: true });

    const result = await run("new goal", opts);

    expect(result.plan.tasks.map((t) => t.id)).toEqual(["readme"]);
    expect(store.archived).toBe(2);
  });
});

// ── Dry run ──────────────────────────────────────────────────────────

describe("run: dry run", () => {
  it("generates and validates without writing files or checkpoints", async () => {
    const { capability } = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply("# R\n")],
      src: [dirReply([])],
    });
    const { store, fs, events, opts } = harness({ capability, dryRun: true });

    const result = await run("init", opts);

    expect(result.kind).toBe("completed");
    expect(fs.writes).toEqual([]);
    expect(store.saves).toHaveLength(0);
    expect(store.archived).toBe(0);
    expect(events.filter((e) => e.type === "materialized")).toEqual([
      { type: "materialized", taskId: "readme", path: "README.md", dryRun: true },
      { type: "materialized", taskId: "src", path: "src/.gitkeep", dryRun: true },
    ]);
  });

  it("reads an existing checkpoint but leaves it untouched", async () => {
    const initial = {
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
      plan: makePlan([spec("readme", "file", "README.md")]),
    };
    const store = new MemoryCheckpointStore(initial);
    const { capability } = scriptedCapability({ readme: [fileReply("# R\n")] });
    const { events, opts } = harness({ capability, store, dryRun: true });

    const result = await run("test goal", opts);

    expect(result.kind).toBe("completed");
    expect(events[0]).toEqual({ type: "plan-ready", tasks: 1, resumed: true });
    expect(store.saves).toHaveLength(0);
    expect(store.current).toEqual(initial);
  });
});

// ── Concurrency ──────────────────────────────────────────────────────

describe("run: concurrency", () => {
  it("processes independent tasks at once and writes in acceptance order", async () => {
    let releaseReadme: () => void = () => {};
    const readmeGate = new Promise<void>((resolve) => {
      releaseReadme = resolve;
    });

    const capability: GenerationCapability = {
      async generate(prompt) {
        if (prompt.startsWith("# Plan")) return README_AND_SRC;
        if (prompt.startsWith("# Task readme:")) {
          await readmeGate;
          return fileReply("# R\n");
        }
        return dirReply([]);
      },
    };
    const { fs, opts } = harness({
      capability,
      concurrency: 2,
      onEvent: (e) => {
        if (e.type === "materialized" && e.taskId === "src") releaseReadme();
      },
    });

    const result = await run("init", opts);

    expect(result.kind).toBe("completed");
    expect(result.plan.acceptanceOrder).toEqual(["src", "readme"]);
    expect(fs.writes.map((w) => w.path)).toEqual(["src/.gitkeep", "README.md"]);
  });
});

// ── Files on disk ────────────────────────────────────────────────────

describe("run: on disk", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("writes output, archives the checkpoint and leaves a report", async () => {
    const projectDir = tempDir();
    dirs.push(projectDir);
    const { capability } = scriptedCapability({
      "": [README_AND_SRC],
      readme: [fileReply("# Project\n")],
      src: [dirReply(["index.ts"])],
    });
    let reportPath: string | null = null;

    const result = await run("init", {
      projectDir,
      config: testConfig({ outputDir: "out" }),
      capability,
      onEvent: (e) => {
        if (e.type === "finished") reportPath = e.reportPath;
      },
    });

    expect(result.kind).toBe("completed");
    expect(await readFile(join(projectDir, "out", "README.md"), "utf-8")).toBe("# Project\n");
    expect(await readdir(join(projectDir, "out", "src"))).toEqual([".gitkeep"]);
    expect(await readdir(join(projectDir, ".stubsmith", "archive"))).toHaveLength(1);

    expect(reportPath).not.toBeNull();
    const report = await readFile(String(reportPath), "utf-8");
    expect(report.split("\n").slice(0, 3)).toEqual(["## Run Report", "**Goal:** init", "**Result:** COMPLETED"]);
  });
});
