import { describe, it, expect, afterEach } from "vitest";
import { readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { createNodeFs } from "../../src/materialize/fs.js";
import type { ProjectFs } from "../../src/materialize/fs.js";
import { Materializer, toWriteOp } from "../../src/materialize/materializer.js";
import { PlanTracker } from "../../src/scheduler/tracker.js";
import type { Verdict } from "../../src/gates/index.js";
import type { TaskOutput } from "../../src/plan/types.js";
import { MemoryCheckpointStore, RecordingFs, makePlan, spec } from "../fakes.js";

function tempDir() {
  return join(tmpdir(), `stubsmith-materialize-test-${randomUUID()}`);
}

describe("toWriteOp", () => {
  it("writes a marker file for directories", () => {
    expect(toWriteOp({ kind: "directory", path: "src/", children: ["a.ts"] })).toEqual({
      path: "src/.gitkeep",
      content: "",
    });
  });

  it("writes file content verbatim", () => {
    expect(toWriteOp({ kind: "file", path: "./a.txt", content: "no newline" })).toEqual({
      path: "a.txt",
      content: "no newline",
    });
  });

  it("ends stub content with exactly one newline", () => {
    expect(toWriteOp({ kind: "content-stub", path: "a.yaml", content: "key: 1" }).content).toBe("key: 1\n");
    expect(toWriteOp({ kind: "content-stub", path: "a.yaml", content: "key: 1\n\n\n" }).content).toBe("key: 1\n");
  });
});

describe("Materializer", () => {
  async function acceptAll(tracker: PlanTracker, outputs: Record<string, TaskOutput>, order: string[]) {
    for (const id of order) {
      await tracker.begin(id);
      await tracker.settle(id, (): Verdict => ({ verdict: "accepted", output: outputs[id] }));
    }
  }

  it("writes once per accepted task, in acceptance order", async () => {
    const plan = makePlan([spec("a", "file", "a.txt"), spec("b", "directory", "b"), spec("c", "file", "c.txt")]);
    const tracker = new PlanTracker(plan, { store: new MemoryCheckpointStore() });
    await acceptAll(
      tracker,
      {
        a: { kind: "file", path: "a.txt", content: "A" },
        b: { kind: "directory", path: "b", children: [] },
        c: { kind: "file", path: "c.txt", content: "C" },
      },
      ["c", "a", "b"],
    );

    const fs = new RecordingFs();
    const materializer = new Materializer(fs);
    expect(await materializer.flush(tracker)).toEqual(["c", "a", "b"]);
    expect(await materializer.flush(tracker)).toEqual([]);
    expect(fs.writes).toEqual([
      { path: "c.txt", content: "C" },
      { path: "a.txt", content: "A" },
      { path: "b/.gitkeep", content: "" },
    ]);
    expect(tracker.pendingMaterialization()).toEqual([]);
  });

  it("does not write a task twice when flushes overlap", async () => {
    const plan = makePlan([spec("a", "file", "a.txt")]);
    const tracker = new PlanTracker(plan, { store: new MemoryCheckpointStore() });
    await acceptAll(tracker, { a: { kind: "file", path: "a.txt", content: "A" } }, ["a"]);

    const fs = new RecordingFs();
    const materializer = new Materializer(fs);
    await Promise.all([materializer.flush(tracker), materializer.flush(tracker)]);
    expect(fs.writes).toHaveLength(1);
  });

  it("writes a task again on the next flush when its write failed", async () => {
    const plan = makePlan([spec("a", "file", "a.txt")]);
    const tracker = new PlanTracker(plan, { store: new MemoryCheckpointStore() });
    await acceptAll(tracker, { a: { kind: "file", path: "a.txt", content: "A" } }, ["a"]);

    const fs = new RecordingFs();
    let failures = 1;
    const flaky: ProjectFs = {
      write(path, content) {
        if (failures-- > 0) throw new Error("disk full");
        fs.write(path, content);
      },
      exists: (path) => fs.exists(path),
      listChildren: (path) => fs.listChildren(path),
    };

    const materializer = new Materializer(flaky);
    await expect(materializer.flush(tracker)).rejects.toThrow("disk full");
    expect(await materializer.flush(tracker)).toEqual(["a"]);
    expect(fs.writes).toEqual([{ path: "a.txt", content: "A" }]);
  });
});

describe("createNodeFs", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("creates intermediate directories and lists children", async () => {
    const root = tempDir();
    dirs.push(root);
    const fs = createNodeFs(root);

    fs.write("src/lib/util.ts", "export {};\n");
    fs.write("src/index.ts", "");

    expect(await readFile(join(root, "src/lib/util.ts"), "utf-8")).toBe("export {};\n");
    expect(fs.exists("src/index.ts")).toBe(true);
    expect(fs.exists("src/missing.ts")).toBe(false);
    expect(fs.listChildren("src")).toEqual(["index.ts", "lib"]);
    expect(fs.listChildren("nowhere")).toEqual([]);
    expect(await readdir(root)).toEqual(["src"]);
  });
});
