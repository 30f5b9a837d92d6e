import { describe, it, expect } from "vitest";
import { formatRunReport, formatStatus, formatTaskDetail } from "../../src/reporter/human.js";
import { formatJsonReport } from "../../src/reporter/json.js";
import type { PlanResult } from "../../src/types.js";
import { makePlan, spec } from "../fakes.js";

function partialResult(): PlanResult {
  const plan = makePlan(
    [spec("a", "file", "a.txt"), spec("b", "file", "b.txt", ["a"]), spec("c", "directory", "c")],
    1,
    "demo goal",
  );
  plan.tasks[0].status = "failed";
  plan.tasks[0].attempts = 1;
  plan.tasks[0].feedback = [
    { attempt: 1, code: "empty_output", reason: 'non-empty output required for file "a.txt"', at: "2026-01-01T00:00:00.000Z" },
  ];
  plan.tasks[1].status = "blocked";
  plan.tasks[2].status = "accepted";
  plan.tasks[2].attempts = 1;
  return { kind: "partially-blocked", failed: ["a"], blocked: ["b"], plan };
}

describe("formatRunReport", () => {
  it("renders result, tasks, outcome lists and rejections", () => {
    expect(formatRunReport(partialResult())).toBe(
      [
        "## Run Report",
        "**Goal:** demo goal",
        "**Result:** PARTIALLY BLOCKED",
        "**Accepted:** 1/3",
        "",
        "### Tasks",
        "- [ ] a: file `a.txt` failed (1 attempt)",
        "- [-] b: file `b.txt` blocked (0 attempts)",
        "- [x] c: directory `c` accepted (1 attempt)",
        "",
        "### Failed",
        "- a",
        "",
        "### Blocked",
        "- b",
        "",
        "### Rejections",
        "#### a",
        '- Attempt 1 [empty_output]: non-empty output required for file "a.txt"',
      ].join("\n"),
    );
  });

  it("lists reverted tasks for a cancelled run", () => {
    const { plan } = partialResult();
    const report = formatRunReport({ kind: "cancelled", reverted: ["c"], plan });
    expect(report).toContain("**Result:** CANCELLED");
    expect(report).toContain("### Reverted to pending\n- c\n");
  });
});

describe("formatStatus", () => {
  it("summarizes a checkpoint", () => {
    const { plan } = partialResult();
    const lines = formatStatus({ createdAt: "t0", updatedAt: "t1", plan }).split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "Goal: demo goal",
      "Updated: t1",
      "Tasks: 3 total, 1 accepted, 0 pending, 1 failed, 1 blocked, 0 in flight",
    ]);
  });
});

describe("formatTaskDetail", () => {
  it("shows one task's status and rejection history", () => {
    const plan = makePlan([spec("a", "directory", "src"), spec("b", "file", "src/index.ts", ["a"])]);
    const task = plan.tasks[1];
    task.status = "failed";
    task.attempts = 2;
    task.feedback = [
      { attempt: 1, code: "empty_output", reason: "non-empty output required", at: "t1" },
      { attempt: 2, code: "path_conflict", reason: "already produced", at: "t2" },
    ];

    expect(formatTaskDetail(task, 3).split("\n")).toEqual([
      "## Task b",
      "**Kind:** file `src/index.ts`",
      "**Status:** failed (2/3 attempts)",
      "**Depends on:** a",
      "**Description:** Create src/index.ts",
      "",
      "### Rejections",
      "- Attempt 1 [empty_output] t1: non-empty output required",
      "- Attempt 2 [path_conflict] t2: already produced",
    ]);
  });

  it("says so when a task was never rejected", () => {
    const plan = makePlan([spec("a", "directory", "src")]);
    expect(formatTaskDetail(plan.tasks[0], 3).split("\n").slice(-2)).toEqual(["", "No rejections."]);
  });
});

describe("formatJsonReport", () => {
  it("adds a status summary", () => {
    const parsed: unknown = JSON.parse(formatJsonReport(partialResult()));
    expect(parsed).toMatchObject({
      kind: "partially-blocked",
      failed: ["a"],
      blocked: ["b"],
      summary: { total: 3, accepted: 1, failed: 1, blocked: 1 },
    });
  });
});
