import { describe, it, expect } from "vitest";
import { ConfigurationError, InvalidDependencyError } from "../../src/errors.js";
import {
  canRetry,
  canTransition,
  createPlan,
  isReady,
  isTerminal,
  phaseOf,
} from "../../src/plan/model.js";
import type { Task } from "../../src/plan/types.js";
import { spec } from "../fakes.js";

function makeTask(partial: Partial<Task> = {}): Task {
  return {
    id: "t1",
    description: "",
    kind: "file",
    path: "README.md",
    status: "pending",
    attempts: 0,
    dependsOn: [],
    feedback: [],
    ...partial,
  };
}

// ── createPlan ───────────────────────────────────────────────────────

describe("createPlan", () => {
  it("builds pending tasks in insertion order", () => {
    const plan = createPlan(
      "init repo",
      [spec("readme", "file", "README.md"), spec("src", "directory", "src")],
      3,
    );
    expect(plan.goal).toBe("init repo");
    expect(plan.maxAttempts).toBe(3);
    expect(plan.acceptanceOrder).toEqual([]);
    expect(plan.tasks.map((t) => [t.id, t.status, t.attempts])).toEqual([
      ["readme", "pending", 0],
      ["src", "pending", 0],
    ]);
  });

  it("dedupes repeated dependency IDs", () => {
    const plan = createPlan(
      "g",
      [spec("a", "directory", "a"), spec("b", "file", "a/b.txt", ["a", "a"])],
      1,
    );
    expect(plan.tasks[1].dependsOn).toEqual(["a"]);
  });

  it("rejects an unknown kind with the offending task ID", () => {
    expect(() => createPlan("g", [spec("x", "symlink", "x")], 3)).toThrow(
      'Task "x" has invalid kind "symlink" (expected one of: directory, file, content-stub)',
    );
  });

  it("rejects duplicate IDs", () => {
    expect(() =>
      createPlan("g", [spec("a", "file", "a.txt"), spec("a", "file", "b.txt")], 3),
    ).toThrow("Duplicate task IDs: a");
  });

  it("throws InvalidDependencyError for a dependency outside the plan", () => {
    let caught: unknown;
    try {
      createPlan("g", [spec("a", "file", "a.txt", ["ghost"])], 3);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidDependencyError);
    expect(caught).toMatchObject({ taskId: "a", dependencyId: "ghost" });
  });

  it("reports a dependency cycle as a configuration error", () => {
    const specs = [spec("a", "file", "a.txt", ["b"]), spec("b", "file", "b.txt", ["a"])];
    expect(() => createPlan("g", specs, 3)).toThrow(ConfigurationError);
    expect(() => createPlan("g", specs, 3)).toThrow("Task dependency cycle: a → b → a");
  });

  it("rejects an empty task list and a non-positive budget", () => {
    expect(() => createPlan("g", [], 3)).toThrow("A plan needs at least one task");
    expect(() => createPlan("g", [spec("a", "file", "a.txt")], 0)).toThrow(
      "maxAttempts must be a positive integer, got 0",
    );
  });
});

// ── State machine ────────────────────────────────────────────────────

describe("canTransition", () => {
  it("allows the feedback loop path", () => {
    expect(canTransition("pending", "in-progress")).toBe(true);
    expect(canTransition("in-progress", "awaiting-validation")).toBe(true);
    expect(canTransition("awaiting-validation", "accepted")).toBe(true);
    expect(canTransition("awaiting-validation", "failed")).toBe(true);
    expect(canTransition("failed", "in-progress")).toBe(true);
  });

  it("allows cancellation and escalation", () => {
    expect(canTransition("in-progress", "pending")).toBe(true);
    expect(canTransition("awaiting-validation", "pending")).toBe(true);
    expect(canTransition("pending", "blocked")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
  });

  it("treats accepted and blocked as final", () => {
    expect(canTransition("accepted", "pending")).toBe(false);
    expect(canTransition("blocked", "pending")).toBe(false);
    expect(canTransition("pending", "accepted")).toBe(false);
    expect(canTransition("failed", "blocked")).toBe(false);
  });
});

describe("task predicates", () => {
  it("isReady requires every dependency accepted", () => {
    const plan = createPlan(
      "g",
      [spec("a", "directory", "a"), spec("b", "file", "a/b.txt", ["a"])],
      3,
    );
    expect(isReady(plan.tasks[1], plan)).toBe(false);
    plan.tasks[0].status = "accepted";
    expect(isReady(plan.tasks[1], plan)).toBe(true);
  });

  it("canRetry and isTerminal follow the attempt budget", () => {
    const failed = makeTask({ status: "failed", attempts: 2 });
    expect(canRetry(failed, 3)).toBe(true);
    expect(isTerminal(failed, 3)).toBe(false);
    expect(canRetry(failed, 2)).toBe(false);
    expect(isTerminal(failed, 2)).toBe(true);
    expect(isTerminal(makeTask({ status: "accepted" }), 3)).toBe(true);
    expect(isTerminal(makeTask({ status: "blocked" }), 3)).toBe(true);
    expect(isTerminal(makeTask({ status: "pending" }), 3)).toBe(false);
  });

  it("phaseOf maps statuses onto loop phases", () => {
    expect(phaseOf("pending")).toBe("NotStarted");
    expect(phaseOf("in-progress")).toBe("Proposing");
    expect(phaseOf("awaiting-validation")).toBe("Validating");
    expect(phaseOf("failed")).toBe("Rejected");
  });
});
