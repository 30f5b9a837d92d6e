import { posix } from "node:path";
import { normalizeProjectPath } from "../plan/query.js";
import type { Candidate, RejectionCode, Task } from "../plan/types.js";

export interface ValidationContext {
  /** Absolute project root. Absolute candidate paths must resolve inside it. */
  projectRoot: string;
  /** Normalized paths already produced by accepted tasks. */
  acceptedPaths: ReadonlySet<string>;
}

export interface Rejection {
  code: RejectionCode;
  reason: string;
}

export type ValidationRule = (
  task: Task,
  candidate: Candidate,
  ctx: ValidationContext,
) => Rejection | null;

function toPosix(path: string): string {
  return path.replace(/\\/g, "/");
}

function isAbsolutePath(path: string): boolean {
  return posix.isAbsolute(path) || /^[a-zA-Z]:\//.test(path);
}

/**
 * Resolve a candidate path to a normalized project-relative path.
 * Absolute paths are made relative to the project root; callers must run
 * the path-safety rule first.
 */
export function resolveCandidatePath(path: string, projectRoot: string): string {
  const unix = toPosix(path.trim());
  if (posix.isAbsolute(unix)) {
    return normalizeProjectPath(posix.relative(toPosix(projectRoot), unix));
  }
  return normalizeProjectPath(unix);
}

/** Reason a path is unsafe, or null. */
function unsafePathReason(path: string, projectRoot: string): string | null {
  const unix = toPosix(path.trim());
  if (unix === "") return "path is empty";

  if (unix.split("/").includes("..")) {
    return `path "${path}" contains a traversal segment ("..")`;
  }

  if (isAbsolutePath(unix)) {
    if (!posix.isAbsolute(unix)) {
      return `absolute path "${path}" is outside the project root`;
    }
    const rel = posix.relative(toPosix(projectRoot), unix);
    if (rel === "" || rel.startsWith("..") || posix.isAbsolute(rel)) {
      return `absolute path "${path}" is outside the project root`;
    }
  }

  if (normalizeProjectPath(unix) === ".") {
    return `path "${path}" names the project root itself`;
  }
  return null;
}

// ── Rules, in evaluation order ───────────────────────────────────────

export const requireContent: ValidationRule = (_task, candidate) => {
  switch (candidate.kind) {
    case "directory":
      return null;
    case "file":
    case "content-stub":
      if (candidate.content.trim() === "") {
        return {
          code: "empty_output",
          reason: `non-empty output required for ${candidate.kind} "${candidate.path}"`,
        };
      }
      return null;
  }
};

export const requireSafePath: ValidationRule = (_task, candidate, ctx) => {
  const reason = unsafePathReason(candidate.path, ctx.projectRoot);
  if (reason) return { code: "unsafe_path", reason };

  if (candidate.kind === "directory") {
    for (const child of candidate.children) {
      const unix = toPosix(child.trim());
      if (unix === "" || unix === "." || unix.split("/").includes("..") || isAbsolutePath(unix)) {
        return { code: "unsafe_path", reason: `child name "${child}" is not a safe relative name` };
      }
    }
  }
  return null;
};

export const requireStructure: ValidationRule = (task, candidate, ctx) => {
  if (candidate.kind !== task.kind) {
    return {
      code: "structure_mismatch",
      reason: `${task.kind} task "${task.id}" received a ${candidate.kind} output`,
    };
  }

  const planned = normalizeProjectPath(task.path);
  const resolved = resolveCandidatePath(candidate.path, ctx.projectRoot);
  if (resolved !== planned) {
    return {
      code: "structure_mismatch",
      reason: `path "${resolved}" does not match the planned path "${planned}"`,
    };
  }

  switch (candidate.kind) {
    case "directory":
      if (candidate.content.trim() !== "") {
        return {
          code: "structure_mismatch",
          reason: "directory output must declare child names only, without content",
        };
      }
      for (const child of candidate.children) {
        if (toPosix(child).includes("/")) {
          return {
            code: "structure_mismatch",
            reason: `child "${child}" is a nested path, not a single name`,
          };
        }
      }
      return null;
    case "file":
    case "content-stub":
      return null;
  }
};

export const rejectDuplicatePath: ValidationRule = (_task, candidate, ctx) => {
  const resolved = resolveCandidatePath(candidate.path, ctx.projectRoot);
  if (ctx.acceptedPaths.has(resolved)) {
    return {
      code: "path_conflict",
      reason: `path "${resolved}" was already produced by an accepted task`,
    };
  }
  return null;
};

/** First failing rule wins. */
export const RULES: readonly ValidationRule[] = [
  requireContent,
  requireSafePath,
  requireStructure,
  rejectDuplicatePath,
];
