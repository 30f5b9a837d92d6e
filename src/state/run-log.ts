import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { formatRunReport } from "../reporter/human.js";
import type { PlanResult } from "../types.js";

/** Directory name for a run started at `at`. */
export function runDirName(at: Date): string {
  return at.toISOString().replace(/[:.]/g, "-");
}

/** Write `<stateDir>/runs/<timestamp>/report.md`. Returns its path. */
export async function writeRunReport(
  stateDir: string,
  result: PlanResult,
  at: Date = new Date(),
): Promise<string> {
  const dir = join(stateDir, "runs", runDirName(at));
  await mkdir(dir, { recursive: true });
  const path = join(dir, "report.md");
  await writeFile(path, `${formatRunReport(result)}\n`, "utf-8");
  return path;
}
