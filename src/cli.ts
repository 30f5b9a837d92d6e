#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/loader.js";
import { runDoctor } from "./doctor.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { run } from "./go/run.js";
import { formatRunReport, formatStatus, formatTaskDetail } from "./reporter/human.js";
import { formatJsonReport, formatJsonStatus } from "./reporter/json.js";
import { FileCheckpointStore } from "./state/checkpoint.js";
import type { PlanResult } from "./types.js";
import { describeEvent, log } from "./utils/log.js";

const __dirname_cli = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8"));
const cliPkgVersion =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

interface RunCommandOptions {
  plan?: string;
  resume?: string;
  fresh?: boolean;
  maxAttempts?: number;
  concurrency?: number;
  dryRun?: boolean;
  json?: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return n;
}

function exitCode(result: PlanResult): number {
  switch (result.kind) {
    case "completed":
      return 0;
    case "cancelled":
      return 130;
    case "partially-blocked":
    case "deadlocked":
      return 1;
  }
}

const program = new Command();

program
  .name("stubsmith")
  .description("stubsmith: turn a project goal into a validated directory scaffold")
  .version(cliPkgVersion);

// ── run command ────────────────────────────────────────────────────

program
  .command("run")
  .description("Plan the goal into tasks, generate each one, and write accepted output")
  .argument("[goal]", "Natural-language project goal", "")
  .option("--plan <file>", "Read the task list from a YAML/JSON file instead of generating it")
  .option("--resume <checkpoint>", "Resume from a specific checkpoint file")
  .option("--fresh", "Archive any existing checkpoint and start over")
  .option("--max-attempts <n>", "Attempts per task before it fails", positiveInt)
  .option("--concurrency <n>", "Independent tasks processed at once", positiveInt)
  .option("--dry-run", "Generate and validate, but write no files, checkpoint or report")
  .option("--json", "Output the result as JSON")
  .action(async (goal: string, opts: RunCommandOptions) => {
    const controller = new AbortController();
    const onSigint = (): void => {
      if (controller.signal.aborted) process.exit(130);
      log.warn("Cancelling; in-flight tasks will be reverted. Press Ctrl+C again to exit now.");
      controller.abort();
    };
    process.on("SIGINT", onSigint);

    try {
      const result = await run(goal, {
        projectDir: process.cwd(),
        planFile: opts.plan,
        resumeFrom: opts.resume,
        fresh: opts.fresh,
        maxAttempts: opts.maxAttempts,
        concurrency: opts.concurrency,
        dryRun: opts.dryRun,
        signal: controller.signal,
        onEvent: opts.json
          ? undefined
          : (event) => {
              const line = describeEvent(event);
              if (line) log.info(line);
            },
      });

      console.log(opts.json ? formatJsonReport(result) : `\n${formatRunReport(result)}`);
      if (opts.dryRun && !opts.json) log.info("Dry run: nothing was written.");
      process.exit(exitCode(result));
    } catch (err) {
      const prefix = err instanceof ConfigurationError ? "Configuration error" : "Error";
      log.error(`${prefix}: ${errorMessage(err)}`);
      process.exit(1);
    } finally {
      process.off("SIGINT", onSigint);
    }
  });

// ── status command ─────────────────────────────────────────────────

program
  .command("status")
  .description("Show the current checkpoint, or one task's history")
  .argument("[taskId]", "Show status and rejection history for this task")
  .option("--json", "Output the checkpoint as JSON")
  .action(async (taskId: string | undefined, opts: { json?: boolean }) => {
    try {
      const projectDir = process.cwd();
      const config = await loadConfig(projectDir);
      const store = FileCheckpointStore.inStateDir(resolve(projectDir, config.stateDir));
      const checkpoint = await store.load();
      if (!checkpoint) {
        console.log(opts.json ? "null" : "No checkpoint. Start with `stubsmith run <goal>`.");
        return;
      }
      if (taskId) {
        const task = checkpoint.plan.tasks.find((t) => t.id === taskId);
        if (!task) {
          log.error(`No task "${taskId}" in the checkpoint`);
          process.exit(1);
        }
        console.log(
          opts.json
            ? JSON.stringify(task, null, 2)
            : formatTaskDetail(task, checkpoint.plan.maxAttempts),
        );
        return;
      }
      console.log(opts.json ? formatJsonStatus(checkpoint) : formatStatus(checkpoint));
    } catch (err) {
      log.error(errorMessage(err));
      process.exit(1);
    }
  });

// ── doctor command ─────────────────────────────────────────────────

program
  .command("doctor")
  .description("Check Node.js, configuration and the generator command")
  .action(async () => {
    const { checks, ok } = await runDoctor(process.cwd());

    console.log("## stubsmith environment\n");
    for (const check of checks) {
      const mark = check.status === "ok" ? "✓" : check.status === "warn" ? "!" : "✗";
      console.log(`  ${mark} ${check.name}: ${check.message}`);
    }

    const issues = checks.filter((c) => c.status === "error");
    console.log("");
    if (ok) {
      console.log("All checks passed.");
      process.exit(0);
    }
    console.log(`${issues.length} issue${issues.length === 1 ? "" : "s"} found.`);
    process.exit(1);
  });

program.parseAsync().catch((err: unknown) => {
  log.error(errorMessage(err));
  process.exit(1);
});
