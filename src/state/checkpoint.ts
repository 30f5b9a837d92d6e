import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { dirname, join } from "node:path";
import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { ConfigurationError, errorMessage } from "../errors.js";
import { CHECKPOINT_VERSION, checkpointSchema } from "../plan/schemas.js";
import type { CheckpointData } from "../plan/schemas.js";
import type { ProjectPlan } from "../plan/types.js";
import { detectCycles, findDanglingEdges, findDuplicateIds } from "../plan/validator.js";

/** A persisted plan snapshot plus its bookkeeping timestamps. */
export interface Checkpoint {
  createdAt: string;
  updatedAt: string;
  plan: ProjectPlan;
}

/** Where checkpoints live. The tracker only ever talks to this interface. */
export interface CheckpointStore {
  load(): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
  /** Move the checkpoint out of the way after a completed run. Returns the archive path, if any. */
  archive(): Promise<string | null>;
  remove(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function toCheckpointData(checkpoint: Checkpoint): CheckpointData {
  const { plan } = checkpoint;
  return {
    version: CHECKPOINT_VERSION,
    createdAt: checkpoint.createdAt,
    updatedAt: checkpoint.updatedAt,
    goal: plan.goal,
    maxAttempts: plan.maxAttempts,
    acceptanceOrder: [...plan.acceptanceOrder],
    tasks: structuredClone(plan.tasks),
  };
}

export function fromCheckpointData(data: CheckpointData): Checkpoint {
  return {
    createdAt: data.createdAt,
    updatedAt: data.updatedAt,
    plan: {
      goal: data.goal,
      maxAttempts: data.maxAttempts,
      acceptanceOrder: data.acceptanceOrder,
      tasks: data.tasks,
    },
  };
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return yamlStringify(toCheckpointData(checkpoint));
}

/**
 * Hold a loaded plan to the same graph rules as a new one: unique IDs, no
 * dangling dependencies, no cycles. Throws ConfigurationError.
 */
export function checkPlanGraph(plan: ProjectPlan, source = "checkpoint"): void {
  const duplicates = findDuplicateIds(plan.tasks);
  if (duplicates.length > 0) {
    throw new ConfigurationError(`${source} has duplicate task IDs: ${duplicates.join(", ")}`, {
      duplicates,
    });
  }

  const dangling = findDanglingEdges(plan.tasks);
  if (dangling.length > 0) {
    const { from, to } = dangling[0];
    throw new ConfigurationError(`${source}: task "${from}" depends on non-existent task "${to}"`, {
      dangling,
    });
  }

  const cycle = detectCycles(plan.tasks);
  if (cycle) {
    throw new ConfigurationError(`${source} has a task dependency cycle: ${cycle.join(" → ")}`, {
      cycle,
    });
  }
}

/** Parse and validate checkpoint YAML. Throws ConfigurationError on bad input. */
export function parseCheckpoint(raw: string, source = "checkpoint"): Checkpoint {
  let data: unknown;
  try {
    data = yamlParse(raw);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid YAML: ${errorMessage(err)}`);
  }
  const result = checkpointSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`${source} is malformed: ${issues}`);
  }
  const checkpoint = fromCheckpointData(result.data);
  checkPlanGraph(checkpoint.plan, source);
  return checkpoint;
}

// ---------------------------------------------------------------------------
// File store
// ---------------------------------------------------------------------------

async function atomicWrite(targetPath: string, content: string): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
  const temp = `${targetPath}.${randomUUID()}.tmp`;
  await writeFile(temp, content, "utf-8");
  await rename(temp, targetPath);
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Archive file name for a given timestamp: colons and dots are not filename-safe everywhere. */
export function archiveName(at: Date): string {
  return `checkpoint-${at.toISOString().replace(/[:.]/g, "-")}.yaml`;
}

/** YAML checkpoint at `<stateDir>/checkpoint.yaml`, archived to `<stateDir>/archive/`. */
export class FileCheckpointStore implements CheckpointStore {
  readonly path: string;
  private readonly archiveDir: string;
  private readonly keepArchive: boolean;

  constructor(opts: { path: string; archiveDir?: string; keepArchive?: boolean }) {
    this.path = opts.path;
    this.archiveDir = opts.archiveDir ?? join(dirname(opts.path), "archive");
    this.keepArchive = opts.keepArchive ?? true;
  }

  static inStateDir(stateDir: string, keepArchive = true): FileCheckpointStore {
    return new FileCheckpointStore({ path: join(stateDir, "checkpoint.yaml"), keepArchive });
  }

  async load(): Promise<Checkpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return parseCheckpoint(raw, this.path);
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    await atomicWrite(this.path, serializeCheckpoint(checkpoint));
  }

  async archive(): Promise<string | null> {
    if (!this.keepArchive) {
      await this.remove();
      return null;
    }
    const target = join(this.archiveDir, archiveName(new Date()));
    await mkdir(this.archiveDir, { recursive: true });
    try {
      await rename(this.path, target);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return target;
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

/**
 * Seeded from another store on first load; every later save stays in memory.
 * Used by dry runs so the real checkpoint is never touched.
 */
export class DetachedCheckpointStore implements CheckpointStore {
  private readonly source: CheckpointStore;
  private current: Checkpoint | null | undefined;

  constructor(source: CheckpointStore) {
    this.source = source;
  }

  async load(): Promise<Checkpoint | null> {
    if (this.current === undefined) {
      this.current = await this.source.load();
    }
    return this.current ? structuredClone(this.current) : null;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.current = structuredClone(checkpoint);
  }

  async archive(): Promise<string | null> {
    this.current = null;
    return null;
  }

  async remove(): Promise<void> {
    this.current = null;
  }
}
