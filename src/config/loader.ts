import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigurationError, errorMessage } from "../errors.js";
import { stubsmithConfigSchema } from "./schema.js";
import type { StubsmithConfig } from "../types.js";

export const CONFIG_FILE = ".stubsmith.json";

/** Values supplied on the command line; they win over the config file. */
export interface ConfigOverrides {
  maxAttempts?: number;
  concurrency?: number;
  outputDir?: string;
}

export async function loadConfig(
  projectDir: string = process.cwd(),
  overrides: ConfigOverrides = {},
): Promise<StubsmithConfig> {
  let raw: Record<string, unknown> = {};

  try {
    const content = await readFile(join(projectDir, CONFIG_FILE), "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`${CONFIG_FILE} must contain a JSON object`);
    }
    raw = { ...parsed };
  } catch (err: unknown) {
    if (
      typeof err === "object" &&
      err !== null &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      // No config file: use defaults
    } else if (err instanceof ConfigurationError) {
      throw err;
    } else {
      throw new ConfigurationError(`Could not read ${CONFIG_FILE}: ${errorMessage(err)}`);
    }
  }

  return parseWithOverrides(raw, overrides);
}

/** Apply command-line overrides to an already loaded config. */
export function withOverrides(
  config: StubsmithConfig,
  overrides: ConfigOverrides,
): StubsmithConfig {
  return parseWithOverrides({ ...config }, overrides);
}

function parseWithOverrides(
  raw: Record<string, unknown>,
  overrides: ConfigOverrides,
): StubsmithConfig {
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const result = stubsmithConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${CONFIG_FILE}: ${issues}`, { issues: result.error.issues });
  }
  return result.data;
}
