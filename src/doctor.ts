import { execFileSync } from "node:child_process";
import { CONFIG_FILE, loadConfig } from "./config/loader.js";
import { errorMessage } from "./errors.js";
import type { StubsmithConfig } from "./types.js";

export interface DoctorCheck {
  name: string;
  status: "ok" | "warn" | "error";
  message: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  ok: boolean;
}

const MIN_NODE_MAJOR = 20;

export function checkNodeVersion(version: string = process.version): DoctorCheck {
  const raw = version.replace(/^v/, "");
  const major = Number.parseInt(raw.split(".")[0], 10);
  if (major >= MIN_NODE_MAJOR) {
    return { name: "Node.js", status: "ok", message: `v${raw}` };
  }
  return {
    name: "Node.js",
    status: "error",
    message: `v${raw} (>= ${MIN_NODE_MAJOR} required)`,
  };
}

function checkGenerator(config: StubsmithConfig): DoctorCheck {
  const { command } = config.generator;
  try {
    const out = execFileSync(command, ["--version"], {
      encoding: "utf-8",
      timeout: 5000,
    })
      .trim()
      .split("\n")[0];
    return { name: "generator", status: "ok", message: `${command} ${out}`.trim() };
  } catch {
    return {
      name: "generator",
      status: "error",
      message: `"${command} --version" failed (set generator.command in ${CONFIG_FILE})`,
    };
  }
}

export async function runDoctor(projectDir: string): Promise<DoctorResult> {
  const checks: DoctorCheck[] = [checkNodeVersion()];

  let config: StubsmithConfig | null = null;
  try {
    config = await loadConfig(projectDir);
    checks.push({ name: "config", status: "ok", message: "valid" });
  } catch (err) {
    checks.push({ name: "config", status: "error", message: errorMessage(err) });
  }

  if (config) {
    checks.push(checkGenerator(config));
  } else {
    checks.push({ name: "generator", status: "warn", message: "skipped (config invalid)" });
  }

  const ok = checks.every((c) => c.status !== "error");
  return { checks, ok };
}
