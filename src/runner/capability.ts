import { spawn } from "node:child_process";

/**
 * The external text-generation service. Implementations may take arbitrarily
 * long and may fail; callers handle both.
 */
export interface GenerationCapability {
  generate(prompt: string, context: string, signal?: AbortSignal): Promise<string>;
}

export interface CliCapabilityOptions {
  command: string;
  args: string[];
  timeoutMs: number;
  cwd?: string;
}

/**
 * Generation backed by a CLI process: prompt and context go to stdin,
 * the response is whatever the process prints on stdout.
 */
export function createCliCapability(opts: CliCapabilityOptions): GenerationCapability {
  return {
    generate(prompt, context, signal) {
      return new Promise((resolve, reject) => {
        if (signal?.aborted) {
          reject(new Error("Generation aborted"));
          return;
        }

        // Strip CLAUDECODE so a nested claude process can start from inside a session
        const env = { ...process.env };
        delete env.CLAUDECODE;

        const child = spawn(opts.command, opts.args, {
          cwd: opts.cwd,
          env,
          stdio: ["pipe", "pipe", "pipe"],
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let settled = false;

        const finish = (err: Error | null, text?: string): void => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          if (err) reject(err);
          else resolve(text ?? "");
        };

        const onAbort = (): void => {
          child.kill("SIGTERM");
          finish(new Error("Generation aborted"));
        };

        const timer = setTimeout(() => {
          child.kill("SIGTERM");
          finish(new Error(`${opts.command} timed out after ${opts.timeoutMs / 1000}s`));
        }, opts.timeoutMs);

        signal?.addEventListener("abort", onAbort, { once: true });

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
        child.on("error", (err) => finish(err));
        child.on("close", (code) => {
          if (code === 0) {
            finish(null, Buffer.concat(stdout).toString("utf-8"));
            return;
          }
          const detail = Buffer.concat(stderr).toString("utf-8").trim();
          finish(
            new Error(
              `${opts.command} exited with code ${code ?? "null"}${detail ? `: ${detail.slice(0, 500)}` : ""}`,
            ),
          );
        });

        child.stdin.on("error", (err) => finish(err));
        child.stdin.write(context ? `${prompt}\n\n${context}` : prompt);
        child.stdin.end();
      });
    },
  };
}
