import type { RunEvent } from "../types.js";

const PREFIX = "[stubsmith]";

export const log = {
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  },
  warn(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  },
  error(message: string): void {
    console.error(`${PREFIX} ${message}`);
  },
};

/** One log line per engine event. Returns null for events not worth a line. */
export function describeEvent(event: RunEvent): string | null {
  switch (event.type) {
    case "plan-ready":
      return `${event.resumed ? "Resumed" : "Planned"} ${event.tasks} task(s)`;
    case "transition":
      if (event.to === "in-progress") return `Task ${event.taskId}: attempt ${event.attempt}`;
      if (event.to === "accepted") return `Task ${event.taskId}: accepted`;
      return null;
    case "rejected":
      return `Task ${event.taskId}: attempt ${event.attempt} rejected [${event.code}] ${event.reason}`;
    case "adapter-retry":
      return `Task ${event.taskId}: generation failed (${event.error}), retry ${event.retry} in ${event.delayMs}ms`;
    case "escalated":
      return `Task ${event.taskId} ran out of attempts; blocked: ${event.blocked.join(", ")}`;
    case "materialized":
      return `${event.dryRun ? "Would write" : "Wrote"} ${event.path}`;
    case "finished":
      return `Run ${event.result}${event.reportPath ? ` (report: ${event.reportPath})` : ""}`;
  }
}
