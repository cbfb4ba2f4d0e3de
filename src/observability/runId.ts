import { randomUUID } from "node:crypto";

/** `harvest_<compact UTC time>_<6 hex chars>`, shared by every log line of one command. */
export function createRunId(now = new Date()): string {
  return `harvest_${now.toISOString().replace(/[-:.]/g, "")}_${randomUUID().slice(0, 6)}`;
}
