import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { nextJsonCounter } from "./audit/counter.js";
import type { AuditEvent, AuditLog } from "./types.js";

const MAX_STRING = 50_000;

// Build output and raw oracle replies can be large; clip every string field.
const clipStrings = (value: unknown): unknown => {
  if (typeof value === "string") {
    return value.length > MAX_STRING ? `${value.slice(0, MAX_STRING)}...<truncated>` : value;
  }
  if (Array.isArray(value)) return value.map(clipStrings);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, clipStrings(inner)]));
  }
  return value;
};

export class AuditCollector {
  private readonly projectPath: string;
  private readonly startedAt = new Date().toISOString();
  private readonly events: AuditEvent[] = [];

  constructor(projectPath: string) {
    this.projectPath = projectPath;
  }

  record(kind: AuditEvent["kind"], data: unknown): void {
    this.events.push({ kind, data: clipStrings(data), ts: Date.now() });
  }

  /** Writes `<dir>/NNNN.json`, numbered after the highest existing log. */
  async flush(dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const counter = await nextJsonCounter(dir);
    const path = join(dir, `${String(counter).padStart(4, "0")}.json`);
    const log: AuditLog = { projectPath: this.projectPath, startedAt: this.startedAt, events: this.events };
    await writeFile(path, `${JSON.stringify(log, null, 2)}\n`, "utf8");
    return path;
  }
}
