import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Stage } from "../compiler/errors";
import type { CompileStats, StageReport } from "../compiler/pipeline";
import type { Emit, OutputFormat } from "./config";

// ============================================================================
// Event Types
// ============================================================================

export type CompileEvent =
  | { step: number; type: "stage"; stage: Stage; durationMs: number; count: number; ts: string }
  | { step: number; type: "error"; stage: Stage | null; line: number | null; error: string; ts: string }
  | { step: number; type: "output"; emit: Emit; format: OutputFormat; bytes: number; target: string; ts: string };

// ============================================================================
// Compile Statistics
// ============================================================================

export interface StatsSnapshot {
  elapsedMs: number;
  stages: StageReport[];
  totals: CompileStats | null;
}

export class StatsTracker {
  private stages: StageReport[] = [];
  private totals: CompileStats | null = null;
  private readonly startTime: number;

  constructor(now: number = Date.now()) {
    this.startTime = now;
  }

  recordStage(report: StageReport): void {
    this.stages.push(report);
  }

  recordResult(stats: CompileStats): void {
    this.totals = stats;
  }

  getSnapshot(): StatsSnapshot {
    return {
      elapsedMs: Date.now() - this.startTime,
      stages: [...this.stages],
      totals: this.totals,
    };
  }

  getSummary(): string {
    const parts: string[] = [];
    const t = this.totals;
    if (t) {
      parts.push(
        `Tokens: ${t.tokens}`,
        `Statements: ${t.statements}`,
        `Instructions: ${t.instructions}`,
        `Temps: ${t.temps}`,
        `Labels: ${t.labels}`,
        `Functions: ${t.functions}`,
      );
    }
    if (this.stages.length > 0) {
      parts.push(`Time: ${this.stages.map((s) => `${s.stage} ${s.durationMs.toFixed(1)}ms`).join(", ")}`);
    }
    return parts.join(" | ");
  }
}

// ============================================================================
// Run Logger
// ============================================================================

export class RunLogger {
  runId: string;
  dir: string;
  file: string;
  stats: StatsTracker;
  private eventCount: number = 0;

  constructor(baseDir: string) {
    this.runId = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
    this.dir = path.join(baseDir, this.runId);
    this.file = path.join(this.dir, "events.jsonl");
    this.stats = new StatsTracker();
  }

  async init(meta: Record<string, unknown> = {}): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.file, "", "utf8");

    const header = {
      runId: this.runId,
      startedAt: new Date().toISOString(),
      pid: process.pid,
      cwd: process.cwd(),
      ...meta,
    };
    await fs.writeFile(path.join(this.dir, "meta.json"), JSON.stringify(header, null, 2), "utf8");
  }

  async append(ev: CompileEvent): Promise<void> {
    this.eventCount++;
    await fs.appendFile(this.file, JSON.stringify(ev) + "\n", "utf8");
  }

  async logStage(report: StageReport): Promise<void> {
    await this.append({ step: this.eventCount + 1, type: "stage", ...report, ts: new Date().toISOString() });
  }

  async logError(error: string, stage: Stage | null = null, line: number | null = null): Promise<void> {
    await this.append({ step: this.eventCount + 1, type: "error", stage, line, error, ts: new Date().toISOString() });
  }

  async logOutput(emit: Emit, format: OutputFormat, bytes: number, target: string): Promise<void> {
    await this.append({
      step: this.eventCount + 1,
      type: "output",
      emit,
      format,
      bytes,
      target,
      ts: new Date().toISOString(),
    });
  }

  async finalize(ok: boolean): Promise<void> {
    const summary = {
      runId: this.runId,
      finishedAt: new Date().toISOString(),
      ok,
      stats: this.stats.getSnapshot(),
      eventCount: this.eventCount,
    };
    await fs.writeFile(path.join(this.dir, "summary.json"), JSON.stringify(summary, null, 2), "utf8");
  }
}

const RunSummarySchema = z.object({
  runId: z.string(),
  finishedAt: z.string(),
  ok: z.boolean(),
  eventCount: z.number().int().nonnegative(),
});

export type RunSummary = z.infer<typeof RunSummarySchema>;

/** The run's summary.json, or null when the run never finished. */
export async function readSummary(runDir: string): Promise<RunSummary | null> {
  let text: string;
  try {
    text = await fs.readFile(path.join(runDir, "summary.json"), "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
  return RunSummarySchema.parse(JSON.parse(text));
}

export async function readEvents(runDir: string): Promise<CompileEvent[]> {
  const content = await fs.readFile(path.join(runDir, "events.jsonl"), "utf8");
  return content
    .split("\n")
    .filter((line) => line.trim())
    .map((line): CompileEvent => JSON.parse(line));
}
