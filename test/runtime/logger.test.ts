import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunLogger, StatsTracker, readEvents, readSummary } from "../../src/runtime/logger";

describe("StatsTracker", () => {
  it("summarizes totals and stage timings", () => {
    const stats = new StatsTracker();
    stats.recordStage({ stage: "lex", durationMs: 1.5, count: 10 });
    stats.recordStage({ stage: "parse", durationMs: 2, count: 2 });
    stats.recordResult({ tokens: 10, statements: 2, instructions: 3, temps: 1, labels: 0, functions: 0 });
    expect(stats.getSummary()).toBe(
      "Tokens: 10 | Statements: 2 | Instructions: 3 | Temps: 1 | Labels: 0 | Functions: 0 | Time: lex 1.5ms, parse 2.0ms",
    );
    expect(stats.getSnapshot().stages).toHaveLength(2);
  });

  it("is empty before anything is recorded", () => {
    const stats = new StatsTracker();
    expect(stats.getSummary()).toBe("");
    expect(stats.getSnapshot().totals).toBeNull();
  });
});

describe("RunLogger", () => {
  let base: string;

  beforeEach(async () => {
    base = await fs.mkdtemp(path.join(os.tmpdir(), "tacc-runs-"));
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  it("writes meta, numbered events and a summary", async () => {
    const logger = new RunLogger(base);
    await logger.init({ source: "prog.sc" });
    await logger.logStage({ stage: "lex", durationMs: 0.5, count: 12 });
    await logger.logError("parse error at line 3: expected ':', found end of line", "parse", 3);
    await logger.logOutput("tac", "text", 42, "stdout");
    await logger.finalize(false);

    expect(logger.dir).toBe(path.join(base, logger.runId));

    const meta: unknown = JSON.parse(await fs.readFile(path.join(logger.dir, "meta.json"), "utf8"));
    expect(meta).toMatchObject({ runId: logger.runId, source: "prog.sc" });

    const events = await readEvents(logger.dir);
    expect(events.map((e) => [e.step, e.type])).toEqual([
      [1, "stage"],
      [2, "error"],
      [3, "output"],
    ]);
    expect(events[1]).toMatchObject({ stage: "parse", line: 3 });
    expect(events[2]).toMatchObject({ emit: "tac", format: "text", bytes: 42, target: "stdout" });

    expect(await readSummary(logger.dir)).toMatchObject({ runId: logger.runId, ok: false, eventCount: 3 });
  });

  it("has no summary until finalized", async () => {
    const logger = new RunLogger(base);
    await logger.init();
    expect(await readSummary(logger.dir)).toBeNull();
    expect(await readEvents(logger.dir)).toEqual([]);
  });
});
