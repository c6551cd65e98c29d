#!/usr/bin/env tsx
import fs from "node:fs/promises";
import path from "node:path";
import { compile, type StageReport } from "./compiler/pipeline";
import { RunLogger, StatsTracker, readEvents, readSummary } from "./runtime/logger";
import {
  CliConfigSchema,
  EmitSchema,
  OutputFormatSchema,
  loadConfig,
  loadProjectConfig,
  type CliConfig,
  type CliConfigInput,
} from "./runtime/config";
import { compareFormats, payloadFor, renderResult } from "./runtime/output";

// ============================================================================
// CLI Argument Parsing
// ============================================================================

const argv = process.argv;

function argValue(flag: string): string | null {
  const idx = argv.indexOf(flag);
  if (idx === -1) return null;
  const nextArg = argv[idx + 1];
  if (!nextArg || nextArg.startsWith("--")) return null;
  return nextArg;
}

function hasFlag(flag: string): boolean {
  return argv.includes(flag);
}

function printUsage(): void {
  console.log(`
tacc - compile indentation-structured scripts to three-address code

Usage:
  tacc compile <file> [options]     Compile a source file
  tacc <file> [options]             Same as compile
  tacc replay <runId>               Show the event timeline of a logged run

Options:
  --emit <what>           tac, ast or tokens (default: tac)
  --format <fmt>          text, json or toon (default: text)
  --out <file>            Write the output to a file instead of stdout
  --tab-width <n>         Columns per tab when measuring indentation (default: 8)
  --reuse-labels          Recycle label names across function bodies
  --declared-before-use   Reject calls that precede the function's definition
  --config <file>         JSON config file (default: <project>/tacc.config.json)
  --project <dir>         Project root directory (default: cwd)
  --no-log                Do not write a run log under <project>/.tacc-runs
  --verbose               Print configuration and compile statistics

Examples:
  tacc compile examples/loop.sc
  tacc examples/loop.sc --emit ast --format json
  tacc compile examples/loop.sc --format toon --out build/loop.toon
  tacc replay 1700000000000-abc123
`);
}

function flagOverrides(): CliConfigInput {
  const overrides: CliConfigInput = {};
  const tabWidth = argValue("--tab-width");
  if (tabWidth !== null) overrides.tabWidth = Number(tabWidth);
  if (hasFlag("--reuse-labels")) overrides.reuseLabels = true;
  if (hasFlag("--declared-before-use")) overrides.functionResolution = "declared-before-use";
  const emit = argValue("--emit");
  if (emit !== null) overrides.emit = EmitSchema.parse(emit);
  const format = argValue("--format");
  if (format !== null) overrides.format = OutputFormatSchema.parse(format);
  if (hasFlag("--no-log")) overrides.log = false;
  return overrides;
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[tacc] Error: ${message}`);
  process.exit(1);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const cmd = argv[2];

  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
    printUsage();
    process.exit(0);
  }

  if (cmd === "replay") {
    await handleReplay();
    return;
  }

  const file = cmd === "compile" ? argv[3] : cmd;
  if (!file || file.startsWith("--")) {
    console.error("Error: Missing <file>");
    printUsage();
    process.exit(1);
  }

  await handleCompile(file);
}

async function handleCompile(file: string): Promise<void> {
  const projectRoot = path.resolve(argValue("--project") ?? process.cwd());
  const configFile = argValue("--config");
  const outFile = argValue("--out");
  const verbose = hasFlag("--verbose");

  let config: CliConfig;
  let src: string;
  try {
    const fileConfig = configFile ? await loadConfig(configFile) : await loadProjectConfig(projectRoot);
    config = CliConfigSchema.parse({ ...fileConfig, ...flagOverrides() });
    src = await fs.readFile(file, "utf8");
  } catch (error: unknown) {
    fail(error);
  }

  if (verbose) {
    console.error("[tacc] Configuration:");
    console.error(`       Project: ${projectRoot}`);
    console.error(`       Emit: ${config.emit} (${config.format})`);
    console.error(`       Tab width: ${config.tabWidth}`);
    console.error(`       Reuse labels: ${config.reuseLabels}`);
    console.error(`       Function resolution: ${config.functionResolution}`);
    console.error("");
  }

  const logger = config.log ? new RunLogger(path.resolve(projectRoot, config.logDir)) : null;
  await logger?.init({ source: path.resolve(file), config });
  const stats = logger?.stats ?? new StatsTracker();

  const reports: StageReport[] = [];
  const result = compile(src, {
    tabWidth: config.tabWidth,
    reuseLabels: config.reuseLabels,
    functionResolution: config.functionResolution,
    onStage: (report) => reports.push(report),
  });

  for (const report of reports) {
    stats.recordStage(report);
    await logger?.logStage(report);
  }

  if (!result.ok) {
    const { error } = result;
    await logger?.logError(error.message, error.stage, error.line);
    await logger?.finalize(false);
    console.error(`[tacc] Error: ${error.message}`);
    if (logger) console.error(`[tacc] Logs: ${logger.dir}`);
    process.exit(1);
  }

  stats.recordResult(result.stats);
  const output = renderResult(result, config.emit, config.format);

  try {
    if (outFile) {
      await fs.mkdir(path.dirname(path.resolve(outFile)), { recursive: true });
      await fs.writeFile(outFile, output + "\n", "utf8");
      console.error(`[tacc] Compiled: ${file} → ${outFile}`);
    } else {
      console.log(output);
    }
    await logger?.logOutput(config.emit, config.format, Buffer.byteLength(output, "utf8"), outFile ?? "stdout");
  } catch (error: unknown) {
    await logger?.logError(error instanceof Error ? error.message : String(error));
    await logger?.finalize(false);
    fail(error);
  }

  if (verbose) {
    console.error(`[tacc] Stats: ${stats.getSummary()}`);
    if (config.format === "toon") {
      const cmp = compareFormats(payloadFor(result, config.emit));
      console.error(`[tacc] TOON: ${cmp.toonBytes} bytes vs JSON ${cmp.jsonBytes} bytes (${cmp.savedPercent}% smaller)`);
    }
    if (logger) console.error(`[tacc] Logs: ${logger.dir}`);
  }

  await logger?.finalize(true);
}

async function handleReplay(): Promise<void> {
  const runId = argv[3];

  if (!runId) {
    console.error("Error: Missing <runId>");
    printUsage();
    process.exit(1);
  }

  const project = argValue("--project") ?? process.cwd();
  const projectRoot = path.resolve(project);

  try {
    const fileConfig = await loadProjectConfig(projectRoot);
    const config = CliConfigSchema.parse(fileConfig);
    const runDir = path.join(projectRoot, config.logDir, runId);

    const events = await readEvents(runDir);
    const summary = await readSummary(runDir);

    console.log(`\n=== Replay: ${runId} ===\n`);

    if (summary) {
      console.log(`Finished: ${summary.finishedAt}`);
      console.log(`Result: ${summary.ok ? "ok" : "failed"}`);
      console.log(`Events: ${summary.eventCount}`);
      console.log("");
    }

    console.log("Timeline:\n");

    for (const event of events) {
      if (event.type === "stage") {
        console.log(`[${event.step}] ${event.stage}: ${event.count} items (${event.durationMs.toFixed(2)}ms)`);
      } else if (event.type === "output") {
        console.log(`[${event.step}] OUTPUT: ${event.emit} as ${event.format} → ${event.target} (${event.bytes} bytes)`);
      } else {
        const where = event.stage ? ` ${event.stage}${event.line !== null ? `:${event.line}` : ""}` : "";
        console.log(`[${event.step}] ERROR${where}: ${event.error}`);
      }
    }

    console.log(`\n=== End Replay ===\n`);
    console.log(`Full logs: ${runDir}`);
  } catch (error: unknown) {
    fail(error);
  }
}

await main();
