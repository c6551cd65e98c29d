import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const FunctionResolutionSchema = z.enum(["hoisted", "declared-before-use"]);

export const CompilerOptionsSchema = z.object({
  tabWidth: z.number().int().min(1).max(16).default(8),
  reuseLabels: z.boolean().default(false),
  functionResolution: FunctionResolutionSchema.default("hoisted"),
});

export const OutputFormatSchema = z.enum(["text", "json", "toon"]);
export const EmitSchema = z.enum(["tac", "ast", "tokens"]);

export const CliConfigSchema = CompilerOptionsSchema.extend({
  emit: EmitSchema.default("tac"),
  format: OutputFormatSchema.default("text"),
  log: z.boolean().default(true),
  logDir: z.string().min(1).default(".tacc-runs"),
});

// A config file may set any subset; unknown keys are rejected so typos surface.
export const CliConfigFileSchema = CliConfigSchema.partial().strict();

export const CONFIG_FILE_NAME = "tacc.config.json";

export type FunctionResolution = z.infer<typeof FunctionResolutionSchema>;
export type CompilerOptions = z.infer<typeof CompilerOptionsSchema>;
export type CompilerOptionsInput = z.input<typeof CompilerOptionsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Emit = z.infer<typeof EmitSchema>;
export type CliConfig = z.infer<typeof CliConfigSchema>;
export type CliConfigInput = z.infer<typeof CliConfigFileSchema>;

export function resolveOptions(input: CompilerOptionsInput = {}): CompilerOptions {
  return CompilerOptionsSchema.parse(input);
}

export async function loadConfig(file: string): Promise<CliConfigInput> {
  const json = await fs.readFile(file, "utf8");
  return CliConfigFileSchema.parse(JSON.parse(json));
}

/** Reads `tacc.config.json` from the project root, or returns an empty config when there is none. */
export async function loadProjectConfig(projectRoot: string): Promise<CliConfigInput> {
  const file = path.join(projectRoot, CONFIG_FILE_NAME);
  let json: string;
  try {
    json = await fs.readFile(file, "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
    throw error;
  }
  return CliConfigFileSchema.parse(JSON.parse(json));
}
