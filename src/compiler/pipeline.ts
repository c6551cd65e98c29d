import type { Program, Stmt } from "../dsl/ast";
import { parse } from "../dsl/parser";
import { tokenize, type Tok } from "../dsl/tokenizer";
import { resolveOptions, type CompilerOptionsInput } from "../runtime/config";
import { generate } from "./codegen";
import { CompileError, type Stage } from "./errors";
import type { Instr } from "./tac";

export type StageReport = { stage: Stage; durationMs: number; count: number };

export type CompileOptions = CompilerOptionsInput & {
  /** Called synchronously after each stage that completes. */
  onStage?: (report: StageReport) => void;
};

export interface CompileStats {
  tokens: number;
  statements: number;
  instructions: number;
  temps: number;
  labels: number;
  functions: number;
}

export type CompileSuccess = {
  ok: true;
  tokens: Tok[];
  ast: Program;
  code: Instr[];
  stats: CompileStats;
};

export type CompileFailure = { ok: false; error: CompileError };

export type CompileResult = CompileSuccess | CompileFailure;

export function countStatements(body: Stmt[]): number {
  let n = 0;
  for (const s of body) {
    n++;
    switch (s.type) {
      case "If":
        for (const b of s.branches) n += countStatements(b.body);
        if (s.elseBody) n += countStatements(s.elseBody);
        break;
      case "While":
      case "For":
      case "FunctionDef":
        n += countStatements(s.body);
        break;
      default:
        break;
    }
  }
  return n;
}

/**
 * Source text → TAC. Throws the first `CompileError` of the run; every call
 * builds its own lexer, parser cursor and codegen context.
 */
export function compileOrThrow(source: string, options: CompileOptions = {}): CompileSuccess {
  const { onStage, ...rest } = options;
  const opts = resolveOptions(rest);

  const timed = <T>(stage: Stage, run: () => T, count: (value: T) => number): T => {
    const started = performance.now();
    const value = run();
    onStage?.({ stage, durationMs: performance.now() - started, count: count(value) });
    return value;
  };

  const tokens = timed("lex", () => tokenize(source, { tabWidth: opts.tabWidth }), (t) => t.length);
  const ast = timed("parse", () => parse(tokens), (p) => countStatements(p.body));
  const gen = timed(
    "codegen",
    () => generate(ast, { reuseLabels: opts.reuseLabels, functionResolution: opts.functionResolution }),
    (g) => g.code.length,
  );

  return {
    ok: true,
    tokens,
    ast,
    code: gen.code,
    stats: {
      tokens: tokens.length,
      statements: countStatements(ast.body),
      instructions: gen.code.length,
      temps: gen.temps,
      labels: gen.labels,
      functions: gen.functions.length,
    },
  };
}

/** Like `compileOrThrow`, but a stage error becomes a `{ ok: false }` result. */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  try {
    return compileOrThrow(source, options);
  } catch (error: unknown) {
    if (error instanceof CompileError) return { ok: false, error };
    throw error;
  }
}
