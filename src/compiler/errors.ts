export type Stage = "lex" | "parse" | "codegen";

/**
 * Base class for the three stage errors. A compile run stops at the first
 * one; `message` is the rendered diagnostic, `reason` the bare explanation.
 */
export class CompileError extends Error {
  constructor(
    public readonly stage: Stage,
    public readonly line: number,
    public readonly reason: string,
  ) {
    super(`${stage} error at line ${line}: ${reason}`);
    this.name = "CompileError";
  }
}

export class LexError extends CompileError {
  constructor(line: number, reason: string) {
    super("lex", line, reason);
    this.name = "LexError";
  }
}

export class ParseError extends CompileError {
  constructor(
    line: number,
    public readonly expected: string,
    public readonly found: string,
  ) {
    super("parse", line, `expected ${expected}, found ${found}`);
    this.name = "ParseError";
  }
}

export class CodegenError extends CompileError {
  constructor(line: number, reason: string) {
    super("codegen", line, reason);
    this.name = "CodegenError";
  }
}
