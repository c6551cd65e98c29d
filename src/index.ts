export { Lexer, tokenize, describeTok, KEYWORDS, DEFAULT_TAB_WIDTH } from "./dsl/tokenizer";
export type { Tok, TokKind, LexerOptions } from "./dsl/tokenizer";
export { parse } from "./dsl/parser";
export type {
  Program,
  Stmt,
  Expr,
  IfBranch,
  FunctionDef,
  LiteralValue,
  ArithOp,
  CmpOp,
  BinaryOp,
  UnaryOp,
} from "./dsl/ast";

export { CompileError, LexError, ParseError, CodegenError } from "./compiler/errors";
export type { Stage } from "./compiler/errors";
export { ARITH_OPCODES, CMP_OPCODES, jumpTargets } from "./compiler/tac";
export type { Instr, Opcode, Operand, NameOperand, TempOperand, LabelOperand, Target } from "./compiler/tac";
export { generate, collectFunctionNames, CodegenContext, LabelPool } from "./compiler/codegen";
export type { CodegenOptions, CodegenResult } from "./compiler/codegen";
export { compile, compileOrThrow, countStatements } from "./compiler/pipeline";
export type {
  CompileOptions,
  CompileResult,
  CompileSuccess,
  CompileFailure,
  CompileStats,
  StageReport,
} from "./compiler/pipeline";
export { formatInstr, formatListing, formatOperand, formatTokens, toRows } from "./compiler/listing";
export type { ListingRow } from "./compiler/listing";

export {
  CompilerOptionsSchema,
  CliConfigSchema,
  resolveOptions,
  loadConfig,
  loadProjectConfig,
  CONFIG_FILE_NAME,
} from "./runtime/config";
export type { CompilerOptions, CompilerOptionsInput, FunctionResolution, CliConfig, Emit, OutputFormat } from "./runtime/config";
export { compareFormats, deserialize, payloadFor, renderResult, serialize } from "./runtime/output";
export type { DataFormat, FormatComparison } from "./runtime/output";
export { RunLogger, StatsTracker, readEvents, readSummary } from "./runtime/logger";
export type { CompileEvent, RunSummary } from "./runtime/logger";
