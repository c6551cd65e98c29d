import type { Program, Stmt, Expr, FunctionDef, LiteralValue, ArithOp, CmpOp } from "../dsl/ast";
import type { FunctionResolution } from "../runtime/config";
import { CodegenError } from "./errors";
import {
  ARITH_OPCODES,
  CMP_OPCODES,
  intConst,
  labelRef,
  nameOf,
  type Instr,
  type NameOperand,
  type Opcode,
  type Operand,
  type Target,
  type TempOperand,
} from "./tac";

export interface CodegenOptions {
  reuseLabels: boolean;
  functionResolution: FunctionResolution;
}

const DEFAULT_CODEGEN_OPTIONS: CodegenOptions = {
  reuseLabels: false,
  functionResolution: "hoisted",
};

export interface CodegenResult {
  code: Instr[];
  /** Number of temporaries allocated. */
  temps: number;
  /** Number of distinct label names handed out. */
  labels: number;
  functions: string[];
}

// ============================================================================
// Labels
// ============================================================================

/**
 * Hands out `L<n>` names. Labels acquired while a function scope is open are
 * only referenced inside that function, so with reuse enabled they return to
 * the free list when the scope closes and the next function takes the lowest
 * free id. Top-level code always takes a fresh id, since a function defined
 * inside a top-level `if` or `while` is emitted in the middle of it. Only
 * distinct functions ever share a label name.
 */
export class LabelPool {
  private counter = 0;
  private free: number[] = [];
  private scopes: number[][] = [];

  constructor(private readonly reuse: boolean) {}

  acquire(): string {
    const scope = this.scopes[this.scopes.length - 1];
    const id = (scope ? this.free.shift() : undefined) ?? ++this.counter;
    scope?.push(id);
    return `L${id}`;
  }

  openScope(): void {
    this.scopes.push([]);
  }

  closeScope(): void {
    const ids = this.scopes.pop() ?? [];
    if (!this.reuse) return;
    this.free = [...this.free, ...ids].sort((a, b) => a - b);
  }

  get allocated(): number {
    return this.counter;
  }
}

// ============================================================================
// Context
// ============================================================================

/** All mutable state of one lowering run. Never shared between runs. */
export class CodegenContext {
  readonly code: Instr[] = [];
  readonly labels: LabelPool;
  /** Source identifiers map to themselves; temporaries live in their own `$` namespace. */
  readonly symbols = new Map<string, string>();
  readonly functions = new Set<string>();
  readonly deferred: FunctionDef[] = [];
  currentFunction: string | null = null;
  private tempCount = 0;

  constructor(options: CodegenOptions) {
    this.labels = new LabelPool(options.reuseLabels);
  }

  get temps(): number {
    return this.tempCount;
  }

  newTemp(): TempOperand {
    return { kind: "temp", name: `$t${++this.tempCount}` };
  }

  newLabel(): string {
    return this.labels.acquire();
  }

  declare(name: string): NameOperand {
    this.symbols.set(name, name);
    return nameOf(name);
  }

  resolve(name: string): NameOperand {
    return nameOf(this.symbols.get(name) ?? name);
  }

  emit(op: Opcode, args: Operand[], line: number, result?: Target): void {
    const instr: Instr = { op, args, line };
    if (result) instr.result = result;
    this.code.push(instr);
  }

  emitLabel(label: string, line: number): void {
    this.code.push({ op: "LABEL", args: [], label, line });
  }
}

// ============================================================================
// Entry point
// ============================================================================

export function generate(program: Program, options: Partial<CodegenOptions> = {}): CodegenResult {
  const opts = { ...DEFAULT_CODEGEN_OPTIONS, ...options };
  const ctx = new CodegenContext(opts);

  if (opts.functionResolution === "hoisted") {
    for (const name of collectFunctionNames(program.body)) ctx.functions.add(name);
  }

  lowerBlock(ctx, program.body);

  return {
    code: ctx.code,
    temps: ctx.temps,
    labels: ctx.labels.allocated,
    functions: [...ctx.functions],
  };
}

/** Every function name defined anywhere in the tree, in source order. */
export function collectFunctionNames(body: Stmt[]): string[] {
  const names: string[] = [];
  const visit = (stmts: Stmt[]): void => {
    for (const s of stmts) {
      switch (s.type) {
        case "FunctionDef":
          names.push(s.name);
          visit(s.body);
          break;
        case "If":
          for (const b of s.branches) visit(b.body);
          if (s.elseBody) visit(s.elseBody);
          break;
        case "While":
        case "For":
          visit(s.body);
          break;
        default:
          break;
      }
    }
  };
  visit(body);
  return names;
}

// ============================================================================
// Statements
// ============================================================================

function lowerBlock(ctx: CodegenContext, body: Stmt[]): void {
  for (const s of body) lowerStmt(ctx, s);
}

function lowerStmt(ctx: CodegenContext, s: Stmt): void {
  switch (s.type) {
    case "Assign": {
      const value = lowerExpr(ctx, s.value);
      ctx.emit("ASSIGN", [value], s.line, ctx.declare(s.target));
      return;
    }
    case "ExprStmt":
      lowerExpr(ctx, s.expr);
      return;
    case "Print": {
      const args = s.args.map((a) => lowerExpr(ctx, a));
      ctx.emit("PRINT", args, s.line);
      return;
    }
    case "Return": {
      const args = s.value ? [lowerExpr(ctx, s.value)] : [];
      ctx.emit("RETURN", args, s.line);
      return;
    }
    case "If":
      lowerIf(ctx, s);
      return;
    case "While":
      lowerWhile(ctx, s);
      return;
    case "For":
      lowerFor(ctx, s);
      return;
    case "FunctionDef":
      ctx.functions.add(s.name);
      // Function blocks never nest in the output: inner definitions follow the outer FUNC_END.
      if (ctx.currentFunction !== null) {
        ctx.deferred.push(s);
        return;
      }
      lowerFunction(ctx, s);
      return;
  }
}

function lowerIf(ctx: CodegenContext, s: Extract<Stmt, { type: "If" }>): void {
  const end = ctx.newLabel();
  for (const branch of s.branches) {
    const cond = lowerExpr(ctx, branch.cond);
    const next = ctx.newLabel();
    ctx.emit("IF_FALSE_GOTO", [cond, labelRef(next)], branch.cond.line);
    lowerBlock(ctx, branch.body);
    ctx.emit("GOTO", [labelRef(end)], branch.cond.line);
    ctx.emitLabel(next, branch.cond.line);
  }
  if (s.elseBody) lowerBlock(ctx, s.elseBody);
  ctx.emitLabel(end, s.line);
}

function lowerWhile(ctx: CodegenContext, s: Extract<Stmt, { type: "While" }>): void {
  const start = ctx.newLabel();
  const end = ctx.newLabel();
  ctx.emitLabel(start, s.line);
  const cond = lowerExpr(ctx, s.cond);
  ctx.emit("IF_FALSE_GOTO", [cond, labelRef(end)], s.line);
  lowerBlock(ctx, s.body);
  ctx.emit("GOTO", [labelRef(start)], s.line);
  ctx.emitLabel(end, s.line);
}

/**
 * `for v in range(start, stop, step)` becomes a counter loop. The bounds are
 * evaluated once, before the loop. A constant step fixes the comparison
 * direction; otherwise the sign is tested at run time on every check.
 */
function lowerFor(ctx: CodegenContext, s: Extract<Stmt, { type: "For" }>): void {
  const line = s.line;
  const start = lowerExpr(ctx, s.start);
  const stop = pin(ctx, lowerExpr(ctx, s.stop), line);

  const constStep = numericConstant(s.step);
  if (constStep !== null && constStep.value === 0) {
    throw new CodegenError(s.step.line, "range() step must not be zero");
  }
  const step = constStep ?? pin(ctx, lowerExpr(ctx, s.step), line);

  let positive: TempOperand | null = null;
  if (constStep === null) {
    positive = ctx.newTemp();
    ctx.emit("CMP_GT", [step, intConst(0)], line, positive);
  }

  const loopVar = ctx.declare(s.var);
  ctx.emit("ASSIGN", [start], line, loopVar);

  const top = ctx.newLabel();
  const end = ctx.newLabel();
  ctx.emitLabel(top, line);

  const cond = ctx.newTemp();
  if (positive === null) {
    const ascending = constStep !== null && constStep.value > 0;
    ctx.emit(ascending ? "CMP_LT" : "CMP_GT", [loopVar, stop], line, cond);
  } else {
    const descending = ctx.newLabel();
    const check = ctx.newLabel();
    ctx.emit("IF_FALSE_GOTO", [positive, labelRef(descending)], line);
    ctx.emit("CMP_LT", [loopVar, stop], line, cond);
    ctx.emit("GOTO", [labelRef(check)], line);
    ctx.emitLabel(descending, line);
    ctx.emit("CMP_GT", [loopVar, stop], line, cond);
    ctx.emitLabel(check, line);
  }
  ctx.emit("IF_FALSE_GOTO", [cond, labelRef(end)], line);

  lowerBlock(ctx, s.body);

  ctx.emit("ADD", [loopVar, step], line, loopVar);
  ctx.emit("GOTO", [labelRef(top)], line);
  ctx.emitLabel(end, line);
}

function lowerFunction(ctx: CodegenContext, s: FunctionDef): void {
  ctx.currentFunction = s.name;
  ctx.labels.openScope();

  const params = s.params.map((p) => ctx.declare(p));
  ctx.emit("FUNC_BEGIN", [nameOf(s.name), ...params], s.line);
  lowerBlock(ctx, s.body);

  const last = s.body[s.body.length - 1];
  const endLine = last?.line ?? s.line;
  if (last?.type !== "Return") ctx.emit("RETURN", [], endLine);
  ctx.emit("FUNC_END", [nameOf(s.name)], endLine);

  ctx.labels.closeScope();
  ctx.currentFunction = null;

  for (let next = ctx.deferred.shift(); next; next = ctx.deferred.shift()) {
    lowerFunction(ctx, next);
  }
}

// ============================================================================
// Expressions
// ============================================================================

function lowerExpr(ctx: CodegenContext, e: Expr): Operand {
  switch (e.type) {
    case "Literal":
      return { ...e.value };
    case "Name":
      return ctx.resolve(e.name);
    case "UnaryOp": {
      const operand = lowerExpr(ctx, e.operand);
      const t = ctx.newTemp();
      ctx.emit(e.op === "-" ? "NEG" : "NOT", [operand], e.line, t);
      return t;
    }
    case "BinaryOp": {
      if (e.op === "and" || e.op === "or") return lowerShortCircuit(ctx, e.op, e.left, e.right, e.line);
      const left = lowerExpr(ctx, e.left);
      const right = lowerExpr(ctx, e.right);
      const t = ctx.newTemp();
      ctx.emit(binaryOpcode(e.op), [left, right], e.line, t);
      return t;
    }
    case "Call":
      return lowerCall(ctx, e);
  }
}

/**
 * The result temporary takes the left value; the right operand is only
 * evaluated on the path where the left one does not decide the outcome.
 */
function lowerShortCircuit(ctx: CodegenContext, op: "and" | "or", left: Expr, right: Expr, line: number): Operand {
  const result = ctx.newTemp();
  ctx.emit("ASSIGN", [lowerExpr(ctx, left)], line, result);

  const end = ctx.newLabel();
  if (op === "and") {
    ctx.emit("IF_FALSE_GOTO", [result, labelRef(end)], line);
  } else {
    const rhs = ctx.newLabel();
    ctx.emit("IF_FALSE_GOTO", [result, labelRef(rhs)], line);
    ctx.emit("GOTO", [labelRef(end)], line);
    ctx.emitLabel(rhs, line);
  }

  ctx.emit("ASSIGN", [lowerExpr(ctx, right)], line, result);
  ctx.emitLabel(end, line);
  return result;
}

function lowerCall(ctx: CodegenContext, e: Extract<Expr, { type: "Call" }>): Operand {
  if (!ctx.functions.has(e.callee)) {
    throw new CodegenError(e.line, `call to undefined function '${e.callee}'`);
  }
  const args = e.args.map((a) => lowerExpr(ctx, a));
  for (const a of args) ctx.emit("PARAM", [a], e.line);
  const t = ctx.newTemp();
  ctx.emit("CALL", [nameOf(e.callee), intConst(args.length)], e.line, t);
  return t;
}

function binaryOpcode(op: ArithOp | CmpOp): Opcode {
  switch (op) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
      return ARITH_OPCODES[op];
    default:
      return CMP_OPCODES[op];
  }
}

/** Copies an identifier into a temporary so later assignments to it do not move the value. */
function pin(ctx: CodegenContext, operand: Operand, line: number): Operand {
  if (operand.kind !== "name") return operand;
  const t = ctx.newTemp();
  ctx.emit("ASSIGN", [operand], line, t);
  return t;
}

/** A numeric literal, possibly under unary minus, as a constant operand. */
function numericConstant(e: Expr): Extract<LiteralValue, { kind: "int" | "float" }> | null {
  if (e.type === "Literal") {
    const v = e.value;
    return v.kind === "int" || v.kind === "float" ? { ...v } : null;
  }
  if (e.type === "UnaryOp" && e.op === "-") {
    const inner = numericConstant(e.operand);
    return inner ? { ...inner, value: -inner.value } : null;
  }
  return null;
}
