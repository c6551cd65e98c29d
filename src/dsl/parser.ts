import type { Program, Stmt, Expr, IfBranch, BinaryOp, CmpOp, ArithOp } from "./ast";
import { describeTok, type Tok, type TokKind } from "./tokenizer";
import { ParseError } from "../compiler/errors";

const KIND_NAMES: Record<TokKind, string> = {
  IDENT: "identifier",
  INT: "integer",
  FLOAT: "float",
  STR: "string",
  KW: "keyword",
  OP: "operator",
  NEWLINE: "end of line",
  INDENT: "an indented block",
  DEDENT: "end of block",
  EOF: "end of input",
};

const CMP_OPS: readonly CmpOp[] = ["==", "!=", "<", "<=", ">", ">="];
const ADD_OPS: readonly ArithOp[] = ["+", "-"];
const MUL_OPS: readonly ArithOp[] = ["*", "/", "%"];

/**
 * Recursive descent over a token sequence. The cursor only moves forward and
 * looks at one token at a time, so any iterable (including a lazy `Lexer`)
 * can feed it. The first mismatch throws a `ParseError`.
 */
export function parse(toks: Iterable<Tok>): Program {
  const it = toks[Symbol.iterator]();
  let lastLine = 1;

  const pull = (): Tok => {
    const r = it.next();
    if (r.done) return { t: "EOF", v: "", line: lastLine, col: 1 };
    lastLine = r.value.line;
    return r.value;
  };

  let cur = pull();

  const at = (t: TokKind, v?: string): boolean => cur.t === t && (v === undefined || cur.v === v);

  const advance = (): Tok => {
    const p = cur;
    if (p.t !== "EOF") cur = pull();
    return p;
  };

  const fail = (expected: string): ParseError => new ParseError(cur.line, expected, describeTok(cur));

  const eat = (t: TokKind, v?: string, expected?: string): Tok => {
    if (!at(t, v)) throw fail(expected ?? (v !== undefined ? `'${v}'` : KIND_NAMES[t]));
    return advance();
  };

  const matchOp = <T extends string>(ops: readonly T[]): T | null => {
    if (cur.t !== "OP") return null;
    const v = cur.v;
    return ops.find((op) => op === v) ?? null;
  };

  const parseProgram = (): Program => {
    const body: Stmt[] = [];
    while (!at("EOF")) body.push(parseStmt());
    return { type: "Program", body };
  };

  const parseStmt = (): Stmt => {
    if (at("KW", "def")) return parseDef();
    if (at("KW", "if")) return parseIf();
    if (at("KW", "while")) return parseWhile();
    if (at("KW", "for")) return parseFor();

    const stmt = parseSimple();
    eat("NEWLINE");
    return stmt;
  };

  const parseSimple = (): Stmt => {
    const line = cur.line;

    if (at("KW", "return")) {
      advance();
      if (at("NEWLINE")) return { type: "Return", value: null, line };
      return { type: "Return", value: parseExpr(), line };
    }

    if (at("KW", "print")) {
      advance();
      return { type: "Print", args: parseArgs(), line };
    }

    const expr = parseExpr();
    if (at("OP", "=")) {
      if (expr.type !== "Name") {
        throw new ParseError(cur.line, "an identifier on the left of '='", `${expr.type} expression`);
      }
      advance();
      return { type: "Assign", target: expr.name, value: parseExpr(), line };
    }
    return { type: "ExprStmt", expr, line };
  };

  // ":" NEWLINE INDENT statement+ DEDENT
  const parseBlock = (): Stmt[] => {
    eat("OP", ":");
    eat("NEWLINE");
    eat("INDENT");
    const body: Stmt[] = [];
    do {
      body.push(parseStmt());
    } while (!at("DEDENT") && !at("EOF"));
    eat("DEDENT");
    return body;
  };

  const parseDef = (): Stmt => {
    const line = eat("KW", "def").line;
    const name = eat("IDENT", undefined, "function name").v;
    eat("OP", "(");
    const params: string[] = [];
    const parseParam = (): void => {
      const p = eat("IDENT", undefined, "parameter name");
      if (params.includes(p.v)) {
        throw new ParseError(p.line, "distinct parameter names", `duplicate parameter '${p.v}'`);
      }
      params.push(p.v);
    };
    if (!at("OP", ")")) {
      parseParam();
      while (at("OP", ",")) {
        advance();
        parseParam();
      }
    }
    eat("OP", ")");
    const body = parseBlock();
    return { type: "FunctionDef", name, params, body, line };
  };

  const parseIf = (): Stmt => {
    const line = eat("KW", "if").line;
    const branches: IfBranch[] = [];
    const cond = parseExpr();
    branches.push({ cond, body: parseBlock() });
    while (at("KW", "elif")) {
      advance();
      const elifCond = parseExpr();
      branches.push({ cond: elifCond, body: parseBlock() });
    }
    let elseBody: Stmt[] | null = null;
    if (at("KW", "else")) {
      advance();
      elseBody = parseBlock();
    }
    return { type: "If", branches, elseBody, line };
  };

  const parseWhile = (): Stmt => {
    const line = eat("KW", "while").line;
    const cond = parseExpr();
    const body = parseBlock();
    return { type: "While", cond, body, line };
  };

  // for <ident> in range(<stop>) | range(<start>, <stop>) | range(<start>, <stop>, <step>)
  const parseFor = (): Stmt => {
    const line = eat("KW", "for").line;
    const varName = eat("IDENT", undefined, "loop variable").v;
    eat("KW", "in");
    const rangeTok = eat("KW", "range", "'range(...)'");
    const args = parseArgs();

    const zero: Expr = { type: "Literal", value: { kind: "int", value: 0 }, line: rangeTok.line };
    const one: Expr = { type: "Literal", value: { kind: "int", value: 1 }, line: rangeTok.line };
    let start: Expr;
    let stop: Expr;
    let step: Expr;
    if (args.length === 1 && args[0]) {
      [start, stop, step] = [zero, args[0], one];
    } else if (args.length === 2 && args[0] && args[1]) {
      [start, stop, step] = [args[0], args[1], one];
    } else if (args.length === 3 && args[0] && args[1] && args[2]) {
      [start, stop, step] = [args[0], args[1], args[2]];
    } else {
      throw new ParseError(rangeTok.line, "1 to 3 arguments to range()", `${args.length} arguments`);
    }

    const body = parseBlock();
    return { type: "For", var: varName, start, stop, step, body, line };
  };

  // "(" [expr ("," expr)*] ")"
  const parseArgs = (): Expr[] => {
    eat("OP", "(");
    const args: Expr[] = [];
    if (!at("OP", ")")) {
      args.push(parseExpr());
      while (at("OP", ",")) {
        advance();
        args.push(parseExpr());
      }
    }
    eat("OP", ")");
    return args;
  };

  // -------- Expressions (precedence) --------
  const parseExpr = (): Expr => parseOr();

  const binary = (op: BinaryOp, left: Expr, right: Expr): Expr => ({
    type: "BinaryOp",
    op,
    left,
    right,
    line: left.line,
  });

  const parseOr = (): Expr => {
    let left = parseAnd();
    while (at("KW", "or")) {
      advance();
      left = binary("or", left, parseAnd());
    }
    return left;
  };

  const parseAnd = (): Expr => {
    let left = parseNot();
    while (at("KW", "and")) {
      advance();
      left = binary("and", left, parseNot());
    }
    return left;
  };

  const parseNot = (): Expr => {
    if (at("KW", "not")) {
      const line = advance().line;
      return { type: "UnaryOp", op: "not", operand: parseNot(), line };
    }
    return parseCmp();
  };

  const parseCmp = (): Expr => {
    let left = parseAdd();
    for (let op = matchOp(CMP_OPS); op !== null; op = matchOp(CMP_OPS)) {
      advance();
      left = binary(op, left, parseAdd());
    }
    return left;
  };

  const parseAdd = (): Expr => {
    let left = parseMul();
    for (let op = matchOp(ADD_OPS); op !== null; op = matchOp(ADD_OPS)) {
      advance();
      left = binary(op, left, parseMul());
    }
    return left;
  };

  const parseMul = (): Expr => {
    let left = parseUnary();
    for (let op = matchOp(MUL_OPS); op !== null; op = matchOp(MUL_OPS)) {
      advance();
      left = binary(op, left, parseUnary());
    }
    return left;
  };

  const parseUnary = (): Expr => {
    if (at("OP", "-")) {
      const line = advance().line;
      return { type: "UnaryOp", op: "-", operand: parseUnary(), line };
    }
    return parsePrimary();
  };

  const parsePrimary = (): Expr => {
    const p = cur;

    if (p.t === "INT") {
      advance();
      return { type: "Literal", value: { kind: "int", value: Number(p.v) }, line: p.line };
    }
    if (p.t === "FLOAT") {
      advance();
      return { type: "Literal", value: { kind: "float", value: Number(p.v) }, line: p.line };
    }
    if (p.t === "STR") {
      advance();
      return { type: "Literal", value: { kind: "str", value: p.v }, line: p.line };
    }
    if (at("KW", "True") || at("KW", "False")) {
      advance();
      return { type: "Literal", value: { kind: "bool", value: p.v === "True" }, line: p.line };
    }
    if (at("KW", "None")) {
      advance();
      return { type: "Literal", value: { kind: "none" }, line: p.line };
    }

    // parens
    if (at("OP", "(")) {
      advance();
      const e = parseExpr();
      eat("OP", ")");
      return e;
    }

    // call or name
    if (p.t === "IDENT") {
      advance();
      if (at("OP", "(")) {
        return { type: "Call", callee: p.v, args: parseArgs(), line: p.line };
      }
      return { type: "Name", name: p.v, line: p.line };
    }

    throw fail("expression");
  };

  return parseProgram();
}
