import { describe, expect, it } from "vitest";
import type { Expr, Program, Stmt } from "../../src/dsl/ast";
import { parse } from "../../src/dsl/parser";
import { Lexer, tokenize } from "../../src/dsl/tokenizer";
import { ParseError } from "../../src/compiler/errors";

const parseSource = (src: string): Program => parse(tokenize(src));

function first(src: string): Stmt {
  const stmt = parseSource(src).body[0];
  if (!stmt) throw new Error("empty program");
  return stmt;
}

function valueOf(src: string): Expr {
  const stmt = first(`x = ${src}\n`);
  if (stmt.type !== "Assign") throw new Error(`expected an assignment, got ${stmt.type}`);
  return stmt.value;
}

// Compact prefix rendering of an expression tree.
function show(e: Expr): string {
  switch (e.type) {
    case "Literal": {
      const v = e.value;
      if (v.kind === "str") return JSON.stringify(v.value);
      if (v.kind === "bool") return v.value ? "True" : "False";
      if (v.kind === "none") return "None";
      return String(v.value);
    }
    case "Name":
      return e.name;
    case "UnaryOp":
      return `(${e.op} ${show(e.operand)})`;
    case "BinaryOp":
      return `(${e.op} ${show(e.left)} ${show(e.right)})`;
    case "Call":
      return `${e.callee}(${e.args.map(show).join(", ")})`;
  }
}

function parseError(src: string): ParseError {
  try {
    parseSource(src);
  } catch (error: unknown) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("expected a ParseError");
}

describe("expressions", () => {
  it.each([
    ["1 + 2 * 3", "(+ 1 (* 2 3))"],
    ["(1 + 2) * 3", "(* (+ 1 2) 3)"],
    ["1 - 2 - 3", "(- (- 1 2) 3)"],
    ["a / b % c", "(% (/ a b) c)"],
    ["-a * b", "(* (- a) b)"],
    ["-2 % 3", "(% (- 2) 3)"],
    ["not a == b", "(not (== a b))"],
    ["not not a", "(not (not a))"],
    ["a or b and c", "(or a (and b c))"],
    ["a and b or c and d", "(or (and a b) (and c d))"],
    ["a < b == c", "(== (< a b) c)"],
    ["a + 1 >= b * 2", "(>= (+ a 1) (* b 2))"],
    ["f(1, g(2), x + 1)", "f(1, g(2), (+ x 1))"],
    ["h()", "h()"],
  ])("parses %s", (src, expected) => {
    expect(show(valueOf(src))).toBe(expected);
  });

  it("reads literal kinds", () => {
    expect(valueOf("42")).toMatchObject({ type: "Literal", value: { kind: "int", value: 42 } });
    expect(valueOf("2.5")).toMatchObject({ type: "Literal", value: { kind: "float", value: 2.5 } });
    expect(valueOf("'hi'")).toMatchObject({ type: "Literal", value: { kind: "str", value: "hi" } });
    expect(valueOf("True")).toMatchObject({ type: "Literal", value: { kind: "bool", value: true } });
    expect(valueOf("None")).toMatchObject({ type: "Literal", value: { kind: "none" } });
  });
});

describe("statements", () => {
  it("parses an if/elif/else chain", () => {
    const stmt = first("if a:\n  x = 1\nelif b:\n  x = 2\nelse:\n  x = 3\n");
    if (stmt.type !== "If") throw new Error("expected If");
    expect(stmt.branches.map((b) => show(b.cond))).toEqual(["a", "b"]);
    expect(stmt.branches.map((b) => b.body.length)).toEqual([1, 1]);
    expect(stmt.elseBody).toHaveLength(1);
  });

  it("leaves elseBody null without an else clause", () => {
    const stmt = first("if a:\n  x = 1\n");
    expect(stmt).toMatchObject({ type: "If", elseBody: null });
  });

  it("parses a function definition", () => {
    const stmt = first("def add(a, b):\n  return a + b\n");
    expect(stmt).toMatchObject({ type: "FunctionDef", name: "add", params: ["a", "b"], line: 1 });
    if (stmt.type !== "FunctionDef") throw new Error("expected FunctionDef");
    expect(stmt.body[0]).toMatchObject({ type: "Return", line: 2 });
  });

  it("parses a bare return", () => {
    const stmt = first("def f():\n  return\n");
    if (stmt.type !== "FunctionDef") throw new Error("expected FunctionDef");
    expect(stmt.params).toEqual([]);
    expect(stmt.body[0]).toEqual({ type: "Return", value: null, line: 2 });
  });

  it("parses print with any number of arguments", () => {
    expect(first("print()\n")).toEqual({ type: "Print", args: [], line: 1 });
    const stmt = first("print(a, 1)\n");
    if (stmt.type !== "Print") throw new Error("expected Print");
    expect(stmt.args.map(show)).toEqual(["a", "1"]);
  });

  it("keeps a bare call as an expression statement", () => {
    expect(first("f(1)\n")).toMatchObject({ type: "ExprStmt", expr: { type: "Call", callee: "f" } });
  });

  it("records statement lines", () => {
    const program = parseSource("x = 1\nwhile x < 3:\n  x = x + 1\n");
    expect(program.body.map((s) => [s.type, s.line])).toEqual([
      ["Assign", 1],
      ["While", 2],
    ]);
  });

  it("fills in range() defaults", () => {
    const one = first("for i in range(5):\n  print(i)\n");
    if (one.type !== "For") throw new Error("expected For");
    expect([show(one.start), show(one.stop), show(one.step)]).toEqual(["0", "5", "1"]);

    const two = first("for i in range(2, n):\n  print(i)\n");
    if (two.type !== "For") throw new Error("expected For");
    expect([show(two.start), show(two.stop), show(two.step)]).toEqual(["2", "n", "1"]);

    const three = first("for i in range(10, 0, -2):\n  print(i)\n");
    if (three.type !== "For") throw new Error("expected For");
    expect(three.var).toBe("i");
    expect([show(three.start), show(three.stop), show(three.step)]).toEqual(["10", "0", "(- 2)"]);
  });

  it("accepts a token array without a trailing EOF", () => {
    expect(parse([])).toEqual({ type: "Program", body: [] });
    expect(parse(tokenize("x = 1\n").slice(0, -1)).body).toHaveLength(1);
  });

  it("parses straight from a lazy lexer", () => {
    const src = "def f(n):\n  return n * 2\nprint(f(3))\n";
    expect(parse(new Lexer(src))).toEqual(parseSource(src));
  });

  it("is deterministic", () => {
    const src = "for i in range(3):\n  if i % 2 == 0 or i > 1:\n    print(i)\n";
    expect(parseSource(src)).toEqual(parseSource(src));
  });
});

describe("syntax errors", () => {
  it("rejects range() with four arguments", () => {
    const error = parseError("for i in range(1, 2, 3, 4):\n  print(i)\n");
    expect(error.line).toBe(1);
    expect(error.message).toBe("parse error at line 1: expected 1 to 3 arguments to range(), found 4 arguments");
  });

  it("rejects range() with no arguments", () => {
    expect(parseError("for i in range():\n  print(i)\n").reason).toBe(
      "expected 1 to 3 arguments to range(), found 0 arguments",
    );
  });

  it("rejects iteration over anything but range()", () => {
    const error = parseError("for i in items:\n  print(i)\n");
    expect(error.expected).toBe("'range(...)'");
    expect(error.found).toBe("identifier 'items'");
  });

  it("rejects an empty block", () => {
    const error = parseError("if x:\ny = 1\n");
    expect(error.line).toBe(2);
    expect(error.reason).toBe("expected an indented block, found identifier 'y'");
    expect(parseError("while x:\n").reason).toBe("expected an indented block, found end of input");
  });

  it("rejects a missing colon", () => {
    const error = parseError("if x\n  y = 1\n");
    expect(error.line).toBe(1);
    expect(error.reason).toBe("expected ':', found end of line");
  });

  it("rejects unbalanced parentheses", () => {
    expect(parseError("print((1 + 2)\n").reason).toBe("expected ')', found end of line");
    expect(parseError("x = (1 + 2))\n").reason).toBe("expected end of line, found ')'");
  });

  it("rejects an assignment to something other than a name", () => {
    expect(parseError("1 = x\n").reason).toBe("expected an identifier on the left of '=', found Literal expression");
    expect(parseError("f(a) = 3\n").found).toBe("Call expression");
  });

  it("rejects duplicate parameters", () => {
    expect(parseError("def f(a, a):\n  return a\n").reason).toBe(
      "expected distinct parameter names, found duplicate parameter 'a'",
    );
  });

  it("rejects a missing operand", () => {
    expect(parseError("x = \n").reason).toBe("expected expression, found end of line");
    expect(parseError("x = 1 +\n").reason).toBe("expected expression, found end of line");
  });

  it("rejects an unexpected indent", () => {
    const error = parseError("x = 1\n  y = 2\n");
    expect(error.line).toBe(2);
    expect(error.found).toBe("unexpected indent");
  });
});
