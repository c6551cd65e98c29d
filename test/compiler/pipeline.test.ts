import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { compile, compileOrThrow, countStatements, type CompileResult, type StageReport } from "../../src/compiler/pipeline";
import { CompileError, LexError } from "../../src/compiler/errors";
import { parse } from "../../src/dsl/parser";
import { tokenize } from "../../src/dsl/tokenizer";

function failure(result: CompileResult): CompileError {
  if (result.ok) throw new Error("expected the compile to fail");
  return result.error;
}

describe("compile", () => {
  it("returns tokens, tree, code and stats", () => {
    const result = compile("x = 1\nprint(x)\n");
    if (!result.ok) throw result.error;
    expect(result.tokens).toHaveLength(10);
    expect(result.ast.body.map((s) => s.type)).toEqual(["Assign", "Print"]);
    expect(result.code.map((c) => c.op)).toEqual(["ASSIGN", "PRINT"]);
    expect(result.stats).toEqual({ tokens: 10, statements: 2, instructions: 2, temps: 0, labels: 0, functions: 0 });
  });

  it("reports the failing stage", () => {
    const lex = failure(compile('x = "oops\n'));
    expect([lex.stage, lex.line]).toEqual(["lex", 1]);

    const syntax = failure(compile("x = 1\nif x\n"));
    expect([syntax.stage, syntax.line]).toEqual(["parse", 2]);

    const codegen = failure(compile("y = f(1)\n"));
    expect([codegen.stage, codegen.line]).toEqual(["codegen", 1]);
    expect(codegen.message).toBe("codegen error at line 1: call to undefined function 'f'");

    const huge = failure(compile("x = 99999999999999999999\nprint(x)\n"));
    expect([huge.stage, huge.line]).toEqual(["lex", 1]);
  });

  it("calls onStage once per completed stage", () => {
    const reports: StageReport[] = [];
    compile("x = 1\nprint(x)\n", { onStage: (r) => reports.push(r) });
    expect(reports.map((r) => [r.stage, r.count])).toEqual([
      ["lex", 10],
      ["parse", 2],
      ["codegen", 2],
    ]);
    expect(reports.every((r) => r.durationMs >= 0)).toBe(true);

    const partial: StageReport[] = [];
    compile("if x\n", { onStage: (r) => partial.push(r) });
    expect(partial.map((r) => r.stage)).toEqual(["lex"]);
  });

  it("passes options through to every stage", () => {
    const src = "if a:\n\tb = 1\n        c = 2\n";
    expect(failure(compile(src)).stage).toBe("lex");
    expect(failure(compile(src, { tabWidth: 4 })).stage).toBe("parse");

    const forward = "print(f())\ndef f():\n    return 1\n";
    expect(compile(forward).ok).toBe(true);
    expect(failure(compile(forward, { functionResolution: "declared-before-use" })).stage).toBe("codegen");

    const twoFns = "def a(x):\n    while x:\n        x = 0\ndef b(y):\n    while y:\n        y = 0\n";
    expect(compileOrThrow(twoFns).stats.labels).toBe(4);
    expect(compileOrThrow(twoFns, { reuseLabels: true }).stats.labels).toBe(2);
  });

  it("rejects invalid options instead of reporting a compile error", () => {
    expect(() => compile("x = 1\n", { tabWidth: 0 })).toThrow(ZodError);
  });

  it("keeps no state between runs", () => {
    const src = "def f(n):\n    return n + 1\nprint(f(1) * 2)\n";
    const a = compileOrThrow(src);
    compileOrThrow("y = 1 + 2 + 3\nwhile y:\n    y = y - 1\n");
    expect(compileOrThrow(src)).toEqual(a);
  });
});

describe("compileOrThrow", () => {
  it("throws the stage error", () => {
    expect(() => compileOrThrow("x = 'open\n")).toThrow(LexError);
    expect(() => compileOrThrow("x = 'open\n")).toThrow("lex error at line 1: unterminated string literal");
  });
});

describe("countStatements", () => {
  it("counts nested statements", () => {
    const program = parse(tokenize("def f():\n  if a:\n    b = 1\n  else:\n    b = 2\nf()\n"));
    expect(countStatements(program.body)).toBe(5);
  });
});
