import type { LiteralValue, ArithOp, CmpOp } from "../dsl/ast";

export type Opcode =
  | "ASSIGN"
  | "ADD"
  | "SUB"
  | "MUL"
  | "DIV"
  | "MOD"
  | "NEG"
  | "NOT"
  | "CMP_EQ"
  | "CMP_NE"
  | "CMP_LT"
  | "CMP_LE"
  | "CMP_GT"
  | "CMP_GE"
  | "GOTO"
  | "IF_FALSE_GOTO"
  | "LABEL"
  | "PARAM"
  | "CALL"
  | "RETURN"
  | "FUNC_BEGIN"
  | "FUNC_END"
  | "PRINT";

export type NameOperand = { kind: "name"; name: string };
export type TempOperand = { kind: "temp"; name: string };
export type LabelOperand = { kind: "label"; name: string };

export type Operand = LiteralValue | NameOperand | TempOperand | LabelOperand;

/** Where a computed value may be stored. */
export type Target = NameOperand | TempOperand;

// Operand layout per opcode:
//   ASSIGN [src] -> result          ADD..MOD, CMP_* [l, r] -> result
//   NEG, NOT [x] -> result          GOTO [label]
//   IF_FALSE_GOTO [cond, label]     LABEL [] (label field)
//   PARAM [x]                       CALL [fn, argc] -> result
//   RETURN [] | [x]                 FUNC_BEGIN [fn, ...params]
//   FUNC_END [fn]                   PRINT [...values]
export interface Instr {
  op: Opcode;
  args: Operand[];
  result?: Target;
  label?: string;
  line: number;
}

export const ARITH_OPCODES: Record<ArithOp, Opcode> = {
  "+": "ADD",
  "-": "SUB",
  "*": "MUL",
  "/": "DIV",
  "%": "MOD",
};

export const CMP_OPCODES: Record<CmpOp, Opcode> = {
  "==": "CMP_EQ",
  "!=": "CMP_NE",
  "<": "CMP_LT",
  "<=": "CMP_LE",
  ">": "CMP_GT",
  ">=": "CMP_GE",
};

export const nameOf = (name: string): NameOperand => ({ kind: "name", name });
export const labelRef = (name: string): LabelOperand => ({ kind: "label", name });
export const intConst = (value: number): LiteralValue => ({ kind: "int", value });

/** Label names referenced by a jump instruction, if any. */
export function jumpTargets(instr: Instr): string[] {
  if (instr.op !== "GOTO" && instr.op !== "IF_FALSE_GOTO") return [];
  return instr.args.flatMap((a) => (a.kind === "label" ? [a.name] : []));
}
