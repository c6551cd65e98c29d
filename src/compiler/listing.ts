import type { Tok } from "../dsl/tokenizer";
import type { Instr, Operand, Opcode } from "./tac";

const INFIX: Partial<Record<Opcode, string>> = {
  ADD: "+",
  SUB: "-",
  MUL: "*",
  DIV: "/",
  MOD: "%",
  CMP_EQ: "==",
  CMP_NE: "!=",
  CMP_LT: "<",
  CMP_LE: "<=",
  CMP_GT: ">",
  CMP_GE: ">=",
};

export function formatOperand(o: Operand): string {
  switch (o.kind) {
    case "int":
      return String(o.value);
    case "float":
      return Number.isInteger(o.value) ? o.value.toFixed(1) : String(o.value);
    case "str":
      return JSON.stringify(o.value);
    case "bool":
      return o.value ? "True" : "False";
    case "none":
      return "None";
    case "name":
    case "temp":
    case "label":
      return o.name;
  }
}

/** One line of the textual listing. Labels and function markers are flush left. */
export function formatInstr(instr: Instr): string {
  const args = instr.args.map(formatOperand);
  const [a = "", b = ""] = args;
  const target = instr.result ? formatOperand(instr.result) : "";

  const infix = INFIX[instr.op];
  if (infix) return `\t${target} = ${a} ${infix} ${b}`;

  switch (instr.op) {
    case "LABEL":
      return `${instr.label ?? ""}:`;
    case "FUNC_BEGIN":
      return ["FUNC_BEGIN", ...args].join(" ");
    case "FUNC_END":
      return `FUNC_END ${a}`;
    case "ASSIGN":
      return `\t${target} = ${a}`;
    case "NEG":
      return `\t${target} = -${a}`;
    case "NOT":
      return `\t${target} = not ${a}`;
    case "GOTO":
      return `\tGOTO ${a}`;
    case "IF_FALSE_GOTO":
      return `\tIF_FALSE ${a} GOTO ${b}`;
    case "PARAM":
      return `\tPARAM ${a}`;
    case "CALL":
      return `\t${target} = CALL ${a}, ${b}`;
    case "RETURN":
      return args.length > 0 ? `\tRETURN ${a}` : "\tRETURN";
    case "PRINT":
      return args.length > 0 ? `\tPRINT ${args.join(", ")}` : "\tPRINT";
    default:
      return `\t${[instr.op, ...args].join(" ")}`;
  }
}

export function formatListing(code: Instr[]): string {
  return code.map(formatInstr).join("\n");
}

export function formatTokens(toks: Tok[]): string {
  return toks
    .map((tok) => {
      const value = tok.t === "STR" ? JSON.stringify(tok.v) : tok.v;
      return `${tok.line}:${tok.col}\t${tok.t}${value ? ` ${value}` : ""}`;
    })
    .join("\n");
}

/** Flat, uniform rows: the shape used for JSON and TOON output. */
export type ListingRow = {
  index: number;
  label: string;
  op: Opcode;
  args: string;
  result: string;
  line: number;
};

export function toRows(code: Instr[]): ListingRow[] {
  return code.map((instr, index) => ({
    index,
    label: instr.label ?? "",
    op: instr.op,
    args: instr.args.map(formatOperand).join(" "),
    result: instr.result ? formatOperand(instr.result) : "",
    line: instr.line,
  }));
}
