export type Program = { type: "Program"; body: Stmt[] };

export type LiteralValue =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "str"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "none" };

export type ArithOp = "+" | "-" | "*" | "/" | "%";
export type CmpOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type BinaryOp = ArithOp | CmpOp | "and" | "or";
export type UnaryOp = "-" | "not";

export type Expr =
  | { type: "Literal"; value: LiteralValue; line: number }
  | { type: "Name"; name: string; line: number }
  | { type: "BinaryOp"; op: BinaryOp; left: Expr; right: Expr; line: number }
  | { type: "UnaryOp"; op: UnaryOp; operand: Expr; line: number }
  | { type: "Call"; callee: string; args: Expr[]; line: number };

export type IfBranch = { cond: Expr; body: Stmt[] };

export type Stmt =
  | { type: "Assign"; target: string; value: Expr; line: number }
  | { type: "If"; branches: IfBranch[]; elseBody: Stmt[] | null; line: number }
  | { type: "While"; cond: Expr; body: Stmt[]; line: number }
  | { type: "For"; var: string; start: Expr; stop: Expr; step: Expr; body: Stmt[]; line: number }
  | { type: "FunctionDef"; name: string; params: string[]; body: Stmt[]; line: number }
  | { type: "Return"; value: Expr | null; line: number }
  | { type: "Print"; args: Expr[]; line: number }
  | { type: "ExprStmt"; expr: Expr; line: number };

export type FunctionDef = Extract<Stmt, { type: "FunctionDef" }>;
