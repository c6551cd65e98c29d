import { LexError } from "../compiler/errors";

export type TokKind =
  | "IDENT"
  | "INT"
  | "FLOAT"
  | "STR"
  | "KW"
  | "OP"
  | "NEWLINE"
  | "INDENT"
  | "DEDENT"
  | "EOF";

/** `v` is the source text, except for strings (decoded value) and synthetic tokens (""). */
export type Tok = { t: TokKind; v: string; line: number; col: number };

export const KEYWORDS = new Set([
  "def",
  "if",
  "elif",
  "else",
  "while",
  "for",
  "in",
  "range",
  "return",
  "print",
  "and",
  "or",
  "not",
  "True",
  "False",
  "None",
]);

const TWO_CHAR_OPS = ["==", "!=", "<=", ">="];
const ONE_CHAR_OPS = "+-*/%<>=(),:";

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

export const DEFAULT_TAB_WIDTH = 8;

export interface LexerOptions {
  tabWidth?: number;
}

// Each stack entry is measured twice: with the configured tab width and with
// tabs counted as one column. Both measures must agree on every comparison.
type Indent = { width: number; alt: number };

function isAlpha(c: string): boolean {
  return /[A-Za-z_]/.test(c);
}

function isAlnum(c: string): boolean {
  return /[A-Za-z0-9_]/.test(c);
}

function isDigit(c: string): boolean {
  return /[0-9]/.test(c);
}

/**
 * Indentation-aware scanner. Tokens are produced on demand as the consumer
 * pulls them; `reset()` rewinds to the start of the source.
 */
export class Lexer implements Iterator<Tok>, Iterable<Tok> {
  private readonly src: string;
  private readonly tabWidth: number;
  private gen: Generator<Tok, void, undefined>;

  constructor(source: string, options: LexerOptions = {}) {
    this.src = source.replaceAll("\r\n", "\n");
    this.tabWidth = options.tabWidth ?? DEFAULT_TAB_WIDTH;
    if (!Number.isInteger(this.tabWidth) || this.tabWidth < 1) {
      throw new Error(`Invalid tab width: ${this.tabWidth}`);
    }
    this.gen = this.scan();
  }

  next(): IteratorResult<Tok> {
    return this.gen.next();
  }

  reset(): void {
    this.gen = this.scan();
  }

  [Symbol.iterator](): Iterator<Tok> {
    return this;
  }

  private *scan(): Generator<Tok, void, undefined> {
    const src = this.src;
    const indents: Indent[] = [{ width: 0, alt: 0 }];
    let i = 0;
    let line = 1;
    let lineStart = 0;
    let depth = 0;
    let atLineStart = true;
    let pending = false;

    const tok = (t: TokKind, v: string, at: number): Tok => ({ t, v, line, col: at - lineStart + 1 });
    const top = (): Indent => indents[indents.length - 1] ?? { width: 0, alt: 0 };

    while (true) {
      if (atLineStart && depth === 0) {
        let width = 0;
        let alt = 0;
        let j = i;
        while (j < src.length && (src[j] === " " || src[j] === "\t")) {
          if (src[j] === "\t") width += this.tabWidth - (width % this.tabWidth);
          else width++;
          alt++;
          j++;
        }

        const first = src[j];
        if (first === undefined) {
          i = j;
          break;
        }
        if (first === "\n" || first === "#") {
          while (j < src.length && src[j] !== "\n") j++;
          if (j >= src.length) {
            i = j;
            break;
          }
          i = j + 1;
          line++;
          lineStart = i;
          continue;
        }

        const cur = top();
        if (width > cur.width) {
          if (alt <= cur.alt) throw new LexError(line, "inconsistent use of tabs and spaces in indentation");
          indents.push({ width, alt });
          yield tok("INDENT", "", j);
        } else if (width === cur.width) {
          if (alt !== cur.alt) throw new LexError(line, "inconsistent use of tabs and spaces in indentation");
        } else {
          const target = indents.findIndex((ind) => ind.width === width);
          if (target === -1) {
            throw new LexError(line, "unindent does not match any outer indentation level");
          }
          if (indents[target]?.alt !== alt) {
            throw new LexError(line, "inconsistent use of tabs and spaces in indentation");
          }
          while (indents.length > target + 1) {
            indents.pop();
            yield tok("DEDENT", "", j);
          }
        }

        i = j;
        atLineStart = false;
      }

      const c = src[i];
      if (c === undefined) break;

      if (c === "\n") {
        if (depth === 0) {
          if (pending) yield tok("NEWLINE", "", i);
          pending = false;
          atLineStart = true;
        }
        i++;
        line++;
        lineStart = i;
        continue;
      }

      if (c === " " || c === "\t" || c === "\r" || c === "\f") {
        i++;
        continue;
      }

      if (c === "#") {
        while (i < src.length && src[i] !== "\n") i++;
        continue;
      }

      pending = true;

      if (c === '"' || c === "'") {
        let j = i + 1;
        let out = "";
        while (j < src.length) {
          const ch = src[j];
          if (ch === undefined || ch === c || ch === "\n") break;
          if (ch === "\\") {
            const nx = src[j + 1];
            if (nx === undefined || nx === "\n") break;
            out += ESCAPES[nx] ?? `\\${nx}`;
            j += 2;
            continue;
          }
          out += ch;
          j++;
        }
        if (src[j] !== c) throw new LexError(line, "unterminated string literal");
        yield tok("STR", out, i);
        i = j + 1;
        continue;
      }

      if (isDigit(c) || (c === "." && isDigit(src[i + 1] ?? ""))) {
        let j = i;
        let isFloat = false;
        while (j < src.length && isDigit(src[j] ?? "")) j++;
        if (src[j] === ".") {
          isFloat = true;
          j++;
          while (j < src.length && isDigit(src[j] ?? "")) j++;
        }
        if (src[j] === "e" || src[j] === "E") {
          let k = j + 1;
          if (src[k] === "+" || src[k] === "-") k++;
          if (isDigit(src[k] ?? "")) {
            isFloat = true;
            j = k;
            while (j < src.length && isDigit(src[j] ?? "")) j++;
          }
        }
        const after = src[j];
        if (after !== undefined && isAlpha(after)) {
          throw new LexError(line, `invalid numeric literal '${src.slice(i, j + 1)}'`);
        }
        const text = src.slice(i, j);
        if (!isFloat && !Number.isSafeInteger(Number(text))) {
          throw new LexError(line, `integer literal '${text}' is too large`);
        }
        yield tok(isFloat ? "FLOAT" : "INT", text, i);
        i = j;
        continue;
      }

      if (isAlpha(c)) {
        let j = i;
        while (j < src.length && isAlnum(src[j] ?? "")) j++;
        const word = src.slice(i, j);
        yield tok(KEYWORDS.has(word) ? "KW" : "IDENT", word, i);
        i = j;
        continue;
      }

      const two = src.slice(i, i + 2);
      if (TWO_CHAR_OPS.includes(two)) {
        yield tok("OP", two, i);
        i += 2;
        continue;
      }

      if (ONE_CHAR_OPS.includes(c)) {
        if (c === "(") depth++;
        if (c === ")") depth = Math.max(0, depth - 1);
        yield tok("OP", c, i);
        i++;
        continue;
      }

      throw new LexError(line, `unrecognized character '${c}'`);
    }

    if (pending) yield tok("NEWLINE", "", i);
    while (indents.length > 1) {
      indents.pop();
      yield tok("DEDENT", "", i);
    }
    yield tok("EOF", "", i);
  }
}

export function tokenize(src: string, options: LexerOptions = {}): Tok[] {
  return [...new Lexer(src, options)];
}

export function describeTok(tok: Tok): string {
  switch (tok.t) {
    case "IDENT":
      return `identifier '${tok.v}'`;
    case "INT":
    case "FLOAT":
      return `number ${tok.v}`;
    case "STR":
      return `string ${JSON.stringify(tok.v)}`;
    case "KW":
    case "OP":
      return `'${tok.v}'`;
    case "NEWLINE":
      return "end of line";
    case "INDENT":
      return "unexpected indent";
    case "DEDENT":
      return "end of block";
    case "EOF":
      return "end of input";
  }
}
