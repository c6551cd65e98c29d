import { decode, encode } from "@toon-format/toon";
import type { CompileSuccess } from "../compiler/pipeline";
import { formatListing, formatTokens, toRows } from "../compiler/listing";
import type { Emit, OutputFormat } from "./config";

/** The structured output formats. `text` is rendered by the listing printers instead. */
export type DataFormat = Exclude<OutputFormat, "text">;

export function serialize(value: unknown, format: DataFormat): string {
  return format === "toon" ? encode(value) : JSON.stringify(value, null, 2);
}

export function deserialize(text: string, format: DataFormat): unknown {
  return format === "toon" ? decode(text) : JSON.parse(text);
}

export interface FormatComparison {
  jsonBytes: number;
  toonBytes: number;
  savedPercent: number;
}

// Both sides are measured compact, so the comparison reflects the encodings and not indentation.
export function compareFormats(value: unknown): FormatComparison {
  const jsonBytes = Buffer.byteLength(JSON.stringify(value), "utf8");
  const toonBytes = Buffer.byteLength(encode(value), "utf8");
  return {
    jsonBytes,
    toonBytes,
    savedPercent: jsonBytes === 0 ? 0 : Math.round(((jsonBytes - toonBytes) / jsonBytes) * 100),
  };
}

/** The structured value behind an emission, as serialized for `json` and `toon`. */
export function payloadFor(result: CompileSuccess, emit: Emit): unknown {
  switch (emit) {
    case "tokens":
      return { tokens: result.tokens };
    case "ast":
      return result.ast;
    case "tac":
      return { instructions: toRows(result.code) };
  }
}

export function renderResult(result: CompileSuccess, emit: Emit, format: OutputFormat): string {
  if (format !== "text") return serialize(payloadFor(result, emit), format);

  switch (emit) {
    case "tokens":
      return formatTokens(result.tokens);
    case "ast":
      return JSON.stringify(result.ast, null, 2);
    case "tac":
      return formatListing(result.code);
  }
}
