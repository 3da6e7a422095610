import type { PdfStringFormat } from "#src/objects/pdf-string";

/**
 * Tokens produced by `TokenReader`. `position` is the byte offset the token
 * starts at, which parse errors report.
 */
interface Positioned<T extends string> {
  type: T;
  position: number;
}

export interface NumberToken extends Positioned<"number"> {
  value: number;
  isInteger: boolean;
  /** Source text with a single normalized sign, e.g. `-.5`, `1.50` */
  raw: string;
}

export interface NameToken extends Positioned<"name"> {
  /** Decoded name, without the slash */
  value: string;
}

export interface StringToken extends Positioned<"string"> {
  value: Uint8Array;
  format: PdfStringFormat;
}

/** Any run of regular characters that is not a number: `obj`, `R`, `Tj`. */
export interface KeywordToken extends Positioned<"keyword"> {
  value: string;
}

export interface DelimiterToken extends Positioned<"delimiter"> {
  value: "[" | "]" | "<<" | ">>";
}

export type EofToken = Positioned<"eof">;

export type Token = NumberToken | NameToken | StringToken | KeywordToken | DelimiterToken | EofToken;
