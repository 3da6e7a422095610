import { Scanner } from "#src/io/scanner";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfOperator } from "#src/objects/pdf-operator";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { ObjectParseError } from "./errors";
import type { KeywordToken, NumberToken, Token } from "./token";
import { TokenReader } from "./token-reader";

/**
 * A parsed object. `hasStream` is set when a dictionary is followed by the
 * `stream` keyword, which starts at `streamKeywordPosition`; the caller
 * reads the data.
 */
export type ParseResult =
  | { object: PdfObject; hasStream: false }
  | { object: PdfDict; hasStream: true; streamKeywordPosition: number };

export type WarningCallback = (message: string, position: number) => void;

export interface ObjectParserOptions {
  /** Read unknown keywords as content-stream operators instead of failing. */
  operators?: boolean;
  /**
   * Recover from broken containers instead of throwing: unterminated arrays
   * and dictionaries end at the end of input, and bad dictionary entries are
   * dropped. Each repair is reported here.
   */
  recover?: WarningCallback;
}

const MAX_DEPTH = 500;

const direct = (object: PdfObject): ParseResult => ({ object, hasStream: false });

const isDelimiter = (token: Token, value: string) => token.type === "delimiter" && token.value === value;

/**
 * Recursive descent parser over a TokenReader.
 *
 * Up to two tokens are held back to tell `1 0 R` from two numbers. Tokens
 * are only pulled when needed, so the parser never reads past a `stream`
 * or `ID` keyword into binary data.
 */
export class ObjectParser {
  private readonly pending: Token[] = [];
  private depth = 0;
  private readonly operators: boolean;
  private readonly recover: WarningCallback | undefined;

  /**
   * Offset just past the last keyword consumed. Content-stream parsing
   * uses it to find the data after `ID`.
   */
  lastKeywordEnd = 0;

  constructor(
    private reader: TokenReader,
    options: ObjectParserOptions = {},
  ) {
    this.operators = options.operators ?? false;
    this.recover = options.recover;
  }

  /**
   * Next object, or null at the end of input.
   */
  parseObject(): ParseResult | null {
    const token = this.peek();

    if (token.type === "eof") {
      return null;
    }

    if (this.depth >= MAX_DEPTH) {
      throw new ObjectParseError("Maximum nesting depth exceeded", token.position);
    }

    this.depth++;

    try {
      return this.parseValue(token);
    } finally {
      this.depth--;
    }
  }

  /**
   * Require that nothing but whitespace and comments follows.
   */
  expectEnd(): void {
    const token = this.peek();

    if (token.type !== "eof") {
      throw new ObjectParseError("Unexpected trailing tokens", token.position);
    }
  }

  /** Whether the next token is `keyword`. */
  isAtKeyword(keyword: string): boolean {
    const token = this.peek();

    return token.type === "keyword" && token.value === keyword;
  }

  /**
   * Drop held-back tokens, e.g. after the reader's scanner was moved.
   */
  reset(): void {
    this.pending.length = 0;
  }

  private peek(ahead = 0): Token {
    while (this.pending.length <= ahead) {
      this.pending.push(this.reader.nextToken());
    }

    return this.pending[ahead];
  }

  private take(): void {
    this.pending.shift();
  }

  /** Throw, or in recovery mode report and carry on. */
  private problem(message: string, position: number): void {
    if (this.recover === undefined) {
      throw new ObjectParseError(message, position);
    }

    this.recover(message, position);
  }

  private parseValue(token: Token): ParseResult {
    switch (token.type) {
      case "number":
        return this.parseNumberOrRef(token);
      case "name":
        this.take();
        return direct(PdfName.of(token.value));
      case "string":
        this.take();
        return direct(new PdfString(token.value, token.format));
      case "keyword":
        this.take();
        this.lastKeywordEnd = token.position + token.value.length;
        return this.parseKeyword(token);
      case "delimiter":
        if (token.value === "[") {
          return this.parseArray(token.position);
        }

        if (token.value === "<<") {
          return this.parseDict(token.position);
        }

        throw new ObjectParseError(`Unexpected delimiter: ${token.value}`, token.position);
      case "eof":
        throw new ObjectParseError("Unexpected end of input", token.position);
    }
  }

  private parseKeyword({ value, position }: KeywordToken): ParseResult {
    if (value === "null") {
      return direct(new PdfNull());
    }

    if (value === "true" || value === "false") {
      return direct(PdfBool.of(value === "true"));
    }

    if (this.operators) {
      return direct(new PdfOperator(value));
    }

    throw new ObjectParseError(`Unexpected keyword: ${value}`, position);
  }

  /**
   * A number, or `objNum gen R` when a non-negative integer is followed by
   * an integer and `R`. Otherwise the second number stays pending.
   */
  private parseNumberOrRef(first: NumberToken): ParseResult {
    const generation = first.isInteger && first.value >= 0 ? this.peek(1) : null;
    const keyword = generation?.type === "number" && generation.isInteger ? this.peek(2) : null;

    if (generation?.type !== "number" || keyword?.type !== "keyword" || keyword.value !== "R") {
      this.take();
      return direct(PdfNumber.parsed(first.value, first.isInteger, first.raw));
    }

    if (generation.value < 0 || generation.value > 65535) {
      this.problem(`Invalid reference values: ${first.raw} ${generation.raw} R`, first.position);
    }

    this.take();
    this.take();
    this.take();

    return direct(PdfRef.of(first.value, Math.max(0, generation.value)));
  }

  private parseArray(start: number): ParseResult {
    this.take();

    const array = new PdfArray();

    while (!isDelimiter(this.peek(), "]")) {
      const item = this.parseObject();

      if (item === null) {
        this.problem("Unterminated array", start);
        return direct(array);
      }

      array.push(item.object);
    }

    this.take();

    return direct(array);
  }

  private parseDict(start: number): ParseResult {
    this.take();

    const dict = new PdfDict();

    while (true) {
      const key = this.peek();

      if (key.type === "eof") {
        this.problem("Unterminated dictionary", start);
        return direct(dict);
      }

      if (isDelimiter(key, ">>")) {
        this.take();
        break;
      }

      this.take();

      if (key.type !== "name") {
        this.problem(`Invalid dictionary key: expected name, got ${key.type}`, key.position);

        // Drop the value that went with it too
        const next = this.peek();

        if (next.type !== "eof" && !isDelimiter(next, ">>")) {
          this.take();
        }

        continue;
      }

      const value = this.peek();

      if (value.type === "eof" || isDelimiter(value, ">>")) {
        this.problem(`Missing value for key /${key.value}`, value.position);
        continue;
      }

      const parsed = this.parseObject();

      if (parsed !== null) {
        dict.set(key.value, parsed.object);
      }
    }

    // "stream" ends right before the raw data, so it is consumed without
    // reading any further
    const next = this.peek();

    if (next.type === "keyword" && next.value === "stream") {
      this.take();
      return { object: dict, hasStream: true, streamKeywordPosition: next.position };
    }

    return direct(dict);
  }
}

/**
 * Parse text holding exactly one object, such as `<< /A [1 2 0 R] >>`.
 *
 * @throws {ObjectParseError} on malformed input, trailing tokens or a
 *   stream
 */
export function parseSingleObject(bytes: Uint8Array): PdfObject {
  const parser = new ObjectParser(new TokenReader(new Scanner(bytes), { strict: true }));
  const result = parser.parseObject();

  if (result === null) {
    throw new ObjectParseError("Expected an object", 0);
  }

  if (result.hasStream) {
    throw new ObjectParseError("Streams cannot be parsed from text", result.streamKeywordPosition);
  }

  parser.expectEnd();

  return result.object;
}
