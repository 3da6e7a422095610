import {
  ANGLE_BRACKET_CLOSE,
  ANGLE_BRACKET_OPEN,
  BACKSLASH,
  CHAR_HASH,
  CHAR_MINUS,
  CHAR_PERIOD,
  CHAR_PLUS,
  CR,
  hexValue,
  isDigit,
  isHexDigit,
  isRegularChar,
  isWhitespace,
  LF,
  PARENTHESIS_CLOSE,
  PARENTHESIS_OPEN,
  PERCENT,
  SLASH,
  SQUARE_BRACKET_CLOSE,
  SQUARE_BRACKET_OPEN,
} from "#src/helpers/chars";
import { ByteWriter } from "#src/io/byte-writer";
import type { Scanner } from "#src/io/scanner";

import { ObjectParseError } from "./errors";
import type { KeywordToken, NameToken, NumberToken, StringToken, Token } from "./token";

export interface TokenReaderOptions {
  /** Reject stray characters inside hex strings instead of skipping them. */
  strict?: boolean;
}

/** `\n` `\r` `\t` `\b` `\f` in literal strings. */
const NAMED_ESCAPES = new Map<number, number>([
  [0x6e, LF],
  [0x72, CR],
  [0x74, 0x09],
  [0x62, 0x08],
  [0x66, 0x0c],
]);

const isOctalDigit = (byte: number) => byte >= 0x30 && byte <= 0x37;

const isLineEnd = (byte: number) => byte === LF || byte === CR;

/**
 * Pulls tokens one at a time from a Scanner, skipping whitespace and
 * comments. Malformed numbers and stray delimiters come back as keywords;
 * strings that run into the end of the input are an error.
 */
export class TokenReader {
  private readonly strict: boolean;

  constructor(
    private scanner: Scanner,
    options: TokenReaderOptions = {},
  ) {
    this.strict = options.strict ?? false;
  }

  get position(): number {
    return this.scanner.position;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();

    const position = this.scanner.position;
    const byte = this.scanner.peek();

    switch (byte) {
      case -1:
        return { type: "eof", position };
      case SLASH:
        return this.readName(position);
      case PARENTHESIS_OPEN:
        return this.readLiteralString(position);
      case ANGLE_BRACKET_OPEN:
        this.scanner.advance();

        if (this.scanner.peek() === ANGLE_BRACKET_OPEN) {
          this.scanner.advance();

          return { type: "delimiter", value: "<<", position };
        }

        return this.readHexString(position);
      case ANGLE_BRACKET_CLOSE:
        this.scanner.advance();

        // A lone > is read as >>; it has no other meaning
        if (this.scanner.peek() === ANGLE_BRACKET_CLOSE) {
          this.scanner.advance();
        }

        return { type: "delimiter", value: ">>", position };
      case SQUARE_BRACKET_OPEN:
      case SQUARE_BRACKET_CLOSE:
        this.scanner.advance();

        return { type: "delimiter", value: byte === SQUARE_BRACKET_OPEN ? "[" : "]", position };
      case CHAR_PLUS:
      case CHAR_MINUS:
      case CHAR_PERIOD:
        return this.readNumber(position);
      default:
        return isDigit(byte) ? this.readNumber(position) : this.readKeyword(position);
    }
  }

  skipWhitespaceAndComments(): void {
    while (true) {
      this.skipWhile(isWhitespace);

      if (this.scanner.peek() !== PERCENT) {
        return;
      }

      this.skipWhile(byte => byte !== -1 && !isLineEnd(byte));
    }
  }

  /**
   * Consume bytes while `test` holds. Returns where the run started.
   */
  private skipWhile(test: (byte: number) => boolean): number {
    const start = this.scanner.position;

    while (test(this.scanner.peek())) {
      this.scanner.advance();
    }

    return start;
  }

  /**
   * Sign, digits and at most one period. Repeated minus signs cancel out
   * (`--5` is 5). Text that does not end at a delimiter is a keyword.
   */
  private readNumber(position: number): NumberToken | KeywordToken {
    let sign = "";
    const signByte = this.scanner.peek();

    if (signByte === CHAR_PLUS || signByte === CHAR_MINUS) {
      this.scanner.advance();
      sign = signByte === CHAR_MINUS ? "-" : "";

      if (this.scanner.peek() === CHAR_MINUS) {
        sign = "";
        this.skipWhile(byte => byte === CHAR_MINUS);
      }
    }

    const digitsStart = this.skipWhile(isDigit);

    if (this.scanner.peek() === CHAR_PERIOD) {
      this.scanner.advance();
      this.skipWhile(isDigit);
    }

    const text = this.text(digitsStart, this.scanner.position);

    if (!/\d/.test(text) || isRegularChar(this.scanner.peek())) {
      this.skipWhile(isRegularChar);

      return { type: "keyword", value: this.text(position, this.scanner.position), position };
    }

    const magnitude = Number.parseFloat(text.startsWith(".") ? `0${text}` : text);

    return {
      type: "number",
      value: sign === "-" ? -magnitude : magnitude,
      isInteger: !text.includes("."),
      raw: sign + text,
      position,
    };
  }

  /** `#xx` escapes are decoded; a `#` without two hex digits stays as is. */
  private readName(position: number): NameToken {
    this.scanner.advance();

    const out = new ByteWriter({ initialSize: 64 });

    while (isRegularChar(this.scanner.peek())) {
      const byte = this.scanner.advance();
      const high = this.scanner.peek();
      const low = this.scanner.peekAt(this.scanner.position + 1);

      if (byte === CHAR_HASH && isHexDigit(high) && isHexDigit(low)) {
        this.scanner.moveTo(this.scanner.position + 2);
        out.writeByte((hexValue(high) << 4) | hexValue(low));
      } else {
        out.writeByte(byte);
      }
    }

    return { type: "name", value: new TextDecoder().decode(out.toBytes()), position };
  }

  private readLiteralString(position: number): StringToken {
    this.scanner.advance();

    const out = new ByteWriter({ initialSize: 64 });
    let depth = 1;

    while (true) {
      const byte = this.scanner.advance();

      switch (byte) {
        case -1:
          throw new ObjectParseError("Unterminated literal string", position);
        case PARENTHESIS_OPEN:
          depth++;
          break;
        case PARENTHESIS_CLOSE:
          if (--depth === 0) {
            return { type: "string", value: out.toBytes(), format: "literal", position };
          }

          break;
        case BACKSLASH:
          this.readEscape(out);
          continue;
        case CR:
          // CR and CRLF read as LF
          if (this.scanner.peek() === LF) {
            this.scanner.advance();
          }

          out.writeByte(LF);
          continue;
      }

      out.writeByte(byte);
    }
  }

  /**
   * The byte after a backslash. An escaped line break writes nothing;
   * `\(`, `\)`, `\\` and unknown escapes write the character itself.
   */
  private readEscape(out: ByteWriter): void {
    const byte = this.scanner.advance();
    const named = NAMED_ESCAPES.get(byte);

    if (named !== undefined) {
      out.writeByte(named);
    } else if (isOctalDigit(byte)) {
      let value = byte - 0x30;

      for (let digits = 1; digits < 3 && isOctalDigit(this.scanner.peek()); digits++) {
        value = value * 8 + (this.scanner.advance() - 0x30);
      }

      out.writeByte(value & 0xff);
    } else if (byte === CR) {
      if (this.scanner.peek() === LF) {
        this.scanner.advance();
      }
    } else if (byte !== LF && byte !== -1) {
      out.writeByte(byte);
    }
  }

  /**
   * Whitespace is skipped, other non-hex bytes too unless strict. An odd
   * digit count is padded with 0.
   */
  private readHexString(position: number): StringToken {
    const nibbles: number[] = [];

    for (let byte = this.scanner.advance(); byte !== ANGLE_BRACKET_CLOSE; byte = this.scanner.advance()) {
      if (byte === -1) {
        throw new ObjectParseError("Unterminated hex string", position);
      }

      if (isHexDigit(byte)) {
        nibbles.push(hexValue(byte));
      } else if (this.strict && !isWhitespace(byte)) {
        throw new ObjectParseError("Invalid character in hex string", this.scanner.position - 1);
      }
    }

    const value = new Uint8Array(Math.ceil(nibbles.length / 2));

    nibbles.forEach((nibble, i) => {
      value[i >> 1] |= i % 2 === 0 ? nibble << 4 : nibble;
    });

    return { type: "string", value, format: "hex", position };
  }

  private readKeyword(position: number): KeywordToken {
    this.skipWhile(isRegularChar);

    // A delimiter that starts no token (`)`, `{`, `}`) is a keyword of its own
    if (this.scanner.position === position) {
      this.scanner.advance();
    }

    return { type: "keyword", value: this.text(position, this.scanner.position), position };
  }

  private text(start: number, end: number): string {
    return new TextDecoder().decode(this.scanner.bytes.subarray(start, end));
  }
}
