import { isDelimiter, isWhitespace } from "#src/helpers/chars";
import { Scanner } from "#src/io/scanner";
import { PdfInlineImage } from "#src/objects/pdf-inline-image";
import type { PdfObject } from "#src/objects/pdf-object";
import { ObjectParseError } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Tokenizer for page content streams.
 *
 * Yields operands and operators in order, flat: `BT /F1 12 Tf` becomes
 * `[BT, /F1, 12, Tf]`. An inline image `BI <entries> ID <data> EI` yields
 * its entries as operands, the `ID` operator, one {@link PdfInlineImage}
 * with the raw data, and the `EI` operator.
 */
export class ContentStreamParser {
  private readonly scanner: Scanner;
  private readonly parser: ObjectParser;

  constructor(private readonly bytes: Uint8Array) {
    this.scanner = new Scanner(bytes);
    this.parser = new ObjectParser(new TokenReader(this.scanner), { operators: true });
  }

  /**
   * @throws {ObjectParseError} on malformed syntax or an inline image
   *   without `EI`
   */
  parse(): PdfObject[] {
    const result: PdfObject[] = [];

    while (true) {
      const parsed = this.parser.parseObject();

      if (parsed === null) {
        return result;
      }

      if (parsed.hasStream) {
        throw new ObjectParseError("Unexpected 'stream' in content", parsed.streamKeywordPosition);
      }

      result.push(parsed.object);

      if (parsed.object.type === "operator" && parsed.object.value === "ID") {
        result.push(this.readInlineImage());
      }
    }
  }

  /**
   * Read the data after `ID`, leaving the scanner at `EI`.
   *
   * The data starts after the single whitespace byte that ends `ID` and
   * stops before the whitespace that precedes an `EI` keyword standing on
   * its own.
   */
  private readInlineImage(): PdfInlineImage {
    const dataStart = this.parser.lastKeywordEnd + 1;

    for (let i = dataStart - 1; i + 2 < this.bytes.length; i++) {
      if (!this.isEndMarker(i)) {
        continue;
      }

      const data = this.bytes.slice(dataStart, Math.max(dataStart, i));

      this.scanner.moveTo(i + 1);
      this.parser.reset();

      return new PdfInlineImage(data);
    }

    throw new ObjectParseError("Inline image without 'EI'", dataStart);
  }

  private isEndMarker(i: number): boolean {
    const after = this.scanner.peekAt(i + 3);

    return (
      isWhitespace(this.scanner.peekAt(i)) &&
      this.scanner.peekAt(i + 1) === 0x45 && // E
      this.scanner.peekAt(i + 2) === 0x49 && // I
      (after === -1 || isWhitespace(after) || isDelimiter(after))
    );
  }
}

/**
 * Tokenize content-stream bytes. See {@link ContentStreamParser}.
 */
export function parseContentStream(bytes: Uint8Array): PdfObject[] {
  return new ContentStreamParser(bytes).parse();
}
