import { CR, LF, isWhitespace } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Parsed indirect object.
 */
export interface IndirectObject {
  objNum: number;
  genNum: number;
  value: PdfObject;
}

/**
 * Callback to resolve indirect /Length references.
 * Returns the length value, or null if not resolvable.
 */
export type LengthResolver = (ref: PdfRef) => number | null;

export interface IndirectObjectParserOptions {
  lengthResolver?: LengthResolver;
  /** Tolerate missing `endobj` and wrong stream lengths. */
  lenient?: boolean;
  onWarning?: (message: string) => void;
}

/**
 * Parser for indirect object definitions.
 *
 * Handles the `N M obj ... endobj` syntax and stream binary data.
 * Uses ObjectParser for the actual object content.
 */
export class IndirectObjectParser {
  private readonly lenient: boolean;

  constructor(
    private scanner: Scanner,
    private options: IndirectObjectParserOptions = {},
  ) {
    this.lenient = options.lenient ?? true;
  }

  /**
   * Parse indirect object at current scanner position.
   */
  parseObject(): IndirectObject {
    const reader = new TokenReader(this.scanner, { strict: !this.lenient });

    const objNumToken = reader.nextToken();

    if (objNumToken.type !== "number" || !objNumToken.isInteger) {
      throw new ObjectParseError("Expected integer object number", objNumToken.position);
    }

    const genNumToken = reader.nextToken();

    if (genNumToken.type !== "number" || !genNumToken.isInteger) {
      throw new ObjectParseError("Expected integer generation number", genNumToken.position);
    }

    const objKeyword = reader.nextToken();

    if (objKeyword.type !== "keyword" || objKeyword.value !== "obj") {
      throw new ObjectParseError("Expected 'obj' keyword", objKeyword.position);
    }

    const objectParser = new ObjectParser(reader, {
      recover: this.lenient ? (message, position) => this.warn(`${message} (at offset ${position})`) : undefined,
    });

    const result = objectParser.parseObject();

    if (result === null) {
      throw new ObjectParseError("Expected object value", this.scanner.position);
    }

    let value: PdfObject;

    if (result.hasStream) {
      this.scanner.moveTo(result.streamKeywordPosition + "stream".length);

      value = this.readStream(result.object);

      // The reader is out of sync after raw data, check the scanner directly
      this.skipWhitespace();

      if (!this.scanner.matches("endobj")) {
        this.missingEndobj();
      }
    } else {
      value = result.object;

      if (!objectParser.isAtKeyword("endobj")) {
        this.missingEndobj();
      }
    }

    return {
      objNum: objNumToken.value,
      genNum: genNumToken.value,
      value,
    };
  }

  /**
   * Parse indirect object at given byte offset.
   */
  parseObjectAt(offset: number): IndirectObject {
    this.scanner.moveTo(offset);

    return this.parseObject();
  }

  private warn(message: string): void {
    this.options.onWarning?.(message);
  }

  private missingEndobj(): void {
    if (!this.lenient) {
      throw new ObjectParseError("Expected 'endobj'", this.scanner.position);
    }

    this.warn(`Missing 'endobj' at offset ${this.scanner.position}`);
  }

  /**
   * Read stream data after the dict has been parsed.
   * The scanner is positioned right after "stream".
   */
  private readStream(dict: PdfDict): PdfStream {
    // Single EOL (LF or CRLF) after "stream"
    this.skipEOL();

    const startPos = this.scanner.position;
    const length = this.resolveLength(dict);

    this.scanner.moveTo(startPos + length);
    this.skipEOL();
    this.skipWhitespace();

    if (this.scanner.matches("endstream")) {
      this.scanner.moveTo(this.scanner.position + "endstream".length);

      return new PdfStream(dict, this.scanner.bytes.slice(startPos, startPos + length));
    }

    if (!this.lenient) {
      throw new ObjectParseError("Expected 'endstream'", this.scanner.position);
    }

    return new PdfStream(dict, this.recoverStreamData(startPos));
  }

  /**
   * Find the data of a stream whose /Length is wrong by searching for the
   * next `endstream` keyword.
   */
  private recoverStreamData(startPos: number): Uint8Array {
    this.scanner.moveTo(startPos);

    while (!this.scanner.isAtEnd() && !this.scanner.matches("endstream")) {
      this.scanner.advance();
    }

    if (this.scanner.isAtEnd()) {
      throw new ObjectParseError("Stream has no 'endstream'", startPos);
    }

    let end = this.scanner.position;

    // Drop the EOL that precedes the keyword
    if (end > startPos && this.scanner.peekAt(end - 1) === LF) {
      end--;
    }

    if (end > startPos && this.scanner.peekAt(end - 1) === CR) {
      end--;
    }

    this.warn(`Stream /Length is wrong, using ${end - startPos} bytes (at offset ${startPos})`);
    this.scanner.moveTo(this.scanner.position + "endstream".length);

    return this.scanner.bytes.slice(startPos, end);
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.scanner.peek())) {
      this.scanner.advance();
    }
  }

  private skipEOL(): void {
    const byte = this.scanner.peek();

    if (byte === CR) {
      this.scanner.advance();

      if (this.scanner.peek() === LF) {
        this.scanner.advance();
      }
    } else if (byte === LF) {
      this.scanner.advance();
    }
  }

  /**
   * Resolve the /Length value from the stream dict.
   * Handles both direct values and indirect references.
   */
  private resolveLength(dict: PdfDict): number {
    const lengthObj = dict.get("Length");
    let length: number | null = null;

    if (lengthObj?.type === "number") {
      length = lengthObj.value;
    } else if (lengthObj?.type === "ref") {
      length = this.options.lengthResolver?.(lengthObj) ?? null;
    }

    if (length === null || !Number.isInteger(length) || length < 0) {
      if (!this.lenient) {
        throw new ObjectParseError("Stream has no valid /Length", this.scanner.position);
      }

      // Forces the endstream search
      return 0;
    }

    return Math.min(length, this.scanner.length - this.scanner.position);
  }
}
