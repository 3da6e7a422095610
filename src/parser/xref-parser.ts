import { CR, LF, SPACE, isDigit, isWhitespace } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfStream } from "#src/objects/pdf-stream";
import { XRefParseError } from "./errors";
import { IndirectObjectParser } from "./indirect-object-parser";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Entry in the cross-reference table.
 */
export type XRefEntry =
  | { type: "free"; nextFree: number; generation: number }
  | { type: "uncompressed"; offset: number; generation: number }
  | { type: "compressed"; streamObjNum: number; indexInStream: number };

/**
 * One cross-reference section: a table and its trailer, or an xref stream.
 */
export interface XRefData {
  entries: Map<number, XRefEntry>;
  trailer: PdfDict;
  prev?: number;
  /** Offset of a hybrid file's xref stream (`/XRefStm`). */
  xrefStm?: number;
  isStream: boolean;
}

/** How far from the end `startxref` is looked for. */
const STARTXREF_WINDOW = 1024;

/**
 * Reads cross-reference sections. Following `/Prev` is left to the caller.
 */
export class XRefParser {
  constructor(private scanner: Scanner) {}

  /**
   * Offset named by the last `startxref` in the file.
   */
  findStartXRef(): number {
    const { bytes } = this.scanner;
    const marker = lastIndexOf(bytes, "startxref", Math.max(0, bytes.length - STARTXREF_WINDOW));

    if (marker === -1) {
      throw new XRefParseError("Could not find startxref marker", bytes.length);
    }

    this.scanner.moveTo(marker + "startxref".length);
    this.skipWhitespace();

    const offset = this.readUnsigned();

    if (offset === null) {
      throw new XRefParseError("Invalid startxref offset", this.scanner.position);
    }

    return offset;
  }

  /**
   * Read the section at `offset`, either an `xref` table or an xref stream
   * object.
   */
  parseAt(offset: number): XRefData {
    this.scanner.moveTo(offset);

    if (this.scanner.matches("xref")) {
      return this.parseTable();
    }

    if (isDigit(this.scanner.peek())) {
      return this.parseStream();
    }

    throw new XRefParseError("Unknown xref format", offset);
  }

  private parseTable(): XRefData {
    const entries = new Map<number, XRefEntry>();

    this.scanner.moveTo(this.scanner.position + "xref".length);
    this.skipWhitespace();

    while (!this.scanner.matches("trailer")) {
      if (this.scanner.isAtEnd()) {
        throw new XRefParseError("Missing trailer", this.scanner.position);
      }

      const first = this.expectUnsigned("Expected subsection start object number");
      this.skipSpaces();
      const count = this.expectUnsigned("Expected subsection entry count");
      this.skipWhitespace();

      for (let objectNumber = first; objectNumber < first + count; objectNumber++) {
        entries.set(objectNumber, this.parseRow());
      }
    }

    this.scanner.moveTo(this.scanner.position + "trailer".length);
    this.skipWhitespace();

    const trailerStart = this.scanner.position;
    const parsed = new ObjectParser(new TokenReader(this.scanner)).parseObject();

    if (parsed?.object.type !== "dict") {
      throw new XRefParseError("Invalid trailer dictionary", trailerStart);
    }

    const trailer = parsed.object;

    return {
      entries,
      trailer,
      prev: trailer.getNumber("Prev")?.value,
      xrefStm: trailer.getNumber("XRefStm")?.value,
      isStream: false,
    };
  }

  /**
   * One `nnnnnnnnnn ggggg n` row. Rows with other digit counts or a
   * one-byte line ending are accepted.
   */
  private parseRow(): XRefEntry {
    const rowStart = this.scanner.position;
    const first = this.readUnsigned();
    this.skipSpaces();
    const generation = this.readUnsigned();
    this.skipSpaces();

    if (first === null || generation === null) {
      throw new XRefParseError("Malformed xref entry", rowStart);
    }

    const kind = String.fromCharCode(this.scanner.advance());

    while (![LF, CR, -1].includes(this.scanner.peek())) {
      this.scanner.advance();
    }

    this.skipWhitespace();

    switch (kind) {
      case "n":
        return { type: "uncompressed", offset: first, generation };
      case "f":
        return { type: "free", nextFree: first, generation };
      default:
        throw new XRefParseError(`Invalid xref entry type: ${kind}`, rowStart);
    }
  }

  private parseStream(): XRefData {
    const start = this.scanner.position;
    const { value } = new IndirectObjectParser(this.scanner).parseObject();

    if (value.type !== "stream") {
      throw new XRefParseError("Expected XRef stream object", start);
    }

    const type = value.dict.getName("Type");

    // /Type may be left out
    if (type !== undefined && type.value !== "XRef") {
      throw new XRefParseError(`Expected /Type /XRef, got /Type /${type.value}`, start);
    }

    return {
      entries: readStreamEntries(value, start),
      trailer: value.dict,
      prev: value.dict.getNumber("Prev")?.value,
      isStream: true,
    };
  }

  private expectUnsigned(message: string): number {
    const value = this.readUnsigned();

    if (value === null) {
      throw new XRefParseError(message, this.scanner.position);
    }

    return value;
  }

  private readUnsigned(): number | null {
    const start = this.scanner.position;
    let value = 0;

    while (isDigit(this.scanner.peek())) {
      value = value * 10 + (this.scanner.advance() - 0x30);
    }

    return this.scanner.position > start ? value : null;
  }

  private skipSpaces(): void {
    while (this.scanner.peek() === SPACE) {
      this.scanner.advance();
    }
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.scanner.peek())) {
      this.scanner.advance();
    }
  }
}

/**
 * Entries of an xref stream. Each row is three big-endian fields sized by
 * `/W`, for the objects listed by `/Index` (default `[0 /Size]`). An absent
 * type field means type 1. The first row for an object number wins.
 */
function readStreamEntries(stream: PdfStream, start: number): Map<number, XRefEntry> {
  const { dict } = stream;
  const widths = dict.getArray("W");

  if (widths === undefined || widths.length < 3) {
    throw new XRefParseError("XRef stream missing or invalid /W array", start);
  }

  const [typeWidth, secondWidth, thirdWidth] = [0, 1, 2].map(i => {
    const width = widths.at(i);

    return width?.type === "number" ? width.value : 0;
  });

  const size = dict.getNumber("Size")?.value;

  if (size === undefined) {
    throw new XRefParseError("XRef stream missing /Size", start);
  }

  const index = dict.getArray("Index");
  const ranges: Array<[first: number, count: number]> = [];

  if (index === undefined) {
    ranges.push([0, size]);
  } else {
    for (let i = 0; i < index.length; i += 2) {
      const first = index.at(i);
      const count = index.at(i + 1);

      if (first?.type !== "number" || count?.type !== "number") {
        throw new XRefParseError("Invalid /Index array in XRef stream", start);
      }

      ranges.push([first.value, count.value]);
    }
  }

  const data = stream.getDecodedData();
  const rowSize = typeWidth + secondWidth + thirdWidth;
  const entries = new Map<number, XRefEntry>();
  let pos = 0;

  const field = (width: number, fallback: number): number => {
    if (width === 0) {
      return fallback;
    }

    let value = 0;

    for (const end = pos + width; pos < end; pos++) {
      value = value * 256 + data[pos];
    }

    return value;
  };

  for (const [first, count] of ranges) {
    for (let objectNumber = first; objectNumber < first + count; objectNumber++) {
      if (pos + rowSize > data.length) {
        throw new XRefParseError("XRef stream data truncated", start);
      }

      const type = field(typeWidth, 1);
      const second = field(secondWidth, 0);
      const third = field(thirdWidth, 0);

      let entry: XRefEntry;

      if (type === 0) {
        entry = { type: "free", nextFree: second, generation: third };
      } else if (type === 1) {
        entry = { type: "uncompressed", offset: second, generation: third };
      } else if (type === 2) {
        entry = { type: "compressed", streamObjNum: second, indexInStream: third };
      } else {
        throw new XRefParseError(`Invalid XRef entry type: ${type}`, start);
      }

      if (!entries.has(objectNumber)) {
        entries.set(objectNumber, entry);
      }
    }
  }

  return entries;
}

/**
 * Start of the last occurrence of `text` that begins at or after `from`.
 */
function lastIndexOf(bytes: Uint8Array, text: string, from: number): number {
  const matchesAt = (i: number) => [...text].every((char, k) => bytes[i + k] === char.charCodeAt(0));

  for (let i = bytes.length - text.length; i >= from; i--) {
    if (matchesAt(i)) {
      return i;
    }
  }

  return -1;
}
