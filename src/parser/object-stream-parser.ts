import { Scanner } from "#src/io/scanner";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError, StructureError } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

interface Contents {
  /** Object numbers and their offsets from /First, in stream order. */
  index: Array<{ objectNumber: number; offset: number }>;
  /** Decoded bytes from /First on. */
  body: Uint8Array;
}

/**
 * Reads the objects packed into an object stream (`/Type /ObjStm`).
 *
 * The decoded stream starts with /N pairs of `objectNumber offset`, then
 * the objects themselves, without `obj`/`endobj`, from byte /First on.
 * Nothing is decoded until an object is asked for, and each object is
 * parsed at most once.
 */
export class ObjectStreamParser {
  private contents: Contents | null = null;
  private readonly parsed = new Map<number, PdfObject | null>();
  private readonly count: number;
  private readonly first: number;

  constructor(private stream: PdfStream) {
    const { dict } = stream;
    const type = dict.getName("Type")?.value;

    if (type !== "ObjStm") {
      throw new StructureError(`Expected /Type /ObjStm, got ${type ?? "none"}`);
    }

    this.count = requiredInteger(dict.getNumber("N")?.value, "N");
    this.first = requiredInteger(dict.getNumber("First")?.value, "First");
  }

  get objectCount(): number {
    return this.count;
  }

  /**
   * Object at `index` (an xref entry's `indexInStream`), or null when the
   * index is out of range.
   */
  getObject(index: number): PdfObject | null {
    const { index: entries, body } = this.load();
    const entry = entries.at(index);

    if (index < 0 || entry === undefined) {
      return null;
    }

    const cached = this.parsed.get(index);

    if (cached !== undefined) {
      return cached;
    }

    const scanner = new Scanner(body);
    scanner.moveTo(entry.offset);

    const result = new ObjectParser(new TokenReader(scanner)).parseObject();

    if (result?.hasStream) {
      throw new ObjectParseError("Object streams cannot contain streams", entry.offset);
    }

    const object = result?.object ?? null;
    this.parsed.set(index, object);

    return object;
  }

  /** Object number at `index`, or null when out of range. */
  getObjectNumber(index: number): number | null {
    return index < 0 ? null : (this.load().index.at(index)?.objectNumber ?? null);
  }

  /** Every object in the stream, by object number. */
  getAllObjects(): Map<number, PdfObject> {
    const objects = new Map<number, PdfObject>();

    this.load().index.forEach(({ objectNumber }, i) => {
      const object = this.getObject(i);

      if (object !== null) {
        objects.set(objectNumber, object);
      }
    });

    return objects;
  }

  private load(): Contents {
    if (this.contents === null) {
      const data = this.stream.getDecodedData();

      this.contents = {
        index: readIndex(data.subarray(0, this.first), this.count),
        body: data.subarray(this.first),
      };
    }

    return this.contents;
  }
}

function requiredInteger(value: number | undefined, key: string): number {
  if (value === undefined) {
    throw new StructureError(`Object stream missing required /${key} entry`);
  }

  return value;
}

function readIndex(header: Uint8Array, count: number): Contents["index"] {
  const reader = new TokenReader(new Scanner(header));
  const index: Contents["index"] = [];

  const readInteger = (entry: number, what: string): number => {
    const token = reader.nextToken();

    if (token.type !== "number" || !token.isInteger) {
      throw new ObjectParseError(
        `Invalid object stream index at entry ${entry}: expected ${what}`,
        token.position,
      );
    }

    return token.value;
  };

  for (let entry = 0; entry < count; entry++) {
    const objectNumber = readInteger(entry, "object number");
    const offset = readInteger(entry, "offset");

    index.push({ objectNumber, offset });
  }

  return index;
}
