import type { ByteWriter } from "#src/io/byte-writer";

import type { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import { escapeName, normalizeNameKey, type PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";
import type { PdfRef, RefResolver } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * `<< /Key value ... >>`, mutable and kept in insertion order.
 *
 * Keys are held without the leading slash; every method takes them with
 * or without it.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" {
    return "dict";
  }

  private readonly entries = new Map<string, PdfObject>();

  constructor(entries: Iterable<[string, PdfObject]> = []) {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get the value for a key. With a resolver, a reference is followed.
   */
  get(key: string, resolver?: RefResolver): PdfObject | undefined {
    const value = this.entries.get(normalizeNameKey(key));

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  set(key: string, value: PdfObject): void {
    this.entries.set(normalizeNameKey(key), value);
  }

  has(key: string): boolean {
    return this.entries.has(normalizeNameKey(key));
  }

  /** True when the key was there. */
  delete(key: string): boolean {
    return this.entries.delete(normalizeNameKey(key));
  }

  /**
   * Keys without the leading slash, in insertion order.
   */
  keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  *[Symbol.iterator](): Iterator<[string, PdfObject]> {
    yield* this.entries;
  }

  // Typed getters: undefined when the key is missing or holds another
  // type. With a resolver a reference is followed first.

  getName(key: string, resolver?: RefResolver): PdfName | undefined {
    return ofType(this.get(key, resolver), "name");
  }

  getNumber(key: string, resolver?: RefResolver): PdfNumber | undefined {
    return ofType(this.get(key, resolver), "number");
  }

  getString(key: string, resolver?: RefResolver): PdfString | undefined {
    return ofType(this.get(key, resolver), "string");
  }

  getArray(key: string, resolver?: RefResolver): PdfArray | undefined {
    return ofType(this.get(key, resolver), "array");
  }

  getDict(key: string, resolver?: RefResolver): PdfDict | undefined {
    return ofType(this.get(key, resolver), "dict");
  }

  getStream(key: string, resolver?: RefResolver): PdfStream | undefined {
    return ofType(this.get(key, resolver), "stream");
  }

  getBool(key: string, resolver?: RefResolver): PdfBool | undefined {
    return ofType(this.get(key, resolver), "bool");
  }

  /** The reference itself, never followed. */
  getRef(key: string): PdfRef | undefined {
    return ofType(this.get(key), "ref");
  }

  /**
   * Deep copy, keeping references as references.
   */
  clone(): PdfDict {
    const copy = new PdfDict();

    this.entries.forEach((value, key) => copy.entries.set(key, value.clone()));

    return copy;
  }
  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  toBytes(writer: ByteWriter): void {
    this.writeEntries(writer);
  }

  /**
   * Write `<< ... >>`, leaving out the listed keys. With `open` false the
   * caller has already written `<<` (and entries of its own).
   */
  writeEntries(writer: ByteWriter, skip?: ReadonlySet<string>, open = true): void {
    if (open) {
      writer.writeAscii("<<\n");
    }

    for (const [key, value] of this.entries) {
      if (skip?.has(key)) {
        continue;
      }

      writer.writeAscii(`/${escapeName(key)} `);
      value.toBytes(writer);
      writer.writeAscii("\n");
    }

    writer.writeAscii(">>");
  }
}

function ofType<T extends PdfObject["type"]>(
  value: PdfObject | undefined,
  type: T,
): Extract<PdfObject, { type: T }> | undefined {
  return isOfType(value, type) ? value : undefined;
}

function isOfType<T extends PdfObject["type"]>(
  value: PdfObject | undefined,
  type: T,
): value is Extract<PdfObject, { type: T }> {
  return value?.type === type;
}
