import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * `[1 /Two (three)]`, mutable.
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items: readonly PdfObject[] = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  /** Undefined out of range; negative indexes do not count from the end. */
  at(index: number): PdfObject | undefined {
    return index < 0 ? undefined : this.items[index];
  }

  /**
   * Replace the item at an existing index.
   *
   * @throws {RangeError} if the index is out of bounds
   */
  set(index: number, value: PdfObject): void {
    this.checkIndex(index, this.items.length - 1);
    this.items[index] = value;
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  /**
   * Insert item at index, shifting subsequent items. `index === length`
   * appends.
   *
   * @throws {RangeError} if the index is out of bounds
   */
  insert(index: number, value: PdfObject): void {
    this.checkIndex(index, this.items.length);
    this.items.splice(index, 0, value);
  }

  /**
   * Remove item at index, shifting subsequent items.
   *
   * @throws {RangeError} if the index is out of bounds
   */
  remove(index: number): void {
    this.checkIndex(index, this.items.length - 1);
    this.items.splice(index, 1);
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  /** A copy of the items. */
  toArray(): PdfObject[] {
    return [...this.items];
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  /** Deep copy, keeping references as references. */
  clone(): PdfArray {
    return new PdfArray(this.items.map(item => item.clone()));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, i) => {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }

  private checkIndex(index: number, last: number): void {
    if (!Number.isInteger(index) || index < 0 || index > last) {
      throw new RangeError(`Array index ${index} out of range (length ${this.items.length})`);
    }
  }
}
