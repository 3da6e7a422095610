import type { PdfArray } from "#src/objects/pdf-array";
import { PDFHandle } from "./pdf-handle";

/**
 * Array view over a handle.
 *
 * @example
 * ```typescript
 * const array = PDFArrayHandle.from(doc.parseObject("[1 2 3]"));
 *
 * array.push(doc.newName("/Four"));
 * array.toString(); // "[ 1 2 3 /Four ]"
 * ```
 */
export class PDFArrayHandle extends PDFHandle {
  /**
   * @throws {TypeMismatchError} if the handle is not an array
   */
  static from(handle: PDFHandle): PDFArrayHandle {
    const view = new PDFArrayHandle(handle.context, handle.target);

    view.array();

    return view;
  }

  private array(): PdfArray {
    const value = this.value();

    if (value.type !== "array") {
      throw this.mismatch("array");
    }

    return value;
  }

  get length(): number {
    return this.array().length;
  }

  /**
   * Element at `index`, or undefined when out of range.
   */
  get(index: number): PDFHandle | undefined {
    const item = this.array().at(index);

    return item === undefined ? undefined : this.child(item);
  }

  /**
   * @throws {RangeError} if `index` is out of range
   */
  set(index: number, handle: PDFHandle): void {
    this.array().set(index, this.storable(handle));
  }

  push(handle: PDFHandle): void {
    this.array().push(this.storable(handle));
  }

  /**
   * Insert before `index`; `index === length` appends.
   *
   * @throws {RangeError} if `index` is out of range
   */
  insert(index: number, handle: PDFHandle): void {
    this.array().insert(index, this.storable(handle));
  }

  /**
   * @throws {RangeError} if `index` is out of range
   */
  remove(index: number): void {
    this.array().remove(index);
  }

  *[Symbol.iterator](): IterableIterator<PDFHandle> {
    for (let i = 0; i < this.length; i++) {
      const item = this.get(i);

      if (item !== undefined) {
        yield item;
      }
    }
  }

  toArray(): PDFHandle[] {
    return [...this];
  }
}
