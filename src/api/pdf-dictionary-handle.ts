import { concatBytes } from "@noble/hashes/utils.js";
import { LF } from "#src/helpers/chars";
import { normalizeNameKey } from "#src/objects/pdf-name";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PDFArrayHandle } from "./pdf-array-handle";
import { PDFHandle } from "./pdf-handle";

/**
 * Dictionary view over a handle.
 *
 * Keys come back with their leading slash (`"/Type"`); every method takes
 * them with or without it. A stream's dictionary is reached through
 * {@link PDFStreamHandle.getStreamDictionary}, not through this view.
 */
export class PDFDictionaryHandle extends PDFHandle {
  /**
   * @throws {TypeMismatchError} if the handle is not a dictionary
   */
  static from(handle: PDFHandle): PDFDictionaryHandle {
    const view = new PDFDictionaryHandle(handle.context, handle.target);

    view.dict();

    return view;
  }

  private dict(): PdfDict {
    const value = this.value();

    if (value.type !== "dict") {
      throw this.mismatch("dictionary");
    }

    return value;
  }

  keys(): string[] {
    return [...this.dict().keys()].map(key => `/${key}`);
  }

  has(key: string): boolean {
    return this.dict().has(key);
  }

  get(key: string): PDFHandle | undefined {
    const value = this.dict().get(key);

    return value === undefined ? undefined : this.child(value);
  }

  /**
   * The value of `key` as an array view, or undefined when it is absent or
   * not an array.
   */
  getArray(key: string): PDFArrayHandle | undefined {
    const value = this.get(key);

    return value?.isArray() ? PDFArrayHandle.from(value) : undefined;
  }

  /**
   * The value of `key` as a dictionary view, or undefined when it is absent
   * or not a dictionary.
   */
  getDictionary(key: string): PDFDictionaryHandle | undefined {
    const value = this.get(key);

    return value?.isDictionary() ? PDFDictionaryHandle.from(value) : undefined;
  }

  set(key: string, handle: PDFHandle): void {
    this.dict().set(normalizeNameKey(key), this.storable(handle));
  }

  /**
   * Remove `key`; absent keys are ignored.
   */
  remove(key: string): void {
    this.dict().delete(key);
  }

  *[Symbol.iterator](): IterableIterator<[string, PDFHandle]> {
    for (const [key, value] of this.dict()) {
      yield [`/${key}`, this.child(value)];
    }
  }

  /**
   * Decoded content of a page: every stream of /Contents at decode level
   * specialized, joined with a newline where the previous stream did not
   * end with one. A page without /Contents yields no bytes.
   *
   * @throws {DecodeError} if a content stream cannot be decoded
   */
  getPageContentData(): Uint8Array {
    const contents = this.context.deref(this.dict().get("Contents"));
    const items: (PdfObject | undefined)[] =
      contents?.type === "array" ? contents.toArray() : [contents];
    const parts: Uint8Array[] = [];

    for (const item of items) {
      const stream = this.context.deref(item);

      if (stream === undefined) {
        continue;
      }

      if (stream.type !== "stream") {
        this.context.addWarning(`Page /Contents holds a ${stream.type} instead of a stream, skipped`);
        continue;
      }

      const previous = parts.at(-1);

      if (previous !== undefined && previous.length > 0 && previous[previous.length - 1] !== LF) {
        parts.push(new Uint8Array([LF]));
      }

      parts.push(stream.getDecodedData("specialized"));
    }

    return concatBytes(...parts);
  }
}
