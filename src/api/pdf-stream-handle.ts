import type { DecodeLevel } from "#src/filters/filter";
import type { PdfStream } from "#src/objects/pdf-stream";
import { PDFDictionaryHandle } from "./pdf-dictionary-handle";
import { PDFHandle } from "./pdf-handle";

/**
 * Stream view over a handle.
 *
 * @example
 * ```typescript
 * const stream = PDFStreamHandle.from(doc.newStream(bytes));
 *
 * stream.getStreamDictionary().set("/Type", doc.newName("/XObject"));
 * stream.getStreamData("generalized");
 * ```
 */
export class PDFStreamHandle extends PDFHandle {
  /**
   * @throws {TypeMismatchError} if the handle is not a stream
   */
  static from(handle: PDFHandle): PDFStreamHandle {
    const view = new PDFStreamHandle(handle.context, handle.target);

    view.stream();

    return view;
  }

  private stream(): PdfStream {
    const value = this.value();

    if (value.type !== "stream") {
      throw this.mismatch("stream");
    }

    return value;
  }

  /**
   * The stream's dictionary. It is shared: changes through the returned view
   * change this stream.
   */
  getStreamDictionary(): PDFDictionaryHandle {
    return PDFDictionaryHandle.from(this.child(this.stream().dict));
  }

  /**
   * Data decoded as far as `level` allows. When a known filter needs a
   * higher level the raw data comes back unchanged.
   *
   * @throws {DecodeError} for unknown filters, image codecs at level `"all"`
   *   and corrupt data
   */
  getStreamData(level: DecodeLevel = "generalized"): Uint8Array {
    return this.stream().getDecodedData(level);
  }

  /**
   * The data as stored, still filtered.
   */
  getRawStreamData(): Uint8Array {
    return this.stream().data;
  }

  /**
   * Replace the data. Without `filter` the data is taken as unfiltered and
   * /Filter and /DecodeParms are removed; with it, the data is stored as
   * given and described by `filter` and `decodeParms` (a null handle removes
   * the entry). The stream keeps its own copy of `data`.
   */
  replaceStreamData(data: Uint8Array, filter?: PDFHandle, decodeParms?: PDFHandle): void {
    const stream = this.stream();

    if (filter === undefined) {
      stream.setData(data.slice());

      return;
    }

    const dict = this.getStreamDictionary();

    stream.setRawData(data.slice());

    for (const [key, value] of [
      ["Filter", filter],
      ["DecodeParms", decodeParms],
    ] as const) {
      if (value === undefined || value.isNull()) {
        dict.remove(key);
      } else {
        dict.set(key, value);
      }
    }
  }
}
