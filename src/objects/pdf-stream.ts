import type { DecodeLevel, FilterSpec } from "#src/filters/filter";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import type { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

const LENGTH_KEY = new Set(["Length"]);

/**
 * PDF stream object (dictionary + binary data).
 *
 * In PDF:
 * ```
 * << /Length 5 /Filter /FlateDecode >>
 * stream
 * ...binary data...
 * endstream
 * ```
 *
 * The dictionary is a node of its own (`dict`), shared with anyone who holds
 * it. `/Length` is recomputed on write.
 */
export class PdfStream implements PdfPrimitive {
  get type(): "stream" {
    return "stream";
  }

  readonly dict: PdfDict;

  private _data: Uint8Array;

  constructor(dict?: PdfDict | Iterable<[string, PdfObject]>, data: Uint8Array = new Uint8Array(0)) {
    this.dict = dict instanceof PdfDict ? dict : new PdfDict(dict);
    this._data = data;
  }

  /**
   * The raw (possibly compressed) stream data.
   */
  get data(): Uint8Array {
    return this._data;
  }

  /**
   * Replace the raw data, keeping the dictionary (and its filters) as is.
   */
  setRawData(value: Uint8Array): void {
    this._data = value;
  }

  /**
   * Set new, unfiltered stream content. Clears /Filter and /DecodeParms.
   */
  setData(value: Uint8Array): void {
    this.dict.delete("Filter");
    this.dict.delete("DecodeParms");
    this._data = value;
  }

  static fromDict(entries: Record<string, PdfObject>, data: Uint8Array = new Uint8Array(0)): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  /**
   * The filter chain from /Filter and /DecodeParms. An empty array when
   * the data is not filtered.
   */
  getFilterSpecs(): FilterSpec[] {
    const filterEntry = this.dict.get("Filter");
    const names: string[] = [];

    if (filterEntry instanceof PdfName) {
      names.push(filterEntry.value);
    } else if (filterEntry instanceof PdfArray) {
      for (const item of filterEntry) {
        if (item instanceof PdfName) {
          names.push(item.value);
        }
      }
    }

    const parmsEntry = this.dict.get("DecodeParms");
    const params: (PdfDict | undefined)[] = [];

    if (parmsEntry instanceof PdfDict) {
      params.push(parmsEntry);
    } else if (parmsEntry instanceof PdfArray) {
      for (const item of parmsEntry) {
        params.push(item instanceof PdfDict ? item : undefined);
      }
    }

    return names.map((name, i) => ({ name, params: params[i] }));
  }

  /**
   * Get the stream data decoded at the given level.
   *
   * @see FilterPipeline.decodeAtLevel
   */
  getDecodedData(level: DecodeLevel = "all"): Uint8Array {
    return FilterPipeline.decodeAtLevel(this._data, this.getFilterSpecs(), level);
  }

  /**
   * Deep copy of dictionary and data.
   */
  clone(): PdfStream {
    return new PdfStream(this.dict.clone(), this._data.slice());
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`<<\n/Length ${this._data.length}\n`);
    this.dict.writeEntries(writer, LENGTH_KEY, false);
    writer.writeAscii("\nstream\n");
    writer.writeBytes(this._data);
    writer.writeAscii("\nendstream");
  }
}
