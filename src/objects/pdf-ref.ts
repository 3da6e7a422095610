import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Looks up the object a reference points at; null when there is none.
 */
export type RefResolver = (ref: PdfRef) => PdfObject | null;

/**
 * `12 0 R`. Interned, so `PdfRef.of(12, 0) === PdfRef.of(12, 0)` and refs
 * can key maps directly.
 */
export class PdfRef implements PdfPrimitive {
  /** generation -> object number -> ref */
  private static readonly interned = new Map<number, Map<number, PdfRef>>();

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  get type(): "ref" {
    return "ref";
  }

  static of(objectNumber: number, generation = 0): PdfRef {
    let byNumber = PdfRef.interned.get(generation);

    if (byNumber === undefined) {
      byNumber = new Map();
      PdfRef.interned.set(generation, byNumber);
    }

    const existing = byNumber.get(objectNumber);

    if (existing !== undefined) {
      return existing;
    }

    const ref = new PdfRef(objectNumber, generation);
    byNumber.set(objectNumber, ref);

    return ref;
  }

  /** A reference is a value: its copy is itself. */
  clone(): PdfRef {
    return this;
  }

  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
