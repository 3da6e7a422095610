import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Value of an indirect slot that was allocated but not filled yet.
 *
 * Lets callers build cyclic structures: reserve a number, reference it,
 * then replace the reservation with the real value. A reservation that is
 * never replaced is written as `null`.
 */
export class PdfReserved implements PdfPrimitive {
  get type(): "reserved" {
    return "reserved";
  }

  clone(): PdfReserved {
    return new PdfReserved();
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("null");
  }
}

/**
 * Target of a handle that holds no value at all. It cannot be stored in the
 * graph, so it is not part of the `PdfObject` union.
 */
export class PdfUninitialized {
  get type(): "uninitialized" {
    return "uninitialized";
  }
}
