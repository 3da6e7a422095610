import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Content-stream operator keyword.
 *
 * In a content stream: `BT`, `Tf`, `re`, `Do`
 *
 * Only produced by content-stream tokenizing; never part of a document's
 * object graph as read from a file.
 */
export class PdfOperator implements PdfPrimitive {
  get type(): "operator" {
    return "operator";
  }

  constructor(readonly value: string) {}

  clone(): PdfOperator {
    return new PdfOperator(this.value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.value);
  }
}
