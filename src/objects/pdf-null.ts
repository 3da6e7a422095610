import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF null object.
 *
 * In PDF: `null`
 *
 * Not a singleton: a direct null stored in a container is a node of its own.
 */
export class PdfNull implements PdfPrimitive {
  get type(): "null" {
    return "null";
  }

  clone(): PdfNull {
    return new PdfNull();
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("null");
  }
}
