import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF boolean object.
 *
 * In PDF: `true` or `false`
 */
export class PdfBool implements PdfPrimitive {
  constructor(readonly value: boolean) {}

  get type(): "bool" {
    return "bool";
  }

  static of(value: boolean): PdfBool {
    return new PdfBool(value);
  }

  clone(): PdfBool {
    return new PdfBool(this.value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.value ? "true" : "false");
  }
}
