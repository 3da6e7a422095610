import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Raw data of an inline image: the bytes between `ID` and `EI` in a content
 * stream, without the single whitespace after `ID` and the one before `EI`.
 */
export class PdfInlineImage implements PdfPrimitive {
  get type(): "inline-image" {
    return "inline-image";
  }

  constructor(readonly data: Uint8Array) {}

  clone(): PdfInlineImage {
    return new PdfInlineImage(this.data.slice());
  }

  toBytes(writer: ByteWriter): void {
    writer.writeBytes(this.data);
  }
}
