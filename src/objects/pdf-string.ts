import { PARENTHESIS_CLOSE, PARENTHESIS_OPEN } from "#src/helpers/chars";
import { bytesToHex, escapeLiteralString, hexToBytes } from "#src/helpers/strings";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

export type PdfStringFormat = "literal" | "hex";

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 *
 * Stores raw bytes; text decoding lives in `#src/helpers/strings`.
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: PdfStringFormat = "literal",
  ) {}

  /**
   * Create a PdfString holding the UTF-8 bytes of a JavaScript string.
   */
  static fromString(str: string): PdfString {
    return new PdfString(new TextEncoder().encode(str), "literal");
  }

  /**
   * Create a PdfString from a hex string (e.g., "48656C6C6F").
   */
  static fromHex(hex: string): PdfString {
    return new PdfString(hexToBytes(hex), "hex");
  }

  clone(): PdfString {
    return new PdfString(this.bytes.slice(), this.format);
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes, "upper")}>`);

      return;
    }

    writer.writeByte(PARENTHESIS_OPEN);
    writer.writeBytes(escapeLiteralString(this.bytes));
    writer.writeByte(PARENTHESIS_CLOSE);
  }
}
