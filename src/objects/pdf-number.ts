import { formatPdfNumber, formatReal } from "#src/helpers/format";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

export type PdfNumberKind = "integer" | "real";

/**
 * PDF numeric object (integer or real).
 *
 * In PDF: `42`, `-3.14`, `0.5`
 *
 * Reals keep their decimal text: the text read from the file, or the text
 * formatted at construction. It is what gets written back, so a parsed
 * `1.50` stays `1.50`.
 */
export class PdfNumber implements PdfPrimitive {
  get type(): "number" {
    return "number";
  }

  private constructor(
    readonly value: number,
    readonly kind: PdfNumberKind,
    readonly text: string,
  ) {}

  /**
   * Returns true if this number was written or created as an integer.
   */
  isInteger(): boolean {
    return this.kind === "integer";
  }

  /**
   * Exact value of an integer, read from its text.
   */
  toBigInt(): bigint {
    return /^[+-]?\d+$/.test(this.text) ? BigInt(this.text) : BigInt(Math.trunc(this.value));
  }

  /**
   * An integer. A `bigint` keeps its exact digits in the written text even
   * where `value` cannot hold them.
   */
  static integer(value: number | bigint): PdfNumber {
    if (typeof value === "bigint") {
      return new PdfNumber(Number(value), "integer", value.toString());
    }

    const truncated = Math.trunc(value);

    return new PdfNumber(truncated, "integer", truncated.toString());
  }

  /**
   * A real formatted with `decimals` places (6 when `decimals <= 0`), with
   * trailing zeros stripped.
   */
  static real(value: number, decimals = 0): PdfNumber {
    return new PdfNumber(value, "real", formatReal(value, decimals));
  }

  /**
   * An integer when `value` has no fractional part, a real otherwise.
   */
  static of(value: number): PdfNumber {
    if (Number.isInteger(value)) {
      return PdfNumber.integer(value);
    }

    return new PdfNumber(value, "real", formatPdfNumber(value));
  }

  /**
   * A number as read from a file, keeping its source text.
   */
  static parsed(value: number, isInteger: boolean, text: string): PdfNumber {
    return new PdfNumber(value, isInteger ? "integer" : "real", text);
  }

  clone(): PdfNumber {
    return new PdfNumber(this.value, this.kind, this.text);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.text);
  }
}
