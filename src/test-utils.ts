/**
 * Test utilities. Every fixture is built in memory; nothing is read from
 * disk.
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "#src/objects/pdf-primitive";

/**
 * Create a Uint8Array from a string, one byte per character.
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);

  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }

  return bytes;
}

/**
 * Inverse of {@link stringToBytes}.
 */
export function bytesToString(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}

/**
 * File syntax of a single object, as the writer would emit it.
 */
export function serialize(obj: PdfPrimitive): string {
  const writer = new ByteWriter({ initialSize: 64 });

  obj.toBytes(writer);

  return bytesToString(writer.toBytes());
}

export interface BuildPdfOptions {
  /** Header version. Default: "1.4" */
  version?: string;
  /** Extra trailer entries. Default: "/Root 1 0 R" */
  trailer?: string;
}

/**
 * Assemble a classic (xref table) PDF file.
 *
 * `objects[i]` is the body of object `i + 1`, generation 0: the text that
 * goes between `obj` and `endobj`.
 *
 * @example
 * ```ts
 * const bytes = buildPdf([
 *   "<< /Type /Catalog /Pages 2 0 R >>",
 *   "<< /Type /Pages /Kids [] /Count 0 >>",
 * ]);
 * ```
 */
export function buildPdf(objects: string[], options: BuildPdfOptions = {}): Uint8Array {
  let text = `%PDF-${options.version ?? "1.4"}\n`;
  const offsets: number[] = [];

  objects.forEach((body, i) => {
    offsets.push(text.length);
    text += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = text.length;

  text += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;

  for (const offset of offsets) {
    text += `${offset.toString().padStart(10, "0")} 00000 n \n`;
  }

  text += `trailer\n<< /Size ${objects.length + 1} ${options.trailer ?? "/Root 1 0 R"} >>\n`;
  text += `startxref\n${xrefOffset}\n%%EOF\n`;

  return stringToBytes(text);
}

/**
 * A minimal document: catalog, page tree and `pageCount` empty pages.
 */
export function buildSimplePdf(pageCount = 1): Uint8Array {
  const kids = Array.from({ length: pageCount }, (_, i) => `${i + 3} 0 R`).join(" ");
  const pages = Array.from(
    { length: pageCount },
    () => "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>",
  );

  return buildPdf([
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${kids}] /Count ${pageCount} >>`,
    ...pages,
  ]);
}
