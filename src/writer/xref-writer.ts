/**
 * Cross-reference section writing: classic tables and xref streams.
 */

import { FilterPipeline } from "#src/filters/filter-pipeline";
import { encodePngUp } from "#src/filters/predictor";
import { SINGLE_BYTE_MASK } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";

/**
 * One row of a cross-reference section.
 */
export interface XRefWriteEntry {
  objectNumber: number;
  generation: number;
  type: "inuse" | "free" | "compressed";

  /** For inuse: byte offset. For compressed: object stream number */
  offset: number;

  /** For compressed: index within the object stream */
  index?: number;
}

interface Subsection {
  start: number;
  entries: XRefWriteEntry[];
}

/**
 * Group consecutive object numbers into subsections.
 *
 * For example: [1, 2, 3, 7, 8] → [[1, 3], [7, 2]] (start, count pairs)
 */
function groupIntoSubsections(entries: XRefWriteEntry[]): Subsection[] {
  const sorted = [...entries].sort((a, b) => a.objectNumber - b.objectNumber);
  const subsections: Subsection[] = [];
  let current: Subsection | null = null;

  for (const entry of sorted) {
    if (current !== null && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      current = { start: entry.objectNumber, entries: [entry] };
      subsections.push(current);
    }
  }

  return subsections;
}

/**
 * Format a single xref table row (exactly 20 bytes):
 * `"OOOOOOOOOO GGGGG n\r\n"` or `"OOOOOOOOOO GGGGG f\r\n"`.
 */
export function formatXRefTableEntry(entry: Pick<XRefWriteEntry, "offset" | "generation" | "type">): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");
  const marker = entry.type === "free" ? "f" : "n";

  return `${offset} ${generation} ${marker}\r\n`;
}

/**
 * Write `xref` and its subsections.
 *
 * @returns the byte position of each object's row, so rows can be
 *   overwritten once offsets are known
 */
export function writeXRefTable(writer: ByteWriter, entries: XRefWriteEntry[]): Map<number, number> {
  const rows = new Map<number, number>();

  writer.writeAscii("xref\n");

  for (const subsection of groupIntoSubsections(entries)) {
    writer.writeAscii(`${subsection.start} ${subsection.entries.length}\n`);

    for (const entry of subsection.entries) {
      rows.set(entry.objectNumber, writer.position);
      writer.writeAscii(formatXRefTableEntry(entry));
    }
  }

  return rows;
}

/**
 * Write `trailer`, the dictionary and the `startxref` footer.
 */
export function writeTrailer(writer: ByteWriter, trailer: PdfDict, startXRef: number): void {
  writer.writeAscii("trailer\n");
  trailer.toBytes(writer);
  writer.writeAscii("\n");
  writeStartXRef(writer, startXRef);
}

export function writeStartXRef(writer: ByteWriter, offset: number): void {
  writer.writeAscii(`startxref\n${offset}\n%%EOF\n`);
}

/**
 * Bytes needed for the offset and generation/index fields.
 * The type field always takes one byte.
 */
function calculateFieldWidths(entries: XRefWriteEntry[]): [number, number, number] {
  let maxOffset = 0;
  let maxGeneration = 0;

  for (const entry of entries) {
    maxOffset = Math.max(maxOffset, entry.offset);
    maxGeneration = Math.max(maxGeneration, entry.index ?? entry.generation);
  }

  const bytesFor = (value: number) => Math.max(1, Math.ceil(Math.log2(value + 1) / 8));

  return [1, bytesFor(maxOffset), bytesFor(maxGeneration)];
}

/**
 * Encode a number as big-endian bytes.
 */
function encodeNumber(value: number, width: number): Uint8Array {
  const bytes = new Uint8Array(width);

  for (let i = width - 1; i >= 0; i--) {
    bytes[i] = value & SINGLE_BYTE_MASK;
    value = Math.floor(value / 256);
  }

  return bytes;
}

const ENTRY_TYPES = { free: 0, inuse: 1, compressed: 2 } as const;

function encodeXRefStreamData(entries: XRefWriteEntry[], widths: [number, number, number]): Uint8Array {
  const [w1, w2, w3] = widths;
  const data = new Uint8Array(entries.length * (w1 + w2 + w3));

  let offset = 0;

  for (const entry of entries) {
    data.set(encodeNumber(ENTRY_TYPES[entry.type], w1), offset);
    offset += w1;

    data.set(encodeNumber(entry.offset, w2), offset);
    offset += w2;

    data.set(encodeNumber(entry.index ?? entry.generation, w3), offset);
    offset += w3;
  }

  return data;
}

export interface XRefStreamOptions {
  /** Rows, not counting the stream's own */
  entries: XRefWriteEntry[];

  /** Entries merged into the stream dictionary (/Size, /Root, /ID, ...) */
  trailer: PdfDict;

  streamObjectNumber: number;

  /** Flate-compress the rows */
  compress: boolean;
}

/**
 * Write an xref stream object at the current position, followed by the
 * `startxref` footer. The stream lists itself.
 *
 * @returns the offset of the stream object
 */
export function writeXRefStream(writer: ByteWriter, options: XRefStreamOptions): number {
  const offset = writer.position;
  const entries: XRefWriteEntry[] = [
    ...options.entries,
    { objectNumber: options.streamObjectNumber, generation: 0, type: "inuse", offset },
  ];

  const subsections = groupIntoSubsections(entries);
  const ordered = subsections.flatMap(s => s.entries);
  const widths = calculateFieldWidths(ordered);
  let data = encodeXRefStreamData(ordered, widths);

  const dictEntries: [string, PdfObject][] = [
    ["Type", PdfName.of("XRef")],
    ["W", PdfArray.of(...widths.map(w => PdfNumber.of(w)))],
  ];

  // /Index is left out when the rows are the default 0 to Size-1
  const size = options.trailer.getNumber("Size")?.value;

  if (subsections.length !== 1 || subsections[0].start !== 0 || ordered.length !== size) {
    const index: PdfObject[] = [];

    for (const sub of subsections) {
      index.push(PdfNumber.of(sub.start), PdfNumber.of(sub.entries.length));
    }

    dictEntries.push(["Index", new PdfArray(index)]);
  }

  if (options.compress) {
    const columns = widths[0] + widths[1] + widths[2];

    data = FilterPipeline.encode(encodePngUp(data, columns), { name: "FlateDecode" });
    dictEntries.push(["Filter", PdfName.of("FlateDecode")]);
    dictEntries.push([
      "DecodeParms",
      PdfDict.of({ Columns: PdfNumber.of(columns), Predictor: PdfNumber.of(12) }),
    ]);
  }

  const stream = new PdfStream(options.trailer.clone(), data);

  for (const [key, value] of dictEntries) {
    stream.dict.set(key, value);
  }

  writer.writeAscii(`${options.streamObjectNumber} 0 obj\n`);
  stream.toBytes(writer);
  writer.writeAscii("\nendobj\n");
  writeStartXRef(writer, offset);

  return offset;
}
