/**
 * Linearized ("fast web view") file layout.
 *
 * ```
 * %PDF-x.y
 * <linearization dictionary>          first object, fixed-width fields
 * <first-page xref section + trailer> /Prev points at the main section
 * <catalog, first page and its objects>
 * <primary hint stream>
 * <remaining pages, shared objects, everything else>
 * <main xref section + trailer>       startxref points at the first-page section
 * ```
 *
 * Objects after the first page are numbered from 1; the linearization
 * dictionary, the first-page objects and the hint stream take the highest
 * numbers, so each cross-reference section covers one contiguous range.
 *
 * @see ISO 32000-1, Annex F
 */

import { padNumber } from "#src/helpers/format";
import { BitWriter, bitsNeeded } from "#src/io/bit-writer";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef, type RefResolver } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { directRefs, renumber } from "./object-collector";
import {
  formatXRefTableEntry,
  writeStartXRef,
  writeTrailer,
  writeXRefTable,
  type XRefWriteEntry,
} from "./xref-writer";

const FIELD_WIDTH = 10;
const PLACEHOLDER = padNumber(0, FIELD_WIDTH);

// Page objects are walked without climbing back up the page tree
const PAGE_SKIP_KEYS: ReadonlySet<string> = new Set(["Parent"]);

export interface LinearizationInput {
  /** `%PDF-x.y` line and binary comment */
  header: Uint8Array;
  catalog: PdfRef;
  /** Pages in document order; at least one */
  pages: readonly PdfRef[];
  /** Every object to write, as collected from the trailer */
  order: readonly PdfRef[];
  resolve: RefResolver;
  /** Trailer entries to keep, still in the source numbering */
  trailer: PdfDict;
  /** /Encrypt and /ID, already final */
  encrypt: PdfDict | null;
  id: PdfObject;
  /** Final form of a collected object under the new numbering */
  finalize(source: PdfRef, numbers: ReadonlyMap<PdfRef, PdfRef>, objectNumber: number): PdfObject;
  /** Final form of an object created here (the hint stream) */
  finalizeNew(value: PdfObject, objectNumber: number): PdfObject;
}

/**
 * Where objects go: the first-page section and the rest, with what the
 * hint tables need about each page.
 */
interface Layout {
  /** Catalog, then the first page and everything it reaches */
  first: PdfRef[];
  /** Objects after the hint stream, in writing order */
  rest: PdfRef[];
  /** Per page: the page object and the objects only it uses */
  pageObjects: PdfRef[][];
  /** Per page: the shared objects it uses */
  pageShared: PdfRef[][];
  /** Shared objects placed after the first page */
  sharedRest: PdfRef[];
}

export function indirectObjectBytes(objectNumber: number, value: PdfObject): Uint8Array {
  const writer = new ByteWriter({ initialSize: 1024 });

  writer.writeAscii(`${objectNumber} 0 obj\n`);
  value.toBytes(writer);
  writer.writeAscii("\nendobj\n");

  return writer.toBytes();
}

function planLayout(input: LinearizationInput): Layout {
  const collected = new Set(input.order);
  const pageSet = new Set(input.pages);

  const reach = (page: PdfRef): PdfRef[] => {
    const result: PdfRef[] = [];
    const seen = new Set<PdfRef>();
    const stack = [page];

    while (stack.length > 0) {
      const ref = stack.pop();

      if (ref === undefined || seen.has(ref)) {
        continue;
      }

      seen.add(ref);

      if (!collected.has(ref) || ref === input.catalog || (ref !== page && pageSet.has(ref))) {
        continue;
      }

      const value = input.resolve(ref);

      if (value === null) {
        continue;
      }

      result.push(ref);
      stack.push(...directRefs(value, PAGE_SKIP_KEYS).reverse());
    }

    return result;
  };

  const reaches = input.pages.map(reach);
  const owners = new Map<PdfRef, number>();

  for (const refs of reaches) {
    for (const ref of refs) {
      owners.set(ref, (owners.get(ref) ?? 0) + 1);
    }
  }

  const isShared = (ref: PdfRef) => (owners.get(ref) ?? 0) > 1;
  const first = [input.catalog, ...reaches[0]];
  const placed = new Set(first);
  const rest: PdfRef[] = [];
  const pageObjects: PdfRef[][] = [reaches[0]];
  const sharedRest: PdfRef[] = [];

  for (const refs of reaches.slice(1)) {
    const own = refs.filter(ref => !isShared(ref) && !placed.has(ref));

    for (const ref of own) {
      placed.add(ref);
      rest.push(ref);
    }

    pageObjects.push(own);
  }

  for (const refs of reaches.slice(1)) {
    for (const ref of refs) {
      if (isShared(ref) && !placed.has(ref)) {
        placed.add(ref);
        sharedRest.push(ref);
        rest.push(ref);
      }
    }
  }

  for (const ref of input.order) {
    if (!placed.has(ref)) {
      placed.add(ref);
      rest.push(ref);
    }
  }

  return {
    first,
    rest,
    pageObjects,
    pageShared: reaches.map(refs => refs.filter(isShared)),
    sharedRest,
  };
}

interface HintInput {
  layout: Layout;
  /** Offsets with the hint stream taken out */
  offsets: ReadonlyMap<PdfRef, number>;
  lengths: ReadonlyMap<PdfRef, number>;
  /** Where the first page's objects end */
  endOfFirstPage: number;
  numbers: ReadonlyMap<PdfRef, PdfRef>;
}

/**
 * Page offset hint table followed by the shared object hint table. Each
 * item is written for every page (or group) in turn, then byte-aligned.
 *
 * @returns the table bytes and the offset of the shared object table
 */
export function buildHintTables(hint: HintInput): { data: Uint8Array; sharedOffset: number } {
  const { layout, offsets, lengths } = hint;
  const lengthOf = (ref: PdfRef) => lengths.get(ref) ?? 0;
  const offsetOf = (ref: PdfRef) => offsets.get(ref) ?? 0;

  // Shared object table: every first-page object, then the shared section
  const sharedEntries = [...layout.pageObjects[0], ...layout.sharedRest];
  const sharedIds = new Map(sharedEntries.map((ref, i) => [ref, i]));

  const firstPage = layout.pageObjects[0][0];
  const pageLengths = layout.pageObjects.map((refs, i) =>
    i === 0
      ? hint.endOfFirstPage - offsetOf(firstPage)
      : refs.reduce((sum, ref) => sum + lengthOf(ref), 0),
  );
  const objectCounts = layout.pageObjects.map(refs => refs.length);
  const leastObjects = Math.min(...objectCounts);
  const leastLength = Math.min(...pageLengths);
  const sharedCounts = layout.pageShared.map(refs => refs.length);

  const pages = new BitWriter();
  const objectBits = bitsNeeded(Math.max(...objectCounts) - leastObjects);
  const lengthBits = bitsNeeded(Math.max(...pageLengths) - leastLength);
  const sharedCountBits = bitsNeeded(Math.max(...sharedCounts));
  const sharedIdBits = bitsNeeded(Math.max(0, sharedEntries.length - 1));

  pages.writeUint32(leastObjects);
  pages.writeUint32(offsetOf(firstPage));
  pages.writeUint16(objectBits);
  pages.writeUint32(leastLength);
  pages.writeUint16(lengthBits);
  // Content stream offsets and lengths are not recorded
  pages.writeUint32(0);
  pages.writeUint16(0);
  pages.writeUint32(0);
  pages.writeUint16(0);
  pages.writeUint16(sharedCountBits);
  pages.writeUint16(sharedIdBits);
  pages.writeUint16(0);
  pages.writeUint16(0);

  const items: Array<(page: number) => void> = [
    page => pages.writeBits(objectCounts[page] - leastObjects, objectBits),
    page => pages.writeBits(pageLengths[page] - leastLength, lengthBits),
    page => pages.writeBits(sharedCounts[page], sharedCountBits),
    page => {
      for (const ref of layout.pageShared[page]) {
        pages.writeBits(sharedIds.get(ref) ?? 0, sharedIdBits);
      }
    },
  ];

  for (const item of items) {
    for (let page = 0; page < layout.pageObjects.length; page++) {
      item(page);
    }

    pages.align();
  }

  const shared = new BitWriter();
  const groupLengths = sharedEntries.map(lengthOf);
  const leastGroup = groupLengths.length > 0 ? Math.min(...groupLengths) : 0;
  const groupBits = bitsNeeded(Math.max(0, ...groupLengths) - leastGroup);
  const firstShared = layout.sharedRest.at(0);

  shared.writeUint32(firstShared === undefined ? 0 : (hint.numbers.get(firstShared)?.objectNumber ?? 0));
  shared.writeUint32(firstShared === undefined ? 0 : offsetOf(firstShared));
  shared.writeUint32(layout.pageObjects[0].length);
  shared.writeUint32(sharedEntries.length);
  // One object per group
  shared.writeUint16(0);
  shared.writeUint32(leastGroup);
  shared.writeUint16(groupBits);

  for (const length of groupLengths) {
    shared.writeBits(length - leastGroup, groupBits);
  }

  shared.align();

  // No MD5 signatures
  for (let i = 0; i < groupLengths.length; i++) {
    shared.writeBits(0, 1);
  }

  shared.align();

  const pageBytes = pages.toBytes();
  const sharedBytes = shared.toBytes();
  const data = new Uint8Array(pageBytes.length + sharedBytes.length);

  data.set(pageBytes);
  data.set(sharedBytes, pageBytes.length);

  return { data, sharedOffset: pageBytes.length };
}

/**
 * Write a linearized file.
 */
export function writeLinearized(input: LinearizationInput): Uint8Array {
  const layout = planLayout(input);
  const restCount = layout.rest.length;
  const numbers = new Map<PdfRef, PdfRef>();

  layout.rest.forEach((ref, i) => numbers.set(ref, PdfRef.of(i + 1, 0)));

  const linNumber = restCount + 1;

  layout.first.forEach((ref, i) => numbers.set(ref, PdfRef.of(linNumber + 1 + i, 0)));

  let nextNumber = linNumber + 1 + layout.first.length;
  const encryptNumber = input.encrypt === null ? null : nextNumber++;
  const hintNumber = nextNumber;
  const size = hintNumber + 1;

  const chunks = new Map<PdfRef, Uint8Array>();

  for (const [ref, newRef] of numbers) {
    chunks.set(ref, indirectObjectBytes(newRef.objectNumber, input.finalize(ref, numbers, newRef.objectNumber)));
  }

  const lengths = new Map([...chunks].map(([ref, bytes]) => [ref, bytes.length]));
  const chunkOf = (ref: PdfRef) => chunks.get(ref) ?? new Uint8Array(0);
  const offsets = new Map<number, number>();
  const hintOffsets = new Map<PdfRef, number>();
  const writer = new ByteWriter();

  writer.writeBytes(input.header);

  // Linearization dictionary, with fields patched at the end
  offsets.set(linNumber, writer.position);

  const firstPageNumber = numbers.get(input.pages[0])?.objectNumber ?? 0;
  const fields = new Map<string, number>();
  const field = (name: string) => {
    fields.set(name, writer.position);
    writer.writeAscii(PLACEHOLDER);
  };

  writer.writeAscii(`${linNumber} 0 obj\n<< /Linearized 1 /L `);
  field("L");
  writer.writeAscii(" /H [ ");
  field("H0");
  writer.writeAscii(" ");
  field("H1");
  writer.writeAscii(` ] /O ${firstPageNumber} /E `);
  field("E");
  writer.writeAscii(` /N ${input.pages.length} /T `);
  field("T");
  writer.writeAscii(" >>\nendobj\n");

  // First-page cross-reference section
  const firstXRefOffset = writer.position;
  const firstEntries: XRefWriteEntry[] = [];

  for (let n = linNumber; n <= hintNumber; n++) {
    firstEntries.push({ objectNumber: n, generation: 0, type: "inuse", offset: 0 });
  }

  const rows = writeXRefTable(writer, firstEntries);
  const firstTrailer = new PdfDict([["Size", PdfNumber.of(size)]]);

  for (const [key, value] of renumberTrailer(input.trailer, numbers)) {
    firstTrailer.set(key, value);
  }

  if (encryptNumber !== null) {
    firstTrailer.set("Encrypt", PdfRef.of(encryptNumber, 0));
  }

  firstTrailer.set("ID", input.id);

  writer.writeAscii("trailer\n<<\n/Prev ");
  field("Prev");
  writer.writeAscii("\n");
  firstTrailer.writeEntries(writer, undefined, false);
  writer.writeAscii("\n");
  writeStartXRef(writer, 0);

  // First page
  for (const ref of layout.first) {
    const number = numbers.get(ref)?.objectNumber ?? 0;

    offsets.set(number, writer.position);
    hintOffsets.set(ref, writer.position);
    writer.writeBytes(chunkOf(ref));
  }

  if (input.encrypt !== null && encryptNumber !== null) {
    offsets.set(encryptNumber, writer.position);
    writer.writeBytes(indirectObjectBytes(encryptNumber, input.encrypt));
  }

  const hintOffset = writer.position;

  // Hint tables count offsets as if the hint stream were absent
  let cursor = hintOffset;

  for (const ref of layout.rest) {
    hintOffsets.set(ref, cursor);
    cursor += lengths.get(ref) ?? 0;
  }

  const tables = buildHintTables({
    layout,
    offsets: hintOffsets,
    lengths,
    endOfFirstPage: hintOffset,
    numbers,
  });
  const hintStream = PdfStream.fromDict({ S: PdfNumber.of(tables.sharedOffset) }, tables.data);
  const hintBytes = indirectObjectBytes(hintNumber, input.finalizeNew(hintStream, hintNumber));

  offsets.set(hintNumber, hintOffset);
  writer.writeBytes(hintBytes);

  for (const ref of layout.rest) {
    offsets.set(numbers.get(ref)?.objectNumber ?? 0, writer.position);
    writer.writeBytes(chunkOf(ref));
  }

  // Main cross-reference section
  const mainXRefOffset = writer.position;
  const mainEntries: XRefWriteEntry[] = [
    { objectNumber: 0, generation: 65535, type: "free", offset: 0 },
  ];

  for (let n = 1; n <= restCount; n++) {
    mainEntries.push({ objectNumber: n, generation: 0, type: "inuse", offset: offsets.get(n) ?? 0 });
  }

  writeXRefTable(writer, mainEntries);
  writeTrailer(writer, new PdfDict([["Size", PdfNumber.of(restCount + 1)]]), firstXRefOffset);

  const patch = (name: string, value: number) => {
    const position = fields.get(name);

    if (position !== undefined) {
      writer.overwriteAscii(position, padNumber(value, FIELD_WIDTH));
    }
  };

  patch("L", writer.position);
  patch("H0", hintOffset);
  patch("H1", hintBytes.length);
  patch("E", hintOffset);
  patch("T", mainXRefOffset);
  patch("Prev", mainXRefOffset);

  for (const [number, position] of rows) {
    writer.overwriteAscii(
      position,
      formatXRefTableEntry({ offset: offsets.get(number) ?? 0, generation: 0, type: "inuse" }),
    );
  }

  return writer.toBytes();
}

function renumberTrailer(trailer: PdfDict, numbers: ReadonlyMap<PdfRef, PdfRef>): PdfDict {
  const result = renumber(trailer, numbers);

  return result.type === "dict" ? result : new PdfDict();
}
