/**
 * PDF file writer.
 *
 * Every save is a full rewrite: the objects reachable from the trailer are
 * collected, renumbered 1..n and written into a single ByteWriter, followed
 * by a cross-reference table or, when object streams are written, an xref
 * stream. Linearized output is laid out by {@link writeLinearized}.
 */

import { md5 } from "@noble/hashes/legacy.js";
import { randomBytes } from "@noble/ciphers/utils.js";
import { isLinearizationDict } from "#src/document/linearization";
import { DecodeError } from "#src/errors";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import { concatBytes } from "@noble/hashes/utils.js";
import { hexToBytes, latin1ToBytes } from "#src/helpers/strings";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef, type RefResolver } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import { ParseError } from "#src/parser/errors";
import { setupEncryption } from "#src/security/encryption-setup";
import type { WriteEncryptionAlgorithm } from "#src/security/schemas";
import type { StandardSecurityHandler } from "#src/security/standard-handler";
import { normalizeContent } from "./content-normalizer";
import { indirectObjectBytes, writeLinearized } from "./linearizer";
import {
  FILE_STRUCTURE_KEYS,
  ObjectCollector,
  renumber,
  sequentialNumbers,
} from "./object-collector";
import { buildObjectStream, chunkForObjectStreams } from "./object-stream-builder";
import { type ResolvedWriteOptions, resolveWriteOptions, type WriteOptions } from "./options";
import {
  writeTrailer,
  writeXRefStream,
  writeXRefTable,
  type XRefWriteEntry,
} from "./xref-writer";

/** /ID written with `staticId` */
const STATIC_ID = "31415926535897932384626433832795";

/** Binary comment after the header line */
const BINARY_MARKER = new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a]);

const MIN_VERSION: Record<WriteEncryptionAlgorithm, string> = {
  "RC4-40": "1.1",
  "RC4-128": "1.4",
  "AES-128": "1.6",
};

const OBJECT_STREAM_VERSION = "1.5";

/**
 * What the writer reads from a document.
 */
export interface WriteSource {
  /** Header version of the document */
  version: string;

  trailer: PdfDict;

  resolve: RefResolver;

  /** Every indirect object, by ascending object number */
  entries(): Iterable<[PdfRef, PdfObject]>;

  /** Page objects in document order */
  pages(): PdfRef[];

  /** Whether the file was read from object streams */
  usesObjectStreams: boolean;

  /** The encryption dictionary of the file read, never written back */
  encryptRef: PdfRef | null;

  warn(message: string): void;
}

function compareVersions(a: string, b: string): number {
  return Number.parseFloat(a) - Number.parseFloat(b);
}

function maxVersion(...versions: string[]): string {
  return versions.reduce((max, version) => (compareVersions(version, max) > 0 ? version : max));
}

function generateIdPart(): Uint8Array {
  return md5(concatBytes(randomBytes(16), latin1ToBytes(Date.now().toString())));
}

/**
 * Writes a document with the given options.
 *
 * @example
 * ```typescript
 * const bytes = new PDFWriter(source, { objectStreamMode: "generate" }).write();
 * ```
 */
export class PDFWriter {
  readonly options: ResolvedWriteOptions;

  private handler: StandardSecurityHandler | null = null;
  private contentRefs = new Set<PdfRef>();

  /**
   * @throws {InvalidWriteOptionsError} if the options do not validate
   */
  constructor(
    private readonly source: WriteSource,
    options: WriteOptions = {},
  ) {
    this.options = resolveWriteOptions(options);
  }

  write(): Uint8Array {
    const { source, options } = this;
    const order = this.collect();
    const pages = source.pages();
    const fileId = this.fileId();

    let encrypt: PdfDict | null = null;

    if (options.encrypt !== undefined) {
      const setup = setupEncryption(options.encrypt, fileId[0]);

      encrypt = setup.dict;
      this.handler = setup.handler;
    }

    if (options.contentNormalization) {
      this.contentRefs = this.pageContentRefs(pages);
    }

    const linearize = options.linearize && this.canLinearize(pages);
    const useObjectStreams =
      options.objectStreamMode === "generate" ||
      (options.objectStreamMode === "preserve" && source.usesObjectStreams);

    if (linearize && useObjectStreams) {
      source.warn("Object streams are not written in linearized files");
    }

    const version = this.outputVersion(useObjectStreams && !linearize);
    const header = concatBytes(latin1ToBytes(`%PDF-${version}\n`), BINARY_MARKER);
    const id = PdfArray.of(new PdfString(fileId[0], "hex"), new PdfString(fileId[1], "hex"));
    const root = source.trailer.getRef("Root");

    if (linearize && root !== undefined) {
      return writeLinearized({
        header,
        catalog: root,
        pages,
        order,
        resolve: source.resolve,
        trailer: this.baseTrailer(),
        encrypt,
        id,
        finalize: (ref, numbers, objectNumber) => this.finalize(ref, numbers, objectNumber),
        finalizeNew: (value, objectNumber) => this.encrypt(value, objectNumber),
      });
    }

    const numbers = sequentialNumbers(order);
    let nextNumber = order.length + 1;
    const encryptNumber = encrypt === null ? null : nextNumber++;

    const trailer = new PdfDict();
    const renumbered = renumber(this.baseTrailer(), numbers);

    if (renumbered.type === "dict") {
      for (const [key, value] of renumbered) {
        trailer.set(key, value);
      }
    }

    if (encryptNumber !== null) {
      trailer.set("Encrypt", PdfRef.of(encryptNumber, 0));
    }

    trailer.set("ID", id);

    const writer = new ByteWriter();
    const entries: XRefWriteEntry[] = [{ objectNumber: 0, generation: 65535, type: "free", offset: 0 }];
    const members: Array<readonly [number, PdfObject]> = [];

    writer.writeBytes(header);

    const writeObject = (objectNumber: number, value: PdfObject) => {
      entries.push({ objectNumber, generation: 0, type: "inuse", offset: writer.position });
      writer.writeBytes(indirectObjectBytes(objectNumber, value));
    };

    for (const [ref, newRef] of numbers) {
      const objectNumber = newRef.objectNumber;

      const original = source.resolve(ref) ?? new PdfNull();

      if (useObjectStreams && original.type !== "stream") {
        // Members are encrypted as part of their object stream
        members.push([objectNumber, renumber(original, numbers)]);
      } else {
        writeObject(objectNumber, this.finalize(ref, numbers, objectNumber));
      }
    }

    if (encrypt !== null && encryptNumber !== null) {
      writeObject(encryptNumber, encrypt);
    }

    if (!useObjectStreams) {
      trailer.set("Size", PdfNumber.of(nextNumber));

      const xrefOffset = writer.position;

      writeXRefTable(writer, entries);
      writeTrailer(writer, sizeFirst(trailer), xrefOffset);

      return writer.toBytes();
    }

    for (const chunk of chunkForObjectStreams(members)) {
      const streamNumber = nextNumber++;

      chunk.forEach(([objectNumber], index) => {
        entries.push({ objectNumber, generation: 0, type: "compressed", offset: streamNumber, index });
      });

      writeObject(streamNumber, this.encrypt(buildObjectStream(chunk, options.compressStreams), streamNumber));
    }

    const xrefNumber = nextNumber++;

    trailer.set("Size", PdfNumber.of(nextNumber));
    writeXRefStream(writer, {
      entries,
      trailer: sizeFirst(trailer),
      streamObjectNumber: xrefNumber,
      compress: options.compressStreams,
    });

    return writer.toBytes();
  }

  /**
   * Objects to write: everything reachable from /Root, then from the other
   * trailer entries, then (if asked) the rest.
   */
  private collect(): PdfRef[] {
    const { source } = this;
    const collector = new ObjectCollector(source.resolve, (ref, value) => this.isFileStructure(ref, value));
    const root = source.trailer.get("Root");

    if (root !== undefined) {
      collector.visitValue(root);
    }

    collector.visitValue(source.trailer, new Set([...FILE_STRUCTURE_KEYS, "Root"]));

    if (this.options.preserveUnreferencedObjects) {
      for (const [ref] of source.entries()) {
        collector.visit(ref);
      }
    }

    return collector.order;
  }

  private isFileStructure(ref: PdfRef, value: PdfObject): boolean {
    if (ref === this.source.encryptRef || isLinearizationDict(value)) {
      return true;
    }

    if (value.type !== "stream") {
      return false;
    }

    const type = value.dict.getName("Type")?.value;

    return type === "ObjStm" || type === "XRef";
  }

  private baseTrailer(): PdfDict {
    const trailer = new PdfDict();

    for (const [key, value] of this.source.trailer) {
      if (!FILE_STRUCTURE_KEYS.has(key)) {
        trailer.set(key, value);
      }
    }

    return trailer;
  }

  private fileId(): [Uint8Array, Uint8Array] {
    if (this.options.staticId) {
      return [hexToBytes(STATIC_ID), hexToBytes(STATIC_ID)];
    }

    const existing = this.source.trailer.getArray("ID")?.at(0);
    const first = existing?.type === "string" ? existing.bytes : generateIdPart();

    return [first, generateIdPart()];
  }

  private outputVersion(objectStreams: boolean): string {
    const { pdfVersion, encrypt } = this.options;

    if (pdfVersion !== undefined) {
      return pdfVersion;
    }

    const required = [this.source.version];

    if (objectStreams) {
      required.push(OBJECT_STREAM_VERSION);
    }

    if (encrypt !== undefined) {
      required.push(MIN_VERSION[encrypt.algorithm]);
    }

    return maxVersion(...required);
  }

  private canLinearize(pages: PdfRef[]): boolean {
    if (pages.length === 0) {
      this.source.warn("Document has no pages, written without linearization");

      return false;
    }

    if (this.source.trailer.getRef("Root") === undefined) {
      this.source.warn("Trailer /Root is not a reference, written without linearization");

      return false;
    }

    return true;
  }

  /**
   * Content streams of all pages, as indirect slots.
   */
  private pageContentRefs(pages: PdfRef[]): Set<PdfRef> {
    const refs = new Set<PdfRef>();

    for (const page of pages) {
      const dict = this.source.resolve(page);
      const contents = dict?.type === "dict" ? dict.get("Contents") : undefined;

      if (contents?.type === "ref") {
        refs.add(contents);
      } else if (contents?.type === "array") {
        for (const item of contents) {
          if (item.type === "ref") {
            refs.add(item);
          }
        }
      }
    }

    return refs;
  }

  /**
   * The object as written: renumbered, then its stream data normalized,
   * decoded and compressed as the options say, then encrypted.
   */
  private finalize(source: PdfRef, numbers: ReadonlyMap<PdfRef, PdfRef>, objectNumber: number): PdfObject {
    const value = renumber(this.source.resolve(source) ?? new PdfNull(), numbers);

    if (value.type === "stream") {
      this.processStream(value, this.contentRefs.has(source), objectNumber);
    }

    return this.encrypt(value, objectNumber);
  }

  private processStream(stream: PdfStream, isContent: boolean, objectNumber: number): void {
    const { decodeLevel, compressStreams } = this.options;

    if (isContent) {
      this.normalize(stream, objectNumber);
    }

    const filters = stream.getFilterSpecs();

    if (filters.length > 0 && FilterPipeline.canDecode(filters, decodeLevel)) {
      try {
        stream.setData(stream.getDecodedData(decodeLevel));
      } catch (error) {
        if (!(error instanceof DecodeError)) {
          throw error;
        }

        this.source.warn(`Object ${objectNumber}: stream left encoded (${error.message})`);
      }
    }

    if (compressStreams && !stream.dict.has("Filter") && stream.data.length > 0) {
      const compressed = FilterPipeline.encode(stream.data, { name: "FlateDecode" });

      // Only keep it when it is smaller
      if (compressed.length < stream.data.length) {
        stream.setRawData(compressed);
        stream.dict.set("Filter", PdfName.of("FlateDecode"));
      }
    }
  }

  private normalize(stream: PdfStream, objectNumber: number): void {
    if (!FilterPipeline.canDecode(stream.getFilterSpecs(), "generalized")) {
      return;
    }

    try {
      stream.setData(normalizeContent(stream.getDecodedData("generalized")));
    } catch (error) {
      if (!(error instanceof DecodeError || error instanceof ParseError)) {
        throw error;
      }

      this.source.warn(`Object ${objectNumber}: content stream not normalized (${error.message})`);
    }
  }

  private encrypt(value: PdfObject, objectNumber: number): PdfObject {
    return this.handler === null ? value : this.handler.encryptObject(value, objectNumber, 0);
  }
}

/**
 * Copy of a trailer with /Size as its first entry.
 */
function sizeFirst(trailer: PdfDict): PdfDict {
  const result = new PdfDict();
  const size = trailer.get("Size");

  if (size !== undefined) {
    result.set("Size", size);
  }

  for (const [key, value] of trailer) {
    if (key !== "Size") {
      result.set(key, value);
    }
  }

  return result;
}
