/**
 * PDFDocument - one PDF session: the object graph of a parsed or new file.
 *
 * Every handle the document hands out stays bound to it. Closing the
 * document releases the graph; handles used afterwards throw
 * {@link DocumentClosedError}.
 */

import { readFile, writeFile } from "node:fs/promises";
import { ObjectRegistry } from "#src/document/object-registry";
import { ForeignHandleError, InvalidArgumentError, PdfIOError } from "#src/errors";
import { encodeTextString } from "#src/helpers/strings";
import { Scanner } from "#src/io/scanner";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfInlineImage } from "#src/objects/pdf-inline-image";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfOperator } from "#src/objects/pdf-operator";
import { PdfUninitialized } from "#src/objects/pdf-placeholder";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import { parseContentStream } from "#src/parser/content-stream-parser";
import { DocumentParser, type ParsedDocument, type ParseOptions } from "#src/parser/document-parser";
import { parseSingleObject } from "#src/parser/object-parser";
import type { WriteOptions } from "#src/writer/options";
import { PDFWriter, type WriteSource } from "#src/writer/pdf-writer";
import { PDFArrayHandle } from "./pdf-array-handle";
import { PDFContext } from "./pdf-context";
import { PDFDictionaryHandle } from "./pdf-dictionary-handle";
import { PDFHandle } from "./pdf-handle";
import { PDFStreamHandle } from "./pdf-stream-handle";

/**
 * Options for loading a PDF.
 */
export interface LoadOptions extends ParseOptions {
  // password and lenient, as the parser takes them
}

export interface AddPageOptions {
  /** Insert before the first page instead of appending */
  first?: boolean;
}

/**
 * Dictionary entries as pairs or as an object; keys with or without the
 * leading slash.
 */
export type DictionaryEntries = Iterable<[string, PDFHandle]> | Record<string, PDFHandle>;

const EMPTY_DOCUMENT_VERSION = "1.3";

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

function entryPairs(entries: DictionaryEntries): Iterable<[string, PDFHandle]> {
  return isIterable(entries) ? entries : Object.entries(entries);
}

/**
 * A PDF document.
 *
 * @example
 * ```typescript
 * const doc = await PDFDocument.load(bytes);
 *
 * const page = doc.getPage(0);
 * page?.set("/Rotate", doc.newInteger(90));
 *
 * const saved = await doc.save({ objectStreamMode: "generate" });
 * doc.close();
 * ```
 */
export class PDFDocument {
  private readonly ctx: PDFContext;

  private constructor(
    registry: ObjectRegistry,
    trailer: PdfDict,
    version: string,
    parsed: ParsedDocument | null,
  ) {
    this.ctx = new PDFContext(this, registry, trailer, version, parsed);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Parse a PDF from bytes.
   *
   * @throws {ParseError} if the file structure cannot be read
   * @throws {AuthenticationError} if the document is encrypted and the
   *   password (or the empty one) does not open it
   */
  static async load(bytes: Uint8Array, options?: LoadOptions): Promise<PDFDocument> {
    const parsed = new DocumentParser(new Scanner(bytes), options).parse();
    const registry = new ObjectRegistry(parsed.xref, parsed.warnings);

    registry.setResolver(ref => parsed.getObject(ref));

    return new PDFDocument(registry, parsed.trailer, parsed.version, parsed);
  }

  /**
   * Read and parse a file.
   *
   * @throws {PdfIOError} if the file cannot be read
   */
  static async open(path: string, options?: LoadOptions): Promise<PDFDocument> {
    let bytes: Uint8Array;

    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new PdfIOError(path, error);
    }

    return PDFDocument.load(bytes, options);
  }

  /**
   * A document with a catalog (`1 0 R`) and an empty page tree (`2 0 R`).
   */
  static empty(): PDFDocument {
    const registry = new ObjectRegistry();
    const catalog = PdfDict.of({ Type: PdfName.of("Catalog") });
    const catalogRef = registry.register(catalog);
    const pagesRef = registry.register(
      PdfDict.of({
        Type: PdfName.of("Pages"),
        Kids: new PdfArray(),
        Count: PdfNumber.of(0),
      }),
    );

    catalog.set("Pages", pagesRef);

    return new PDFDocument(registry, PdfDict.of({ Root: catalogRef }), EMPTY_DOCUMENT_VERSION, null);
  }

  /**
   * Write the document.
   *
   * @throws {InvalidWriteOptionsError} if the options do not validate
   */
  async save(options?: WriteOptions): Promise<Uint8Array> {
    this.ctx.assertOpen();

    return new PDFWriter(this.writeSource(), options).write();
  }

  /**
   * Write the document to a file.
   *
   * @throws {PdfIOError} if the file cannot be written
   */
  async saveToFile(path: string, options?: WriteOptions): Promise<void> {
    const bytes = await this.save(options);

    try {
      await writeFile(path, bytes);
    } catch (error) {
      throw new PdfIOError(path, error);
    }
  }

  /**
   * Release the object graph. Every handle of this document throws
   * {@link DocumentClosedError} from now on.
   */
  close(): void {
    this.ctx.close();
  }

  get isClosed(): boolean {
    return this.ctx.isClosed;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Document info
  // ─────────────────────────────────────────────────────────────────────────────

  /** Header version, e.g. "1.7" */
  get version(): string {
    return this.ctx.version;
  }

  get isLinearized(): boolean {
    return this.ctx.parsed?.isLinearized ?? false;
  }

  get isEncrypted(): boolean {
    return (this.ctx.parsed?.security ?? null) !== null;
  }

  /** Problems recovered from while reading and editing */
  get warnings(): string[] {
    return this.ctx.warnings;
  }

  getTrailer(): PDFDictionaryHandle {
    this.ctx.assertOpen();

    return PDFDictionaryHandle.from(this.direct(this.ctx.trailer));
  }

  /**
   * The catalog, or undefined when the trailer has no usable /Root.
   */
  getRoot(): PDFDictionaryHandle | undefined {
    const root = this.getTrailer().get("Root");

    return root?.isDictionary() ? PDFDictionaryHandle.from(root) : undefined;
  }

  getMaxObjectNumber(): number {
    this.ctx.assertOpen();

    return this.ctx.registry.maxObjectNumber;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Object access
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Handle to an indirect object, or undefined when the slot is free,
   * missing or of another generation.
   */
  getObjectById(id: number, generation = 0): PDFHandle | undefined {
    const ref = PdfRef.of(id, generation);

    if (this.ctx.resolve(ref) === null) {
      return undefined;
    }

    return this.indirect(ref);
  }

  getObject(id: number, generation = 0): PDFHandle | undefined {
    return this.getObjectById(id, generation);
  }

  /**
   * Every indirect object, by object number.
   */
  getObjects(): PDFHandle[] {
    this.ctx.assertOpen();

    return [...this.ctx.registry.entries()].map(([ref]) => this.indirect(ref));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Constructors
  // ─────────────────────────────────────────────────────────────────────────────

  newNull(): PDFHandle {
    return this.direct(new PdfNull());
  }

  newBool(value: boolean): PDFHandle {
    return this.direct(PdfBool.of(value));
  }

  /**
   * @throws {InvalidArgumentError} if `value` is not an integer
   */
  newInteger(value: number | bigint): PDFHandle {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new InvalidArgumentError(`Expected an integer, got ${value}`);
    }

    return this.direct(PdfNumber.integer(value));
  }

  /**
   * A real with `decimals` places (6 when `decimals <= 0`), trailing zeros
   * stripped.
   *
   * @throws {InvalidArgumentError} if `value` is not finite
   */
  newReal(value: number, decimals = 0): PDFHandle {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Expected a finite number, got ${value}`);
    }

    return this.direct(PdfNumber.real(value, decimals));
  }

  /**
   * @param name - with or without the leading slash
   */
  newName(name: string): PDFHandle {
    return this.direct(PdfName.of(name));
  }

  /**
   * A string holding the UTF-8 bytes of `text`.
   */
  newString(text: string): PDFHandle {
    return this.direct(new PdfString(new TextEncoder().encode(text)));
  }

  newBinaryString(bytes: Uint8Array): PDFHandle {
    return this.direct(new PdfString(bytes.slice()));
  }

  /**
   * A text string: PDFDocEncoding when every character has a code there,
   * UTF-16BE with a byte order mark otherwise.
   */
  newUtf8String(text: string): PDFHandle {
    return this.direct(new PdfString(encodeTextString(text)));
  }

  newOperator(keyword: string): PDFHandle {
    return this.direct(new PdfOperator(keyword));
  }

  newInlineImage(data: Uint8Array): PDFHandle {
    return this.direct(new PdfInlineImage(data.slice()));
  }

  newArray(items: Iterable<PDFHandle> = []): PDFArrayHandle {
    const array = PDFArrayHandle.from(this.direct(new PdfArray()));

    for (const item of items) {
      array.push(item);
    }

    return array;
  }

  newDictionary(entries: DictionaryEntries = {}): PDFDictionaryHandle {
    const dict = PDFDictionaryHandle.from(this.direct(new PdfDict()));

    for (const [key, value] of entryPairs(entries)) {
      dict.set(key, value);
    }

    return dict;
  }

  newDictionaryFrom(entries: DictionaryEntries): PDFDictionaryHandle {
    return this.newDictionary(entries);
  }

  newStream(data: Uint8Array = new Uint8Array(0)): PDFStreamHandle {
    return PDFStreamHandle.from(this.direct(new PdfStream(new PdfDict(), data.slice())));
  }

  newStreamWithDictionary(entries: DictionaryEntries, data: Uint8Array): PDFStreamHandle {
    const stream = this.newStream(data);
    const dict = stream.getStreamDictionary();

    for (const [key, value] of entryPairs(entries)) {
      dict.set(key, value);
    }

    return stream;
  }

  newUninitialized(): PDFHandle {
    return new PDFHandle(this.ctx, { kind: "direct", node: new PdfUninitialized() });
  }

  /**
   * Allocate an indirect slot to be filled later with
   * {@link replaceReserved}. References to it can be stored meanwhile.
   */
  newReserved(): PDFHandle {
    this.ctx.assertOpen();

    return this.indirect(this.ctx.registry.reserve());
  }

  /**
   * Fill a reserved slot with a copy of `value`.
   *
   * @throws {InvalidArgumentError} if `reserved` is not a reserved slot
   */
  replaceReserved(reserved: PDFHandle, value: PDFHandle): void {
    this.ctx.assertOpen();
    this.assertOwn(reserved);
    this.assertOwn(value);

    const node = value.node().clone();

    if (reserved.target.kind !== "indirect" || !this.ctx.registry.replaceReserved(reserved.target.ref, node)) {
      throw new InvalidArgumentError(`${reserved.toString()} is not a reserved object`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Parsing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Parse one object written in PDF syntax. `n g R` gives a handle to that
   * slot of this document.
   *
   * @throws {ObjectParseError} for malformed input or trailing tokens
   */
  parseObject(text: string): PDFHandle {
    this.ctx.assertOpen();

    const value = parseSingleObject(new TextEncoder().encode(text));

    return value.type === "ref" ? this.indirect(value) : this.direct(value);
  }

  /**
   * Operands and operators of content-stream syntax, in order.
   *
   * @throws {ObjectParseError} for malformed content
   */
  parseContentStream(data: Uint8Array): PDFHandle[] {
    this.ctx.assertOpen();

    return parseContentStream(data).map(token => this.direct(token));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Pages
  // ─────────────────────────────────────────────────────────────────────────────

  getPages(): PDFDictionaryHandle[] {
    return this.ctx.pages.getPages().map(ref => PDFDictionaryHandle.from(this.indirect(ref)));
  }

  getPageCount(): number {
    return this.ctx.pages.getPageCount();
  }

  /**
   * Page at `index`, or undefined when out of range.
   */
  getPage(index: number): PDFDictionaryHandle | undefined {
    const ref = this.ctx.pages.getPage(index);

    return ref === undefined ? undefined : PDFDictionaryHandle.from(this.indirect(ref));
  }

  /**
   * Add a page dictionary to the end (or the start) of the page tree. A
   * direct page is made indirect first; a page already in the tree is
   * added again as a copy.
   *
   * @returns the page as stored in the tree
   */
  addPage(page: PDFHandle, options: AddPageOptions = {}): PDFDictionaryHandle {
    this.assertOwn(page);

    const stored = page.makeIndirect();

    if (stored.target.kind !== "indirect") {
      return PDFDictionaryHandle.from(stored);
    }

    const ref = this.ctx.pages.addPage(stored.target.ref, options.first ?? false);

    return PDFDictionaryHandle.from(this.indirect(ref));
  }

  /**
   * @throws {InvalidArgumentError} if the page is not in the page tree
   */
  removePage(page: PDFHandle): void {
    this.assertOwn(page);

    if (page.target.kind !== "indirect") {
      throw new InvalidArgumentError("Only indirect pages can be in the page tree");
    }

    this.ctx.pages.removePage(page.target.ref);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private direct(node: PdfObject): PDFHandle {
    this.ctx.assertOpen();

    return new PDFHandle(this.ctx, { kind: "direct", node });
  }

  private indirect(ref: PdfRef): PDFHandle {
    return new PDFHandle(this.ctx, { kind: "indirect", ref });
  }

  private assertOwn(handle: PDFHandle): void {
    handle.context.assertOpen();

    if (handle.context !== this.ctx) {
      throw new ForeignHandleError();
    }
  }

  private writeSource(): WriteSource {
    const ctx = this.ctx;

    return {
      version: ctx.version,
      trailer: ctx.trailer,
      resolve: ref => ctx.resolve(ref),
      entries: () => ctx.registry.entries(),
      pages: () => ctx.pages.getPages(),
      usesObjectStreams: ctx.parsed?.usesObjectStreams ?? false,
      encryptRef: ctx.parsed?.encryptRef ?? null,
      warn: message => ctx.addWarning(message),
    };
  }
}
