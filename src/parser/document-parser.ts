import { isLinearizationDict } from "#src/document/linearization";
import { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { parseEncryptionDict } from "#src/security/encryption-dict";
import { StandardSecurityHandler } from "#src/security/standard-handler";
import { ParseError, StructureError } from "./errors";
import { IndirectObjectParser, type LengthResolver } from "./indirect-object-parser";
import { ObjectStreamParser } from "./object-stream-parser";
import { TokenReader } from "./token-reader";
import { type XRefData, type XRefEntry, XRefParser } from "./xref-parser";

export interface ParseOptions {
  /**
   * Tolerate damaged files: a missing header, broken `/Prev` sections,
   * wrong stream lengths, missing `endobj` (default: true).
   */
  lenient?: boolean;

  /**
   * User or owner password of an encrypted document. Without one the empty
   * user password is tried.
   */
  password?: string;
}

/**
 * A parsed file. Objects are read on first access and cached.
 */
export interface ParsedDocument {
  /** Version from the header, e.g. "1.7" */
  version: string;

  /** Trailer of the newest cross-reference section */
  trailer: PdfDict;

  /** Entries of all sections, newer sections winning */
  xref: Map<number, XRefEntry>;

  warnings: string[];

  isLinearized: boolean;

  /** Whether any object is stored in an object stream */
  usesObjectStreams: boolean;

  /** Set for encrypted documents once a password was accepted */
  security: StandardSecurityHandler | null;

  /** The encryption dictionary's own reference, when it is indirect */
  encryptRef: PdfRef | null;

  /**
   * Read an object. Null for free, missing and unreadable objects and when
   * the generation does not match the cross-reference entry.
   */
  getObject(ref: PdfRef): PdfObject | null;
}

const PDF_HEADER = "%PDF-";
const VERSION_PATTERN = /^(\d\.\d)/;
const DEFAULT_VERSION = "1.7";
const HEADER_SEARCH_LIMIT = 1024;

/**
 * Top-level parser: header, cross-reference chain, trailer, encryption and
 * object access.
 *
 * @example
 * ```typescript
 * const parsed = new DocumentParser(new Scanner(bytes), { password }).parse();
 * const info = parsed.getObject(PdfRef.of(4, 0));
 * ```
 */
export class DocumentParser {
  private readonly lenient: boolean;
  private readonly warnings: string[] = [];
  private headerOffset = 0;

  constructor(
    private readonly scanner: Scanner,
    private readonly options: ParseOptions = {},
  ) {
    this.lenient = options.lenient ?? true;
  }

  /**
   * @throws {ParseError} on structural damage lenient mode cannot get past
   * @throws {AuthenticationError} if the password does not open the file
   * @throws {UnsupportedEncryptionError} for AES-256 and foreign handlers
   */
  parse(): ParsedDocument {
    const version = this.parseHeader();
    const { xref, trailer } = this.parseXRefChain();

    if (trailer.getRef("Root") === undefined && trailer.getDict("Root") === undefined) {
      throw new StructureError("Trailer has no /Root");
    }

    return this.buildDocument(version, xref, trailer);
  }

  /**
   * Find `%PDF-x.y` within the first 1024 bytes.
   */
  parseHeader(): string {
    const bytes = this.scanner.bytes;
    const limit = Math.min(bytes.length, HEADER_SEARCH_LIMIT);
    let headerPos = -1;

    for (let i = 0; i + PDF_HEADER.length <= limit; i++) {
      if (this.matchesAt(i, PDF_HEADER)) {
        headerPos = i;
        break;
      }
    }

    if (headerPos === -1) {
      if (!this.lenient) {
        throw new StructureError("PDF header not found");
      }

      this.warnings.push("PDF header not found, using default version");

      return DEFAULT_VERSION;
    }

    if (headerPos > 0) {
      this.warnings.push(`PDF header found at offset ${headerPos} (expected 0)`);
    }

    this.headerOffset = headerPos;

    let text = "";

    for (let i = headerPos + PDF_HEADER.length; i < bytes.length && bytes[i] > 0x20 && text.length < 8; i++) {
      text += String.fromCharCode(bytes[i]);
    }

    const match = VERSION_PATTERN.exec(text);

    if (match !== null) {
      return match[1];
    }

    if (!this.lenient) {
      throw new StructureError(`Invalid PDF version: ${text}`, headerPos);
    }

    this.warnings.push(`Invalid PDF version: ${text}, using default`);

    return DEFAULT_VERSION;
  }

  /**
   * Read the newest section and every older one reachable through /Prev.
   * A hybrid file's /XRefStm section is merged between its table and the
   * table's /Prev.
   */
  private parseXRefChain(): { xref: Map<number, XRefEntry>; trailer: PdfDict } {
    // An xref stream with an indirect /Length is recovered by searching for
    // `endstream`, since nothing can be resolved yet
    const parser = new XRefParser(this.scanner);
    const xref = new Map<number, XRefEntry>();
    const visited = new Set<number>();
    const merge = (entries: Map<number, XRefEntry>) => {
      for (const [objectNumber, entry] of entries) {
        if (!xref.has(objectNumber)) {
          xref.set(objectNumber, entry);
        }
      }
    };

    const first = parser.parseAt(parser.findStartXRef());
    let section: XRefData | null = first;

    while (section !== null) {
      if (section.xrefStm !== undefined && !visited.has(section.xrefStm)) {
        visited.add(section.xrefStm);
        merge(this.tryParseSection(parser, section.xrefStm)?.entries ?? new Map());
      }

      merge(section.entries);

      const prev = section.prev;

      section = null;

      if (prev !== undefined) {
        if (visited.has(prev)) {
          this.warnings.push(`Circular /Prev reference to offset ${prev}`);
        } else {
          visited.add(prev);
          section = this.tryParseSection(parser, prev);
        }
      }
    }

    return { xref, trailer: first.trailer };
  }

  /**
   * Parse an older section. In lenient mode a broken one is skipped with a
   * warning.
   */
  private tryParseSection(parser: XRefParser, offset: number): XRefData | null {
    try {
      return parser.parseAt(offset);
    } catch (error) {
      if (!this.lenient || !(error instanceof ParseError)) {
        throw error;
      }

      this.warnings.push(`Skipped broken xref section at offset ${offset}: ${error.message}`);

      return null;
    }
  }

  private buildDocument(
    version: string,
    xref: Map<number, XRefEntry>,
    trailer: PdfDict,
  ): ParsedDocument {
    const cache = new Map<PdfRef, PdfObject | null>();
    const objectStreams = new Map<number, ObjectStreamParser | null>();
    const bytes = this.scanner.bytes;
    const warnings = this.warnings;
    let security: StandardSecurityHandler | null = null;

    const encryptRef = trailer.getRef("Encrypt") ?? null;

    const lengthResolver: LengthResolver = ref => {
      const value = getObject(ref);

      return value?.type === "number" ? value.value : null;
    };

    const parseAt = (offset: number) =>
      new IndirectObjectParser(new Scanner(bytes), {
        lengthResolver,
        lenient: this.lenient,
        onWarning: message => warnings.push(message),
      }).parseObjectAt(offset);

    const loadObjectStream = (objectNumber: number): ObjectStreamParser | null => {
      const cached = objectStreams.get(objectNumber);

      if (cached !== undefined) {
        return cached;
      }

      const stream = getObject(PdfRef.of(objectNumber, 0));
      let parser: ObjectStreamParser | null = null;

      if (stream?.type === "stream") {
        parser = new ObjectStreamParser(stream);
      } else {
        warnings.push(`Object stream ${objectNumber} is missing or not a stream`);
      }

      objectStreams.set(objectNumber, parser);

      return parser;
    };

    const readObject = (ref: PdfRef): PdfObject | null => {
      const entry = xref.get(ref.objectNumber);

      if (entry === undefined || entry.type === "free") {
        return null;
      }

      if (entry.type === "compressed") {
        if (ref.generation !== 0) {
          return null;
        }

        // Strings inside object streams were decrypted with the stream
        return loadObjectStream(entry.streamObjNum)?.getObject(entry.indexInStream) ?? null;
      }

      if (entry.generation !== ref.generation) {
        return null;
      }

      const result = parseAt(entry.offset);

      if (result.objNum !== ref.objectNumber || result.genNum !== ref.generation) {
        warnings.push(
          `Object ${ref.objectNumber} ${ref.generation} R: found ${result.objNum} ${result.genNum} obj at offset ${entry.offset}`,
        );

        return null;
      }

      if (security !== null && ref !== encryptRef) {
        return security.decryptObject(result.value, ref.objectNumber, ref.generation);
      }

      return result.value;
    };

    const getObject = (ref: PdfRef): PdfObject | null => {
      if (cache.has(ref)) {
        return cache.get(ref) ?? null;
      }

      // Guards against a stream whose /Length points back at itself
      cache.set(ref, null);

      let value: PdfObject | null;

      try {
        value = readObject(ref);
      } catch (error) {
        if (!this.lenient || !(error instanceof ParseError)) {
          cache.delete(ref);
          throw error;
        }

        warnings.push(`Could not read object ${ref}: ${error.message}`);
        value = null;
      }

      cache.set(ref, value);

      return value;
    };

    const encryptValue = encryptRef !== null ? getObject(encryptRef) : trailer.get("Encrypt");

    if (encryptValue !== undefined && encryptValue !== null) {
      if (encryptValue.type !== "dict") {
        throw new StructureError("Trailer /Encrypt is not a dictionary");
      }

      const encryption = parseEncryptionDict(encryptValue, warnings);
      const id = trailer.getArray("ID")?.at(0);
      let fileId: Uint8Array = new Uint8Array(0);

      if (id?.type === "string") {
        fileId = id.bytes;
      } else {
        warnings.push("Encrypted document has no /ID, using an empty file identifier");
      }

      security = StandardSecurityHandler.authenticate(encryption, fileId, this.options.password);
    }

    let usesObjectStreams = false;

    for (const entry of xref.values()) {
      if (entry.type === "compressed") {
        usesObjectStreams = true;
        break;
      }
    }

    return {
      version,
      trailer,
      xref,
      warnings,
      isLinearized: this.detectLinearization(),
      usesObjectStreams,
      security,
      encryptRef,
      getObject,
    };
  }

  /**
   * A file is linearized when its first object, within the first 1024
   * bytes, is a dictionary with /Linearized whose /L (if any) matches the
   * file length.
   */
  private detectLinearization(): boolean {
    const scanner = new Scanner(this.scanner.bytes);

    scanner.moveTo(this.headerOffset);
    new TokenReader(scanner).skipWhitespaceAndComments();

    const start = scanner.position;

    if (start >= HEADER_SEARCH_LIMIT || scanner.isAtEnd()) {
      return false;
    }

    let first: PdfObject;

    try {
      first = new IndirectObjectParser(scanner, { lenient: false }).parseObjectAt(start).value;
    } catch (error) {
      if (error instanceof ParseError) {
        // Whatever comes first, it is not a linearization dictionary
        return false;
      }

      throw error;
    }

    if (first.type !== "dict" || !isLinearizationDict(first)) {
      return false;
    }

    const length = first.getNumber("L")?.value;

    return length === undefined || length === this.scanner.length;
  }

  private matchesAt(pos: number, text: string): boolean {
    for (let i = 0; i < text.length; i++) {
      if (this.scanner.bytes[pos + i] !== text.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }
}
