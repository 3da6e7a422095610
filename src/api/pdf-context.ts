/**
 * PDFContext - shared state of one document session.
 *
 * Every handle holds the context of the document it came from. The context
 * owns the object registry, the trailer and the closed flag, so a handle
 * can resolve references and fail fast once the document is closed.
 *
 * @internal This is an internal class, not part of the public API.
 */

import type { ObjectRegistry } from "#src/document/object-registry";
import { DocumentClosedError } from "#src/errors";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { ParsedDocument } from "#src/parser/document-parser";
import type { PDFDocument } from "./pdf-document";
import { PDFPageTree } from "./pdf-page-tree";

let nextSerial = 1;

export class PDFContext {
  /** Orders handles of different documents */
  readonly serial = nextSerial++;

  /** Page tree over the catalog's /Pages */
  readonly pages: PDFPageTree;

  private closed = false;

  constructor(
    readonly document: PDFDocument,
    readonly registry: ObjectRegistry,
    readonly trailer: PdfDict,
    readonly version: string,
    /** The file the document was loaded from; null for new documents */
    readonly parsed: ParsedDocument | null,
  ) {
    this.pages = new PDFPageTree(this);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws {DocumentClosedError} once the document was closed
   */
  assertOpen(): void {
    if (this.closed) {
      throw new DocumentClosedError();
    }
  }

  close(): void {
    this.closed = true;
    this.registry.clear();
  }

  resolve(ref: PdfRef): PdfObject | null {
    this.assertOpen();

    return this.registry.resolve(ref);
  }

  /**
   * Follow a reference; other values come back as they are.
   */
  deref(value: PdfObject | undefined): PdfObject | undefined {
    if (value?.type === "ref") {
      return this.resolve(value) ?? undefined;
    }

    return value;
  }

  register(obj: PdfObject): PdfRef {
    this.assertOpen();

    return this.registry.register(obj);
  }

  addWarning(message: string): void {
    this.registry.addWarning(message);
  }

  get warnings(): string[] {
    return this.registry.warnings;
  }
}
