/**
 * Error classes for PDF parsing operations.
 *
 * In lenient mode the document parser turns some of these into warnings
 * (a broken `/Prev` section, a bad object stream); the rest propagate.
 */

import { PdfError } from "#src/errors";

/**
 * Base class for parsing errors.
 */
export class ParseError extends PdfError {
  /** Byte offset the parser was at, when known. */
  readonly position: number | undefined;

  constructor(message: string, position?: number) {
    super(position === undefined ? message : `${message} (at offset ${position})`, "ParseError");
    this.name = "ParseError";
    this.position = position;
  }
}

/**
 * Error when xref parsing fails.
 */
export class XRefParseError extends ParseError {
  constructor(message: string, position?: number) {
    super(message, position);
    this.name = "XRefParseError";
  }
}

/**
 * Error when object syntax is malformed.
 */
export class ObjectParseError extends ParseError {
  constructor(message: string, position?: number) {
    super(message, position);
    this.name = "ObjectParseError";
  }
}

/**
 * Error when the PDF file structure is invalid (no header, no trailer, no
 * catalog).
 */
export class StructureError extends ParseError {
  constructor(message: string, position?: number) {
    super(message, position);
    this.name = "StructureError";
  }
}
