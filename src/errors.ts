/**
 * Error classes shared by the object model, the document session and the
 * filters.
 *
 * Every error the library throws on purpose extends {@link PdfError}, whose
 * `kind` lets callers branch without `instanceof` chains.
 */

export type PdfErrorKind =
  | "TypeMismatch"
  | "ParseError"
  | "DecodeError"
  | "AuthenticationError"
  | "SecurityError"
  | "IOError"
  | "InvalidHandle"
  | "InvalidArgument";

export class PdfError extends Error {
  readonly kind: PdfErrorKind;

  constructor(message: string, kind: PdfErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "PdfError";
    this.kind = kind;
  }
}

/**
 * An accessor was called on a handle whose type does not match.
 */
export class TypeMismatchError extends PdfError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, message?: string) {
    super(message ?? `Expected ${expected}, got ${actual}`, "TypeMismatch");
    this.name = "TypeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Stream data could not be decoded: unknown filter, unsupported codec or
 * corrupt data.
 */
export class DecodeError extends PdfError {
  readonly filter: string;

  constructor(filter: string, message: string, options?: ErrorOptions) {
    super(`${filter}: ${message}`, "DecodeError", options);
    this.name = "DecodeError";
    this.filter = filter;
  }
}

/**
 * Reading or writing a file failed.
 */
export class PdfIOError extends PdfError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`I/O error on ${path}: ${reason}`, "IOError", { cause });
    this.name = "PdfIOError";
    this.path = path;
  }
}

/**
 * The document behind a handle was closed.
 */
export class DocumentClosedError extends PdfError {
  constructor() {
    super("Document has been closed", "InvalidHandle");
    this.name = "DocumentClosedError";
  }
}

/**
 * A handle from one document was inserted into another.
 */
export class ForeignHandleError extends PdfError {
  constructor() {
    super("Handle belongs to a different document", "InvalidHandle");
    this.name = "ForeignHandleError";
  }
}

/**
 * An argument was rejected before any work was done.
 */
export class InvalidArgumentError extends PdfError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "InvalidArgument", options);
    this.name = "InvalidArgumentError";
  }
}
