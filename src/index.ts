/**
 * pdfgraph
 *
 * The PDF object graph: typed handles over the objects of a document,
 * reading, editing and writing them.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Documents and handles
// ─────────────────────────────────────────────────────────────────────────────

export {
  type AddPageOptions,
  type DictionaryEntries,
  type LoadOptions,
  PDFDocument,
} from "./api/pdf-document";
export { type HandleTarget, type ObjectType, PDFHandle } from "./api/pdf-handle";
export { PDFArrayHandle } from "./api/pdf-array-handle";
export { PDFDictionaryHandle } from "./api/pdf-dictionary-handle";
export { PDFStreamHandle } from "./api/pdf-stream-handle";

// ─────────────────────────────────────────────────────────────────────────────
// Writing
// ─────────────────────────────────────────────────────────────────────────────

export {
  InvalidWriteOptionsError,
  type ObjectStreamMode,
  type ResolvedWriteOptions,
  resolveWriteOptions,
  type StreamDataMode,
  type WriteOptions,
  WriteOptionsSchema,
} from "./writer/options";
export { PDFWriter, type WriteSource } from "./writer/pdf-writer";
export type { EncryptOptions } from "./security/schemas";
export type { Permissions } from "./security/permissions";

// ─────────────────────────────────────────────────────────────────────────────
// Filters
// ─────────────────────────────────────────────────────────────────────────────

export type { DecodeLevel, Filter, FilterSpec } from "./filters/filter";
export { FilterPipeline } from "./filters/filter-pipeline";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  DecodeError,
  DocumentClosedError,
  ForeignHandleError,
  InvalidArgumentError,
  PdfError,
  type PdfErrorKind,
  PdfIOError,
  TypeMismatchError,
} from "./errors";
export { ObjectParseError, ParseError, StructureError, XRefParseError } from "./parser/errors";
export {
  AuthenticationError,
  type AuthenticationErrorCode,
  EncryptionDictError,
  SecurityError,
  UnsupportedEncryptionError,
} from "./security/errors";

// ─────────────────────────────────────────────────────────────────────────────
// PDF Objects
// ─────────────────────────────────────────────────────────────────────────────

export { PdfArray } from "./objects/pdf-array";
export { PdfBool } from "./objects/pdf-bool";
export { PdfDict } from "./objects/pdf-dict";
export { PdfInlineImage } from "./objects/pdf-inline-image";
export { PdfName } from "./objects/pdf-name";
export { PdfNull } from "./objects/pdf-null";
export { PdfNumber } from "./objects/pdf-number";
export type { PdfObject } from "./objects/pdf-object";
export { PdfOperator } from "./objects/pdf-operator";
export { PdfReserved, PdfUninitialized } from "./objects/pdf-placeholder";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";
export { type UnparseMode, unparseObject } from "./objects/unparse";
