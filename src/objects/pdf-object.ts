import type { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import type { PdfDict } from "./pdf-dict";
import type { PdfInlineImage } from "./pdf-inline-image";
import type { PdfName } from "./pdf-name";
import type { PdfNull } from "./pdf-null";
import type { PdfNumber } from "./pdf-number";
import type { PdfOperator } from "./pdf-operator";
import type { PdfReserved } from "./pdf-placeholder";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Any value a graph node can hold, told apart by `type`. Operators and
 * inline images only occur in parsed content streams; a reserved value
 * holds an object number until it is replaced.
 */
export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream
  | PdfOperator
  | PdfInlineImage
  | PdfReserved;
