/**
 * The linearization parameter dictionary.
 *
 * A linearized file starts with a dictionary holding `/Linearized 1` and
 * the offsets a viewer needs to show the first page early. A full rewrite
 * drops the old one; the linearizer writes a new one.
 *
 * @see ISO 32000-1, F.2
 */

import type { PdfObject } from "#src/objects/pdf-object";

export interface LinearizationParams {
  version: number;

  /** /L */
  fileLength: number;

  /** /H [offset length] */
  hintOffset: number;
  hintLength: number;

  /** /O */
  firstPage: number;

  /** /E */
  endOfFirstPage: number;

  /** /N */
  pageCount: number;

  /** /T, offset of the main cross-reference section */
  mainXRefOffset: number;
}

export function isLinearizationDict(value: PdfObject): boolean {
  return value.type === "dict" && value.getNumber("Linearized") !== undefined;
}

/**
 * Read the parameters, or null when a required one is missing.
 */
export function parseLinearizationDict(value: PdfObject): LinearizationParams | null {
  if (value.type !== "dict") {
    return null;
  }

  const number = (key: string) => value.getNumber(key)?.value;
  const hint = value.getArray("H");
  const hintNumber = (index: number) => {
    const item = hint?.at(index);

    return item?.type === "number" ? item.value : undefined;
  };

  const params = {
    version: number("Linearized"),
    fileLength: number("L"),
    hintOffset: hintNumber(0),
    hintLength: hintNumber(1),
    firstPage: number("O"),
    endOfFirstPage: number("E"),
    pageCount: number("N"),
    mainXRefOffset: number("T"),
  };

  const {
    version,
    fileLength,
    hintOffset,
    hintLength,
    firstPage,
    endOfFirstPage,
    pageCount,
    mainXRefOffset,
  } = params;

  if (
    version === undefined ||
    fileLength === undefined ||
    hintOffset === undefined ||
    hintLength === undefined ||
    firstPage === undefined ||
    endOfFirstPage === undefined ||
    pageCount === undefined ||
    mainXRefOffset === undefined
  ) {
    return null;
  }

  return {
    version,
    fileLength,
    hintOffset,
    hintLength,
    firstPage,
    endOfFirstPage,
    pageCount,
    mainXRefOffset,
  };
}
