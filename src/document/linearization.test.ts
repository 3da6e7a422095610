import { describe, expect, it } from "vitest";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { isLinearizationDict, parseLinearizationDict } from "./linearization";

function linearizationDict(): PdfDict {
  return PdfDict.of({
    Linearized: PdfNumber.of(1),
    L: PdfNumber.of(10000),
    H: PdfArray.of(PdfNumber.of(1000), PdfNumber.of(200)),
    O: PdfNumber.of(5),
    E: PdfNumber.of(5000),
    N: PdfNumber.of(10),
    T: PdfNumber.of(9000),
  });
}

describe("isLinearizationDict", () => {
  it("recognizes a dictionary with /Linearized", () => {
    expect(isLinearizationDict(linearizationDict())).toBe(true);
  });

  it("rejects other dictionaries", () => {
    expect(isLinearizationDict(PdfDict.of({ Type: PdfName.of("Catalog") }))).toBe(false);
    expect(isLinearizationDict(new PdfDict())).toBe(false);
  });

  it("rejects values that are not dictionaries", () => {
    expect(isLinearizationDict(PdfNumber.of(1))).toBe(false);
  });
});

describe("parseLinearizationDict", () => {
  it("reads every parameter", () => {
    expect(parseLinearizationDict(linearizationDict())).toEqual({
      version: 1,
      fileLength: 10000,
      hintOffset: 1000,
      hintLength: 200,
      firstPage: 5,
      endOfFirstPage: 5000,
      pageCount: 10,
      mainXRefOffset: 9000,
    });
  });

  it("returns null when a parameter is missing", () => {
    const dict = linearizationDict();

    dict.delete("T");

    expect(parseLinearizationDict(dict)).toBeNull();
  });

  it("returns null without the hint stream array", () => {
    const dict = linearizationDict();

    dict.delete("H");

    expect(parseLinearizationDict(dict)).toBeNull();
  });
});
