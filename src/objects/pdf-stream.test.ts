import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { DecodeError } from "#src/errors";
import { serialize, stringToBytes } from "#src/test-utils";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import { PdfStream } from "./pdf-stream";

describe("PdfStream", () => {
  it("has type 'stream'", () => {
    expect(new PdfStream().type).toBe("stream");
  });

  it("starts with empty data", () => {
    expect(new PdfStream().data.length).toBe(0);
  });

  it("can be constructed from dict entries", () => {
    const stream = new PdfStream([["Filter", PdfName.of("FlateDecode")]]);

    expect(stream.dict.getName("Filter")?.value).toBe("FlateDecode");
  });

  it("shares a given dictionary", () => {
    const dict = PdfDict.of({ Type: PdfName.of("XObject") });

    const stream = new PdfStream(dict, new Uint8Array(3));
    dict.set("Subtype", PdfName.of("Form"));

    expect(stream.dict).toBe(dict);
    expect(stream.dict.getName("Subtype")?.value).toBe("Form");
  });

  describe("data", () => {
    it("setData() drops the filters", () => {
      const stream = PdfStream.fromDict(
        { Filter: PdfName.of("FlateDecode"), DecodeParms: new PdfDict() },
        new Uint8Array([1]),
      );

      stream.setData(stringToBytes("plain"));

      expect(stream.dict.has("Filter")).toBe(false);
      expect(stream.dict.has("DecodeParms")).toBe(false);
      expect(stream.data).toEqual(stringToBytes("plain"));
    });

    it("setRawData() keeps the filters", () => {
      const stream = PdfStream.fromDict({ Filter: PdfName.of("FlateDecode") });

      stream.setRawData(new Uint8Array([1, 2]));

      expect(stream.dict.getName("Filter")?.value).toBe("FlateDecode");
    });
  });

  describe("getFilterSpecs()", () => {
    it("is empty without /Filter", () => {
      expect(new PdfStream().getFilterSpecs()).toEqual([]);
    });

    it("pairs filter names with decode parameters", () => {
      const parms = PdfDict.of({ Predictor: PdfNumber.of(12) });
      const stream = PdfStream.fromDict({
        Filter: PdfArray.of(PdfName.of("ASCIIHexDecode"), PdfName.of("FlateDecode")),
        DecodeParms: PdfArray.of(new PdfDict(), parms),
      });

      const specs = stream.getFilterSpecs();

      expect(specs.map(spec => spec.name)).toEqual(["ASCIIHexDecode", "FlateDecode"]);
      expect(specs[1].params).toBe(parms);
    });
  });

  describe("getDecodedData()", () => {
    it("decodes Flate data", () => {
      const stream = PdfStream.fromDict(
        { Filter: PdfName.of("FlateDecode") },
        deflate(stringToBytes("hello stream")),
      );

      expect(stream.getDecodedData()).toEqual(stringToBytes("hello stream"));
    });

    it("returns raw data at level none", () => {
      const raw = deflate(stringToBytes("x"));
      const stream = PdfStream.fromDict({ Filter: PdfName.of("FlateDecode") }, raw);

      expect(stream.getDecodedData("none")).toBe(raw);
    });

    it("throws DecodeError for an unknown filter", () => {
      const stream = PdfStream.fromDict({ Filter: PdfName.of("BogusDecode") }, new Uint8Array(1));

      expect(() => stream.getDecodedData()).toThrow(DecodeError);
    });
  });

  it("serializes with a computed /Length", () => {
    const stream = PdfStream.fromDict(
      { Length: PdfNumber.of(99), Type: PdfName.of("XObject") },
      stringToBytes("abc"),
    );

    expect(serialize(stream)).toBe("<<\n/Length 3\n/Type /XObject\n>>\nstream\nabc\nendstream");
  });
});
