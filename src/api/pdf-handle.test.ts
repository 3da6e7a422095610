import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import {
  DocumentClosedError,
  ForeignHandleError,
  InvalidArgumentError,
  TypeMismatchError,
} from "#src/errors";
import { ObjectParseError } from "#src/parser/errors";
import { buildPdf, bytesToString, stringToBytes } from "#src/test-utils";
import { PDFArrayHandle } from "./pdf-array-handle";
import { PDFDictionaryHandle } from "./pdf-dictionary-handle";
import { PDFDocument } from "./pdf-document";
import { PDFStreamHandle } from "./pdf-stream-handle";

describe("PDFHandle", () => {
  describe("scalars", () => {
    it("reports types", () => {
      const doc = PDFDocument.empty();

      expect(doc.newNull().getType()).toBe("null");
      expect(doc.newBool(true).getType()).toBe("boolean");
      expect(doc.newInteger(3).getType()).toBe("integer");
      expect(doc.newReal(3.5).getType()).toBe("real");
      expect(doc.newName("Type").getType()).toBe("name");
      expect(doc.newString("x").getType()).toBe("string");
      expect(doc.newArray().getType()).toBe("array");
      expect(doc.newDictionary().getType()).toBe("dictionary");
      expect(doc.newStream().getType()).toBe("stream");
      expect(doc.newOperator("Tj").getType()).toBe("operator");
      expect(doc.newInlineImage(new Uint8Array([1])).getType()).toBe("inline-image");
    });

    it("formats reals with the given precision", () => {
      const doc = PDFDocument.empty();

      expect(doc.newReal(1.2345, 3).toString()).toBe("1.234");
      expect(doc.newReal(2.5).toString()).toBe("2.5");
      expect(doc.newReal(3, 2).toString()).toBe("3");
      expect(doc.newReal(1.2345, 3).asNumber()).toBe(1.2345);
    });

    it("keeps the text of parsed reals", () => {
      const doc = PDFDocument.empty();

      expect(doc.parseObject("1.50").asReal()).toBe("1.50");
      expect(doc.parseObject("7").asReal()).toBe("7");
    });

    it("accepts names with or without the slash", () => {
      const doc = PDFDocument.empty();

      expect(doc.newName("/Type").asName()).toBe("/Type");
      expect(doc.newName("Type").asName()).toBe("/Type");
      expect(doc.newName("A B").toString()).toBe("/A#20B");
    });

    it("writes text strings as PDFDocEncoding or UTF-16BE", () => {
      const doc = PDFDocument.empty();

      expect(doc.newUtf8String("привет").toBinary()).toBe("<feff043f04400438043204350442>");
      expect(doc.newUtf8String("привет").asString()).toBe("привет");
      expect(doc.newUtf8String("café").toBinary()).toBe("<636166e9>");
      expect(doc.newUtf8String("café").asString()).toBe("café");
    });

    it("stores newString as UTF-8 bytes", () => {
      const doc = PDFDocument.empty();

      expect([...doc.newString("é").asBinaryString()]).toEqual([0xc3, 0xa9]);
    });

    it("prints strings as literals unless they look binary", () => {
      const doc = PDFDocument.empty();

      expect(doc.newString("Hi (x)").toString()).toBe("(Hi \\(x\\))");
      expect(doc.newBinaryString(new Uint8Array([0, 1, 0xff])).toString()).toBe("<0001ff>");
      expect(doc.newString("Hi").toBinary()).toBe("<4869>");
    });

    it("throws TypeMismatchError from accessors of another type", () => {
      const doc = PDFDocument.empty();

      expect(() => doc.newInteger(1).asName()).toThrow(TypeMismatchError);
      expect(() => doc.newInteger(1).asName()).toThrow("Expected name, got integer");
      expect(() => doc.newReal(1.5).asInteger()).toThrow(TypeMismatchError);
      expect(() => doc.newName("A").asBool()).toThrow(TypeMismatchError);
    });

    it("clamps asInt32 and records a warning", () => {
      const doc = PDFDocument.empty();

      expect(doc.parseObject("3000000000").asInt32()).toBe(2147483647);
      expect(doc.parseObject("-3000000000").asInt32()).toBe(-2147483648);
      expect(doc.parseObject("12").asInt32()).toBe(12);
      expect(doc.warnings).toEqual([
        "Integer 3000000000 does not fit in 32 bits, using 2147483647",
        "Integer -3000000000 does not fit in 32 bits, using -2147483648",
      ]);
    });

    it("reads operators and inline images", () => {
      const doc = PDFDocument.empty();

      expect(doc.newOperator("Tj").asOperator()).toBe("Tj");
      expect([...doc.newInlineImage(new Uint8Array([1, 2])).asInlineImage()]).toEqual([1, 2]);
    });
  });

  describe("identity", () => {
    it("gives direct handles no object number", () => {
      const doc = PDFDocument.empty();
      const value = doc.newInteger(1);

      expect(value.isIndirect()).toBe(false);
      expect(value.getObjectNumber()).toBe(0);
      expect(value.getGeneration()).toBe(0);
    });

    it("makes a value indirect under the next object number", () => {
      const doc = PDFDocument.empty();
      const value = doc.newInteger(42).makeIndirect();

      expect(value.toString()).toBe("3 0 R");
      expect(value.asInteger()).toBe(42);
      expect(value.makeIndirect().getObjectNumber()).toBe(3);
      expect(doc.getMaxObjectNumber()).toBe(3);
    });

    it("treats handles to the same slot as equal", () => {
      const doc = PDFDocument.empty();
      const a = doc.getObjectById(1);
      const b = doc.getObjectById(1);
      const dict = doc.parseObject("<< /A [1] >>");
      const item = PDFDictionaryHandle.from(dict);

      expect(a !== undefined && b !== undefined && a.equals(b)).toBe(true);
      expect(item.get("A")?.equals(item.get("A") ?? doc.newNull())).toBe(true);
      expect(doc.newInteger(1).equals(doc.newInteger(1))).toBe(false);
    });

    it("orders indirect handles before direct ones, then by number", () => {
      const doc = PDFDocument.empty();
      const direct = doc.newInteger(1);
      const one = doc.parseObject("1 0 R");
      const two = doc.parseObject("2 0 R");

      expect(one.compare(two)).toBeLessThan(0);
      expect(two.compare(one)).toBeGreaterThan(0);
      expect(two.compare(direct)).toBeLessThan(0);
      expect(direct.compare(one)).toBeGreaterThan(0);
    });

    it("orders handles of different documents by document", () => {
      const first = PDFDocument.empty();
      const second = PDFDocument.empty();

      expect(first.newNull().compare(second.newNull())).toBeLessThan(0);
    });

    it("clones direct values deeply and indirect ones as the same slot", () => {
      const doc = PDFDocument.empty();
      const original = PDFArrayHandle.from(doc.parseObject("[1 [2]]"));
      const copy = PDFArrayHandle.from(original.clone());

      copy.push(doc.newInteger(3));

      expect(original.toString()).toBe("[ 1 [ 2 ] ]");
      expect(copy.toString()).toBe("[ 1 [ 2 ] 3 ]");

      const catalog = doc.parseObject("1 0 R");

      expect(catalog.clone().equals(catalog)).toBe(true);
    });

    it("reads a dangling reference as null", () => {
      const doc = PDFDocument.empty();
      const dangling = doc.parseObject("9 0 R");

      expect(dangling.isNull()).toBe(true);
      expect(dangling.toString()).toBe("9 0 R");
      expect(doc.getObjectById(9)).toBeUndefined();
    });

    it("returns the document a handle belongs to", () => {
      const doc = PDFDocument.empty();

      expect(doc.newNull().getDocument()).toBe(doc);
    });
  });

  describe("uninitialized handles", () => {
    it("reports their state", () => {
      const doc = PDFDocument.empty();
      const value = doc.newUninitialized();

      expect(value.getType()).toBe("uninitialized");
      expect(value.isInitialized()).toBe(false);
      expect(value.isNull()).toBe(false);
    });

    it("cannot be printed or stored", () => {
      const doc = PDFDocument.empty();
      const value = doc.newUninitialized();

      expect(() => value.toString()).toThrow(TypeMismatchError);
      expect(() => doc.newArray([value])).toThrow(TypeMismatchError);
      expect(() => value.makeIndirect()).toThrow(TypeMismatchError);
    });
  });

  describe("reserved slots", () => {
    it("can be referenced before they are filled", () => {
      const doc = PDFDocument.empty();
      const reserved = doc.newReserved();
      const array = doc.newArray([reserved]);

      expect(reserved.isReserved()).toBe(true);
      expect(array.toString()).toBe("[ 3 0 R ]");

      doc.replaceReserved(reserved, doc.newInteger(5));

      expect(reserved.asInteger()).toBe(5);
      expect(array.get(0)?.asInteger()).toBe(5);
    });

    it("can be filled only once", () => {
      const doc = PDFDocument.empty();
      const reserved = doc.newReserved();

      doc.replaceReserved(reserved, doc.newInteger(5));

      expect(() => doc.replaceReserved(reserved, doc.newInteger(6))).toThrow(
        new InvalidArgumentError("3 0 R is not a reserved object"),
      );
    });

    it("rejects direct handles", () => {
      const doc = PDFDocument.empty();

      expect(() => doc.replaceReserved(doc.newNull(), doc.newInteger(1))).toThrow(InvalidArgumentError);
    });
  });

  describe("closed documents", () => {
    it("rejects every handle after close", () => {
      const doc = PDFDocument.empty();
      const value = doc.newInteger(1);
      const catalog = doc.getRoot();

      doc.close();

      expect(doc.isClosed).toBe(true);
      expect(() => value.getType()).toThrow(DocumentClosedError);
      expect(() => value.asInteger()).toThrow(DocumentClosedError);
      expect(() => catalog?.keys()).toThrow(DocumentClosedError);
      expect(() => doc.newNull()).toThrow(DocumentClosedError);
    });

    it("rejects storing a handle of a closed document", () => {
      const open = PDFDocument.empty();
      const closed = PDFDocument.empty();
      const value = closed.newInteger(1);

      closed.close();

      expect(() => open.newArray([value])).toThrow(DocumentClosedError);
    });
  });

  describe("foreign handles", () => {
    it("cannot be stored in another document", () => {
      const a = PDFDocument.empty();
      const b = PDFDocument.empty();

      expect(() => a.newDictionary({ X: b.newInteger(1) })).toThrow(ForeignHandleError);
      expect(() => a.newArray().push(b.newInteger(1))).toThrow(ForeignHandleError);
      expect(() => a.addPage(b.newDictionary())).toThrow(ForeignHandleError);
    });
  });
});

describe("PDFArrayHandle", () => {
  it("rejects values that are not arrays", () => {
    const doc = PDFDocument.empty();

    expect(() => PDFArrayHandle.from(doc.newInteger(1))).toThrow("Expected array, got integer");
  });

  it("pushes, inserts, sets and removes", () => {
    const doc = PDFDocument.empty();
    const array = PDFArrayHandle.from(doc.parseObject("[1 2 3]"));

    array.push(doc.newName("/Four"));
    array.insert(0, doc.newInteger(0));
    array.set(1, doc.newBool(false));
    array.remove(2);

    expect(array.toString()).toBe("[ 0 false 3 /Four ]");
    expect(array.length).toBe(4);
  });

  it("throws RangeError for indexes out of range", () => {
    const doc = PDFDocument.empty();
    const array = doc.newArray([doc.newInteger(1)]);

    expect(array.get(5)).toBeUndefined();
    expect(() => array.set(5, doc.newNull())).toThrow(RangeError);
    expect(() => array.remove(1)).toThrow(RangeError);
  });

  it("iterates its items", () => {
    const doc = PDFDocument.empty();
    const array = PDFArrayHandle.from(doc.parseObject("[1 2 3]"));

    expect([...array].map(item => item.asInteger())).toEqual([1, 2, 3]);
    expect(array.toArray()).toHaveLength(3);
  });

  it("stores a copy of direct values", () => {
    const doc = PDFDocument.empty();
    const inner = doc.newArray([doc.newInteger(1)]);
    const outer = doc.newArray([inner]);

    inner.push(doc.newInteger(2));

    expect(outer.toString()).toBe("[ [ 1 ] ]");
  });

  it("stores indirect values as references", () => {
    const doc = PDFDocument.empty();
    const shared = doc.newArray([doc.newInteger(1)]).makeIndirect();
    const outer = doc.newArray([shared]);

    PDFArrayHandle.from(shared).push(doc.newInteger(2));

    expect(outer.toString()).toBe("[ 3 0 R ]");
    expect(outer.get(0)?.isIndirect()).toBe(true);
    expect(outer.get(0)?.clone().equals(shared)).toBe(true);
    expect(PDFArrayHandle.from(outer.get(0) ?? doc.newArray()).length).toBe(2);
  });

  it("edits nested containers in place", () => {
    const doc = PDFDocument.empty();
    const outer = PDFArrayHandle.from(doc.parseObject("[[1]]"));
    const inner = outer.get(0);

    if (inner !== undefined) {
      PDFArrayHandle.from(inner).push(doc.newInteger(2));
    }

    expect(outer.toString()).toBe("[ [ 1 2 ] ]");
  });
});

describe("PDFDictionaryHandle", () => {
  it("lists keys with the leading slash", () => {
    const doc = PDFDocument.empty();
    const dict = PDFDictionaryHandle.from(doc.parseObject("<< /A 1 /B 2 >>"));

    expect(dict.keys()).toEqual(["/A", "/B"]);
    expect([...dict].map(([key, value]) => `${key}=${value.toString()}`)).toEqual(["/A=1", "/B=2"]);
  });

  it("takes keys with or without the slash", () => {
    const doc = PDFDocument.empty();
    const dict = doc.newDictionary({ "/A": doc.newInteger(1) });

    dict.set("B", doc.newInteger(2));

    expect(dict.has("A")).toBe(true);
    expect(dict.has("/B")).toBe(true);
    expect(dict.get("/B")?.asInteger()).toBe(2);
    expect(dict.toString()).toBe("<< /A 1 /B 2 >>");

    dict.remove("/A");
    dict.remove("Missing");

    expect(dict.keys()).toEqual(["/B"]);
  });

  it("builds from pairs", () => {
    const doc = PDFDocument.empty();
    const dict = doc.newDictionaryFrom([
      ["Type", doc.newName("Font")],
      ["Size", doc.newInteger(12)],
    ]);

    expect(dict.toString()).toBe("<< /Type /Font /Size 12 >>");
  });

  it("returns typed views of entries", () => {
    const doc = PDFDocument.empty();
    const dict = PDFDictionaryHandle.from(doc.parseObject("<< /A [1] /D << /X 1 >> /N 3 >>"));

    expect(dict.getArray("A")?.length).toBe(1);
    expect(dict.getDictionary("D")?.keys()).toEqual(["/X"]);
    expect(dict.getArray("N")).toBeUndefined();
    expect(dict.getDictionary("Missing")).toBeUndefined();
  });

  it("promotes a direct stream to an indirect object", () => {
    const doc = PDFDocument.empty();
    const dict = doc.newDictionary();

    dict.set("S", doc.newStream(stringToBytes("data")));

    const stored = dict.get("S");

    expect(stored?.isIndirect()).toBe(true);
    expect(stored?.getObjectNumber()).toBe(3);
    expect(stored?.isStream()).toBe(true);
  });

  describe("getPageContentData", () => {
    const pdf = buildPdf([
      "<< /Type /Catalog /Pages 2 0 R >>",
      "<< /Type /Pages /Kids [3 0 R 6 0 R] /Count 2 >>",
      "<< /Type /Page /Parent 2 0 R /Contents [4 0 R 5 0 R] >>",
      "<< /Length 1 >>\nstream\nq\nendstream",
      "<< /Length 2 >>\nstream\nQ\n\nendstream",
      "<< /Type /Page /Parent 2 0 R >>",
    ]);

    it("joins content streams with a newline", async () => {
      const doc = await PDFDocument.load(pdf);

      expect(bytesToString(doc.getPage(0)?.getPageContentData() ?? new Uint8Array())).toBe("q\nQ\n");
    });

    it("returns no bytes for a page without contents", async () => {
      const doc = await PDFDocument.load(pdf);

      expect(doc.getPage(1)?.getPageContentData()).toHaveLength(0);
    });
  });
});

describe("PDFStreamHandle", () => {
  it("rejects values that are not streams", () => {
    const doc = PDFDocument.empty();

    expect(() => PDFStreamHandle.from(doc.newDictionary())).toThrow(TypeMismatchError);
  });

  it("shares its dictionary", () => {
    const doc = PDFDocument.empty();
    const stream = doc.newStreamWithDictionary({ Type: doc.newName("XObject") }, stringToBytes("x"));

    stream.getStreamDictionary().set("Subtype", doc.newName("Form"));

    expect(stream.toString()).toBe("<< /Type /XObject /Subtype /Form >>");
  });

  it("decodes filtered data", () => {
    const doc = PDFDocument.empty();
    const stream = doc.newStream();
    const compressed = deflate(stringToBytes("hello"));

    stream.replaceStreamData(compressed, doc.newName("FlateDecode"));

    expect(bytesToString(stream.getStreamData())).toBe("hello");
    expect(stream.getRawStreamData()).toEqual(compressed);
    expect(stream.getStreamDictionary().get("Filter")?.asName()).toBe("/FlateDecode");
  });

  it("drops the filter when new data comes unfiltered", () => {
    const doc = PDFDocument.empty();
    const stream = doc.newStream();

    stream.replaceStreamData(deflate(stringToBytes("a")), doc.newName("FlateDecode"), doc.newNull());
    stream.replaceStreamData(stringToBytes("plain"));

    expect(stream.getStreamDictionary().keys()).toEqual([]);
    expect(bytesToString(stream.getStreamData())).toBe("plain");
  });

  it("copies the data it is given", () => {
    const doc = PDFDocument.empty();
    const stream = doc.newStream();
    const data = stringToBytes("abc");

    stream.replaceStreamData(data);
    data[0] = 0x7a;

    expect(bytesToString(stream.getStreamData())).toBe("abc");
  });
});

describe("parsing", () => {
  it("parses one object", () => {
    const doc = PDFDocument.empty();

    expect(doc.parseObject("<< /A [1 2.5 (x)] >>").toString()).toBe("<< /A [ 1 2.5 (x) ] >>");
  });

  it("rejects trailing tokens", () => {
    const doc = PDFDocument.empty();

    expect(() => doc.parseObject("1 2")).toThrow();
  });

  it("tokenizes content streams", () => {
    const doc = PDFDocument.empty();
    const tokens = doc.parseContentStream(stringToBytes("0 0 m (a) Tj"));

    expect(tokens.map(token => token.getType())).toEqual(["integer", "integer", "operator", "string", "operator"]);
  });
});

describe("scalar round trips", () => {
  it("reads back what the constructors stored", () => {
    const doc = PDFDocument.empty();

    expect(doc.newBool(false).asBool()).toBe(false);
    expect(doc.newInteger(1234567890).asInteger()).toBe(1234567890);
    expect(doc.newReal(0.25, 2).asNumber()).toBe(0.25);
    expect(doc.newName("/Font").asName()).toBe("/Font");
    expect(doc.newUtf8String("plain text").asString()).toBe("plain text");
    expect([...doc.newBinaryString(new Uint8Array([1, 2, 3, 4])).asBinaryString()]).toEqual([1, 2, 3, 4]);
  });

  it("prints scalars in PDF syntax", () => {
    const doc = PDFDocument.empty();

    expect(doc.newInteger(1234567890).toString()).toBe("1234567890");
    expect(doc.newBool(true).toString()).toBe("true");
    expect(doc.newNull().toString()).toBe("null");
    expect(doc.newBinaryString(new Uint8Array([1, 2, 3, 4])).toBinary()).toBe("<01020304>");
  });

  it("keeps 64-bit integers exact", () => {
    const doc = PDFDocument.empty();
    const parsed = doc.parseObject("9223372036854775807");
    const built = doc.newInteger(9223372036854775807n);

    expect(parsed.asBigInt()).toBe(9223372036854775807n);
    expect(built.asBigInt()).toBe(9223372036854775807n);
    expect(built.toString()).toBe("9223372036854775807");
    expect(doc.newInteger(-12).asBigInt()).toBe(-12n);
    expect(() => doc.newReal(1.5).asBigInt()).toThrow(TypeMismatchError);
  });

  it("rejects numbers that have no PDF form", () => {
    const doc = PDFDocument.empty();

    expect(() => doc.newInteger(1.5)).toThrow(InvalidArgumentError);
    expect(() => doc.newInteger(Number.NaN)).toThrow("Expected an integer, got NaN");
    expect(() => doc.newReal(Number.POSITIVE_INFINITY, 2)).toThrow(
      "Expected a finite number, got Infinity",
    );
    expect(() => doc.newReal(Number.NaN)).toThrow(InvalidArgumentError);
  });

  it("widens integers to reals but nothing else", () => {
    const doc = PDFDocument.empty();

    expect(doc.newInteger(4).asNumber()).toBe(4);
    expect(doc.newInteger(4).asReal()).toBe("4");
    expect(() => doc.newBool(true).asNumber()).toThrow(TypeMismatchError);
    expect(() => doc.newString("4").asInteger()).toThrow(TypeMismatchError);
  });

  it("keeps index order when setting array items", () => {
    const doc = PDFDocument.empty();
    const array = PDFArrayHandle.from(doc.parseObject("[1 2 3]"));

    array.set(1, doc.newInteger(5));

    expect(array.toArray().map(item => item.asInteger())).toEqual([1, 5, 3]);
  });

  it("throws ObjectParseError for unbalanced syntax", () => {
    const doc = PDFDocument.empty();

    expect(() => doc.parseObject("<< /A 1")).toThrow(ObjectParseError);
    expect(() => doc.parseObject("]")).toThrow(ObjectParseError);
    expect(() => doc.parseObject("<zz>")).toThrow(ObjectParseError);
  });
});
