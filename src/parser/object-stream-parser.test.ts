import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";
import { unparseObject } from "#src/objects/unparse";
import { stringToBytes } from "#src/test-utils";
import { ObjectParseError, StructureError } from "./errors";
import { ObjectStreamParser } from "./object-stream-parser";

/**
 * Build an object stream. Index format: objNum1 offset1 objNum2 offset2 ...
 */
function createObjectStream(objects: Array<{ objNum: number; text: string }>): PdfStream {
  const indexParts: string[] = [];
  const objectParts: string[] = [];
  let currentOffset = 0;

  for (const { objNum, text } of objects) {
    indexParts.push(`${objNum} ${currentOffset}`);
    objectParts.push(text);
    // Add 1 for the newline separator
    currentOffset += text.length + 1;
  }

  const indexSection = `${indexParts.join(" ")}\n`;

  return PdfStream.fromDict(
    {
      Type: PdfName.of("ObjStm"),
      N: PdfNumber.of(objects.length),
      First: PdfNumber.of(indexSection.length),
    },
    stringToBytes(indexSection + objectParts.join("\n")),
  );
}

function show(obj: PdfObject | null | undefined): string | null {
  return obj ? unparseObject(obj) : null;
}

describe("ObjectStreamParser", () => {
  describe("constructor", () => {
    it("validates stream type", () => {
      const badStream = PdfStream.fromDict({
        Type: PdfName.of("Page"),
        N: PdfNumber.of(1),
        First: PdfNumber.of(10),
      });

      expect(() => new ObjectStreamParser(badStream)).toThrow(StructureError);
    });

    it("requires /N and /First", () => {
      const noN = PdfStream.fromDict({ Type: PdfName.of("ObjStm"), First: PdfNumber.of(10) });
      const noFirst = PdfStream.fromDict({ Type: PdfName.of("ObjStm"), N: PdfNumber.of(1) });

      expect(() => new ObjectStreamParser(noN)).toThrow(/missing required \/N/);
      expect(() => new ObjectStreamParser(noFirst)).toThrow(/missing required \/First/);
    });
  });

  describe("getObject", () => {
    it("returns objects by index", () => {
      const parser = new ObjectStreamParser(
        createObjectStream([
          { objNum: 1, text: "42" },
          { objNum: 2, text: "(Hello)" },
          { objNum: 3, text: "<< /Type /Page /MediaBox [0 0 612 792] >>" },
        ]),
      );

      expect(show(parser.getObject(0))).toBe("42");
      expect(show(parser.getObject(1))).toBe("(Hello)");
      expect(show(parser.getObject(2))).toBe("<< /Type /Page /MediaBox [ 0 0 612 792 ] >>");
    });

    it("returns null for out-of-bounds index", () => {
      const parser = new ObjectStreamParser(createObjectStream([{ objNum: 1, text: "42" }]));

      expect(parser.getObject(-1)).toBeNull();
      expect(parser.getObject(1)).toBeNull();
    });

    it("parses each object once", () => {
      const parser = new ObjectStreamParser(createObjectStream([{ objNum: 1, text: "[1 2]" }]));

      expect(parser.getObject(0)).toBe(parser.getObject(0));
    });

    it("keeps references unresolved", () => {
      const parser = new ObjectStreamParser(
        createObjectStream([{ objNum: 1, text: "<< /Resources << /Font << /F1 7 0 R >> >> >>" }]),
      );

      expect(show(parser.getObject(0))).toBe("<< /Resources << /Font << /F1 7 0 R >> >> >>");
    });

    it("decodes a compressed stream", () => {
      const content = "4 0 9 3\n/A\n[1]";
      const stream = PdfStream.fromDict(
        {
          Type: PdfName.of("ObjStm"),
          N: PdfNumber.of(2),
          First: PdfNumber.of(8),
          Filter: PdfName.of("FlateDecode"),
        },
        deflate(stringToBytes(content)),
      );

      const objects = new ObjectStreamParser(stream).getAllObjects();

      expect(show(objects.get(4))).toBe("/A");
      expect(show(objects.get(9))).toBe("[ 1 ]");
    });
  });

  describe("getAllObjects", () => {
    it("maps object numbers to objects", () => {
      const parser = new ObjectStreamParser(
        createObjectStream([
          { objNum: 1, text: "42" },
          { objNum: 5, text: "(Hello)" },
          { objNum: 10, text: "/Name" },
        ]),
      );

      const objects = parser.getAllObjects();

      expect([...objects.keys()]).toEqual([1, 5, 10]);
      expect(show(objects.get(10))).toBe("/Name");
    });

    it("handles an empty stream", () => {
      const stream = PdfStream.fromDict({
        Type: PdfName.of("ObjStm"),
        N: PdfNumber.of(0),
        First: PdfNumber.of(0),
      });

      expect(new ObjectStreamParser(stream).getAllObjects().size).toBe(0);
    });
  });

  describe("index", () => {
    it("tolerates extra whitespace", () => {
      const indexSection = "1    0   5   3  \n";
      const stream = PdfStream.fromDict(
        {
          Type: PdfName.of("ObjStm"),
          N: PdfNumber.of(2),
          First: PdfNumber.of(indexSection.length),
        },
        stringToBytes(`${indexSection}42\n(Hello)`),
      );

      const parser = new ObjectStreamParser(stream);

      expect(parser.objectCount).toBe(2);
      expect(parser.getObjectNumber(0)).toBe(1);
      expect(parser.getObjectNumber(1)).toBe(5);
      expect(parser.getObjectNumber(2)).toBeNull();
    });

    it("rejects a non-numeric index", () => {
      const stream = PdfStream.fromDict(
        { Type: PdfName.of("ObjStm"), N: PdfNumber.of(1), First: PdfNumber.of(5) },
        stringToBytes("/X 0\n42"),
      );

      expect(() => new ObjectStreamParser(stream).getObject(0)).toThrow(ObjectParseError);
    });
  });
});
