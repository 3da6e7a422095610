import { describe, expect, it } from "vitest";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { parseSingleObject } from "#src/parser/object-parser";
import { bytesToString, stringToBytes } from "#src/test-utils";
import type { WriteOptions } from "./options";
import { PDFWriter, type WriteSource } from "./pdf-writer";

interface SourceOptions {
  trailer?: string;
  pages?: number[];
  version?: string;
  usesObjectStreams?: boolean;
  encryptRef?: number;
}

function parse(text: string): PdfObject {
  return parseSingleObject(stringToBytes(text));
}

function dictOf(text: string): PdfDict {
  const dict = parse(text);

  return dict instanceof PdfDict ? dict : new PdfDict();
}

/**
 * A document held in a plain map. String values are parsed as PDF syntax.
 */
function sourceOf(
  objects: Record<number, string | PdfObject>,
  options: SourceOptions = {},
): WriteSource & { warnings: string[] } {
  const values = new Map<number, PdfObject>();
  const warnings: string[] = [];

  for (const [key, value] of Object.entries(objects)) {
    values.set(Number(key), typeof value === "string" ? parse(value) : value);
  }

  return {
    version: options.version ?? "1.4",
    trailer: dictOf(options.trailer ?? "<< /Size 3 /Root 1 0 R >>"),
    resolve: ref => (ref.generation === 0 ? (values.get(ref.objectNumber) ?? null) : null),
    *entries() {
      for (const number of [...values.keys()].sort((a, b) => a - b)) {
        const value = values.get(number);

        if (value !== undefined) {
          yield [PdfRef.of(number, 0), value];
        }
      }
    },
    pages: () => (options.pages ?? []).map(number => PdfRef.of(number, 0)),
    usesObjectStreams: options.usesObjectStreams ?? false,
    encryptRef: options.encryptRef === undefined ? null : PdfRef.of(options.encryptRef, 0),
    warn: message => warnings.push(message),
    warnings,
  };
}

const MINIMAL = {
  1: "<< /Type /Catalog /Pages 2 0 R >>",
  2: "<< /Type /Pages /Kids [] /Count 0 >>",
};

const STATIC_ID_HEX = "31415926535897932384626433832795";

function write(source: WriteSource, options: WriteOptions = {}): string {
  return bytesToString(new PDFWriter(source, options).write());
}

describe("PDFWriter", () => {
  it("writes header, objects, xref table and trailer", () => {
    const text = write(sourceOf(MINIMAL), { staticId: true });

    expect(text).toBe(
      "%PDF-1.4\n%\xe2\xe3\xcf\xd3\n" +
        "1 0 obj\n<<\n/Type /Catalog\n/Pages 2 0 R\n>>\nendobj\n" +
        "2 0 obj\n<<\n/Type /Pages\n/Kids []\n/Count 0\n>>\nendobj\n" +
        "xref\n0 3\n" +
        "0000000000 65535 f\r\n" +
        "0000000015 00000 n\r\n" +
        "0000000064 00000 n\r\n" +
        "trailer\n<<\n/Size 3\n/Root 1 0 R\n" +
        `/ID [<${STATIC_ID_HEX}> <${STATIC_ID_HEX}>]\n>>\n` +
        "startxref\n116\n%%EOF\n",
    );
  });

  it("renumbers objects in the order they are reached", () => {
    const text = write(
      sourceOf(
        {
          5: "<< /Type /Catalog /Pages 9 0 R >>",
          9: "<< /Type /Pages /Kids [] /Count 0 >>",
        },
        { trailer: "<< /Size 10 /Root 5 0 R >>" },
      ),
      { staticId: true },
    );

    expect(text).toContain("1 0 obj\n<<\n/Type /Catalog\n/Pages 2 0 R\n>>\nendobj\n");
    expect(text).toContain("2 0 obj\n<<\n/Type /Pages\n");
    expect(text).toContain("/Size 3\n/Root 1 0 R\n");
  });

  it("keeps other trailer entries and what they reach", () => {
    const text = write(
      sourceOf({ ...MINIMAL, 3: "<< /Title (T) >>" }, { trailer: "<< /Size 4 /Root 1 0 R /Info 3 0 R >>" }),
      { staticId: true },
    );

    expect(text).toContain("3 0 obj\n<<\n/Title (T)\n>>\nendobj\n");
    expect(text).toContain("/Size 4\n/Root 1 0 R\n/Info 3 0 R\n");
  });

  describe("unreferenced objects", () => {
    const objects = { ...MINIMAL, 3: "42", 4: "<< /Orphan true >>" };

    it("are dropped by default", () => {
      const text = write(sourceOf(objects), { staticId: true });

      expect(text).not.toContain("3 0 obj");
      expect(text).toContain("/Size 3\n");
    });

    it("are kept with preserveUnreferencedObjects", () => {
      const text = write(sourceOf(objects), { staticId: true, preserveUnreferencedObjects: true });

      expect(text).toContain("3 0 obj\n42\nendobj\n");
      expect(text).toContain("4 0 obj\n<<\n/Orphan true\n>>\nendobj\n");
      expect(text).toContain("/Size 5\n");
    });
  });

  it("leaves out object streams, xref streams and the old encryption dictionary", () => {
    const objStm = new PdfStream(dictOf("<< /Type /ObjStm /N 0 /First 0 >>"), new Uint8Array());
    const text = write(
      sourceOf({ ...MINIMAL, 3: objStm, 4: "<< /Filter /Standard >>" }, { encryptRef: 4 }),
      { staticId: true, preserveUnreferencedObjects: true },
    );

    expect(text).not.toContain("/ObjStm");
    expect(text).not.toContain("/Standard");
    expect(text).toContain("/Size 3\n");
  });

  describe("/ID", () => {
    it("keeps the first half of an existing /ID and generates the second", () => {
      const source = sourceOf(MINIMAL, { trailer: "<< /Size 3 /Root 1 0 R /ID [<AABB> <AABB>] >>" });
      const first = write(source);
      const second = write(source);

      expect(first).toMatch(/\/ID \[<AABB> <[0-9A-F]{32}>\]/);
      expect(first.match(/\/ID \[<AABB> <([0-9A-F]{32})>\]/)?.[1]).not.toBe(
        second.match(/\/ID \[<AABB> <([0-9A-F]{32})>\]/)?.[1],
      );
    });

    it("generates both halves when there is none", () => {
      expect(write(sourceOf(MINIMAL))).toMatch(/\/ID \[<[0-9A-F]{32}> <[0-9A-F]{32}>\]/);
    });

    it("is reproducible with staticId", () => {
      const source = sourceOf(MINIMAL);

      expect(write(source, { staticId: true })).toBe(write(source, { staticId: true }));
    });
  });

  describe("version", () => {
    it("is raised for object streams", () => {
      expect(write(sourceOf(MINIMAL), { objectStreamMode: "generate" })).toMatch(/^%PDF-1\.5\n/);
    });

    it("is raised for the encryption algorithm", () => {
      const encrypt = { userPassword: "test-secret" };

      expect(write(sourceOf(MINIMAL), { encrypt: { ...encrypt, algorithm: "RC4-40" } })).toMatch(/^%PDF-1\.4\n/);
      expect(write(sourceOf(MINIMAL), { encrypt: { ...encrypt, algorithm: "AES-128" } })).toMatch(/^%PDF-1\.6\n/);
    });

    it("is never lowered", () => {
      expect(write(sourceOf(MINIMAL, { version: "1.7" }), { objectStreamMode: "generate" })).toMatch(
        /^%PDF-1\.7\n/,
      );
    });

    it("follows pdfVersion when given", () => {
      expect(write(sourceOf(MINIMAL, { version: "1.7" }), { pdfVersion: "1.3" })).toMatch(/^%PDF-1\.3\n/);
    });
  });

  describe("object streams", () => {
    it("puts non-stream objects in an object stream and writes an xref stream", () => {
      const text = write(sourceOf(MINIMAL), { staticId: true, objectStreamMode: "generate" });

      expect(text).not.toContain("1 0 obj");
      expect(text).toContain("3 0 obj\n<<\n/Length ");
      expect(text).toContain("/Type /ObjStm\n/N 2\n");
      expect(text).toContain("4 0 obj\n<<\n/Length ");
      expect(text).toContain("/Size 5\n/Root 1 0 R\n");
      expect(text).toContain("/Type /XRef\n");
      expect(text).not.toContain("\nxref\n");
    });

    it("are kept in preserve mode when the source used them", () => {
      const text = write(sourceOf(MINIMAL, { usesObjectStreams: true }), { staticId: true });

      expect(text).toContain("/Type /ObjStm");
    });

    it("are not written in disable mode", () => {
      const text = write(sourceOf(MINIMAL, { usesObjectStreams: true }), {
        staticId: true,
        objectStreamMode: "disable",
      });

      expect(text).not.toContain("/Type /ObjStm");
      expect(text).toMatch(/^%PDF-1\.4\n/);
    });

    it("keeps streams outside object streams", () => {
      const stream = new PdfStream(new PdfDict(), stringToBytes("q Q"));
      const text = write(
        sourceOf({ ...MINIMAL, 3: stream }, { trailer: "<< /Size 4 /Root 1 0 R /Extra 3 0 R >>" }),
        { staticId: true, objectStreamMode: "generate" },
      );

      expect(text).toContain("3 0 obj\n<<\n/Length 3\n>>\nstream\nq Q\nendstream\nendobj\n");
    });
  });

  describe("stream data", () => {
    const repeated = "0 0 m 10 10 l S\n".repeat(20);

    function withStream(stream: PdfStream): WriteSource & { warnings: string[] } {
      return sourceOf({ ...MINIMAL, 3: stream }, { trailer: "<< /Size 4 /Root 1 0 R /Extra 3 0 R >>" });
    }

    it("compresses unfiltered streams when that makes them smaller", () => {
      const text = write(withStream(new PdfStream(new PdfDict(), stringToBytes(repeated))), {
        streamDataMode: "compress",
      });

      expect(text).toContain("/Filter /FlateDecode");
    });

    it("leaves short streams uncompressed", () => {
      const text = write(withStream(new PdfStream(new PdfDict(), stringToBytes("q"))), {
        streamDataMode: "compress",
      });

      expect(text).toContain("3 0 obj\n<<\n/Length 1\n>>\nstream\nq\nendstream\n");
    });

    it("decodes filtered streams in uncompress mode", () => {
      const data = FilterPipeline.encode(stringToBytes("BT ET"), { name: "FlateDecode" });
      const stream = new PdfStream(dictOf("<< /Filter /FlateDecode >>"), data);
      const text = write(withStream(stream), { streamDataMode: "uncompress" });

      expect(text).toContain("3 0 obj\n<<\n/Length 5\n>>\nstream\nBT ET\nendstream\n");
    });

    it("keeps data it cannot decode and warns", () => {
      const stream = new PdfStream(dictOf("<< /Filter /FlateDecode >>"), stringToBytes("not flate"));
      const source = withStream(stream);
      const text = write(source, { streamDataMode: "uncompress" });

      expect(text).toContain("/Filter /FlateDecode");
      expect(source.warnings).toHaveLength(1);
      expect(source.warnings[0]).toMatch(/^Object 3: stream left encoded \(FlateDecode: /);
    });

    it("does not change the source streams", () => {
      const stream = new PdfStream(new PdfDict(), stringToBytes(repeated));

      write(withStream(stream), { streamDataMode: "compress" });

      expect(stream.dict.has("Filter")).toBe(false);
      expect(bytesToString(stream.data)).toBe(repeated);
    });
  });

  it("normalizes page content streams", () => {
    const source = sourceOf(
      {
        1: "<< /Type /Catalog /Pages 2 0 R >>",
        2: "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
        3: "<< /Type /Page /Parent 2 0 R /Contents 4 0 R >>",
        4: new PdfStream(new PdfDict(), stringToBytes("q 1 0 0 1 0 0 cm Q")),
      },
      { pages: [3] },
    );
    const text = write(source, { contentNormalization: true });

    expect(text).toContain("<<\n/Length 19\n>>\nstream\nq\n1 0 0 1 0 0 cm\nQ\n\nendstream");
  });

  describe("encryption", () => {
    it("writes an /Encrypt dictionary after the objects", () => {
      const text = write(sourceOf(MINIMAL), {
        staticId: true,
        encrypt: { userPassword: "test-secret", algorithm: "RC4-128" },
      });

      expect(text).toContain("3 0 obj\n<<\n/Filter /Standard\n");
      expect(text).toContain("/Size 4\n/Root 1 0 R\n/Encrypt 3 0 R\n/ID ");
    });

    it("encrypts strings", () => {
      const source = sourceOf({ ...MINIMAL, 3: "<< /Title (secret title) >>" }, {
        trailer: "<< /Size 4 /Root 1 0 R /Info 3 0 R >>",
      });
      const text = write(source, { encrypt: { userPassword: "test-secret", algorithm: "AES-128" } });

      expect(text).not.toContain("secret title");
    });
  });

  describe("linearization", () => {
    const pages = {
      1: "<< /Type /Catalog /Pages 2 0 R >>",
      2: "<< /Type /Pages /Kids [3 0 R 4 0 R] /Count 2 >>",
      3: "<< /Type /Page /Parent 2 0 R /Contents 5 0 R >>",
      4: "<< /Type /Page /Parent 2 0 R >>",
      5: new PdfStream(new PdfDict(), stringToBytes("q Q")),
    };

    it("puts the linearization dictionary first", () => {
      const text = write(sourceOf(pages, { pages: [3, 4] }), { staticId: true, linearize: true });
      const afterHeader = text.slice(15);

      expect(afterHeader).toMatch(/^\d+ 0 obj\n<< \/Linearized 1 \/L \d+ +\/H \[/);
      expect(Number(afterHeader.match(/\/L (\d+)/)?.[1])).toBe(text.length);
      expect(afterHeader).toMatch(/ \/N 2 \/T /);
    });

    it("falls back to a normal file for a document without pages", () => {
      const source = sourceOf(MINIMAL);
      const text = write(source, { staticId: true, linearize: true });

      expect(text).not.toContain("/Linearized");
      expect(source.warnings).toEqual(["Document has no pages, written without linearization"]);
    });

    it("warns that object streams are not written", () => {
      const source = sourceOf(pages, { pages: [3, 4] });
      const text = write(source, { staticId: true, linearize: true, objectStreamMode: "generate" });

      expect(text).not.toContain("/ObjStm");
      expect(source.warnings).toEqual(["Object streams are not written in linearized files"]);
    });
  });
});

