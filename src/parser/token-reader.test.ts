import { describe, expect, it } from "vitest";
import { Scanner } from "#src/io/scanner";
import { stringToBytes } from "#src/test-utils";
import { ObjectParseError } from "./errors";
import type { Token } from "./token";
import { TokenReader } from "./token-reader";

function reader(input: string): TokenReader {
  return new TokenReader(new Scanner(stringToBytes(input)));
}

function tokens(input: string): Token[] {
  const r = reader(input);
  const result: Token[] = [];

  while (true) {
    const token = r.nextToken();

    if (token.type === "eof") {
      return result;
    }

    result.push(token);
  }
}

function first(input: string): Token {
  return reader(input).nextToken();
}

describe("TokenReader", () => {
  describe("whitespace and comments", () => {
    it("skips all six whitespace characters", () => {
      expect(first(" \t\n\r\f\x0042")).toMatchObject({ type: "number", value: 42, position: 6 });
    });

    it("skips comments up to the end of line", () => {
      expect(tokens("% one\r% two\n1")).toEqual([
        { type: "number", value: 1, isInteger: true, raw: "1", position: 12 },
      ]);
    });

    it("returns EOF for empty and comment-only input", () => {
      expect(first("")).toEqual({ type: "eof", position: 0 });
      expect(first("% nothing")).toEqual({ type: "eof", position: 9 });
    });
  });

  describe("numbers", () => {
    it.each([
      ["0", 0, true, "0"],
      ["-17", -17, true, "-17"],
      ["+17", 17, true, "17"],
      ["3.14", 3.14, false, "3.14"],
      ["-.5", -0.5, false, "-.5"],
      ["5.", 5, false, "5."],
      ["--5", 5, true, "5"],
      ["---5", 5, true, "5"],
    ])("reads %s", (input, value, isInteger, raw) => {
      expect(first(input)).toEqual({ type: "number", value, isInteger, raw, position: 0 });
    });

    it("stops at a delimiter", () => {
      expect(tokens("12[")).toEqual([
        { type: "number", value: 12, isInteger: true, raw: "12", position: 0 },
        { type: "delimiter", value: "[", position: 2 },
      ]);
    });

    it("reads a number run into letters as a keyword", () => {
      expect(first("12abc")).toEqual({ type: "keyword", value: "12abc", position: 0 });
    });

    it("reads a lone sign or dot as a keyword", () => {
      expect(first("-")).toEqual({ type: "keyword", value: "-", position: 0 });
      expect(first(". ")).toEqual({ type: "keyword", value: ".", position: 0 });
    });
  });

  describe("names", () => {
    it("strips the slash", () => {
      expect(first("/Type")).toEqual({ type: "name", value: "Type", position: 0 });
    });

    it("reads the empty name", () => {
      expect(tokens("/ /A")).toEqual([
        { type: "name", value: "", position: 0 },
        { type: "name", value: "A", position: 2 },
      ]);
    });

    it("decodes #xx escapes", () => {
      expect(first("/A#20B#2F")).toMatchObject({ value: "A B/" });
    });

    it("keeps an incomplete escape literally", () => {
      expect(first("/A#2")).toMatchObject({ value: "A#2" });
      expect(first("/A#")).toMatchObject({ value: "A#" });
    });

    it("ends at a delimiter", () => {
      expect(tokens("/A/B[").map(t => t.type)).toEqual(["name", "name", "delimiter"]);
    });
  });

  describe("literal strings", () => {
    function literal(input: string): string {
      const token = first(input);

      if (token.type !== "string") {
        throw new Error(`expected a string token, got ${token.type}`);
      }

      expect(token.format).toBe("literal");

      return String.fromCharCode(...token.value);
    }

    it("keeps balanced parentheses", () => {
      expect(literal("(a(b(c))d)")).toBe("a(b(c))d");
    });

    it("decodes named escapes", () => {
      expect(literal("(\\n\\r\\t\\b\\f\\(\\)\\\\)")).toBe("\n\r\t\b\f()\\");
    });

    it("decodes octal escapes of one to three digits", () => {
      expect(literal("(\\101\\7\\12x)")).toBe("A\x07\nx");
    });

    it("drops escaped line breaks", () => {
      expect(literal("(ab\\\ncd\\\r\nef)")).toBe("abcdef");
    });

    it("reads raw CR and CRLF as LF", () => {
      expect(literal("(a\rb\r\nc)")).toBe("a\nb\nc");
    });

    it("keeps the character of an unknown escape", () => {
      expect(literal("(\\q)")).toBe("q");
    });

    it("throws on an unterminated string", () => {
      expect(() => first("(abc(def)")).toThrow(ObjectParseError);
    });
  });

  describe("hex strings", () => {
    it("decodes pairs and skips whitespace", () => {
      expect(first("<48 65\n6C>")).toEqual({
        type: "string",
        value: new Uint8Array([0x48, 0x65, 0x6c]),
        format: "hex",
        position: 0,
      });
    });

    it("pads an odd digit count with zero", () => {
      expect(first("<123>")).toMatchObject({ value: new Uint8Array([0x12, 0x30]) });
    });

    it("throws on an unterminated string", () => {
      expect(() => first("<4142")).toThrow("Unterminated hex string (at offset 0)");
    });

    it("skips stray characters by default", () => {
      expect(first("<4z1>")).toMatchObject({ value: new Uint8Array([0x41]) });
    });

    it("rejects stray characters when strict", () => {
      const strict = new TokenReader(new Scanner(stringToBytes("<4z1>")), { strict: true });

      expect(() => strict.nextToken()).toThrow("Invalid character in hex string (at offset 2)");
    });
  });

  describe("delimiters and keywords", () => {
    it("reads the structural delimiters", () => {
      expect(tokens("<<[]>>").map(t => t.type === "delimiter" && t.value)).toEqual([
        "<<",
        "[",
        "]",
        ">>",
      ]);
    });

    it("reads a lone > as >>", () => {
      expect(first("> ")).toEqual({ type: "delimiter", value: ">>", position: 0 });
    });

    it("reads regular-character runs as keywords", () => {
      expect(tokens("true obj R")).toEqual([
        { type: "keyword", value: "true", position: 0 },
        { type: "keyword", value: "obj", position: 5 },
        { type: "keyword", value: "R", position: 9 },
      ]);
    });

    it("reads stray delimiters as one-byte keywords", () => {
      expect(tokens("{})")).toEqual([
        { type: "keyword", value: "{", position: 0 },
        { type: "keyword", value: "}", position: 1 },
        { type: "keyword", value: ")", position: 2 },
      ]);
    });
  });
});
