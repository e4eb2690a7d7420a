/**
 * Tests for the lexer.
 */
import { describe, it, expect } from "vitest";

import { tokenize, splitWord, isKeyword, LexError } from "../src/index";

function texts(source: string): string[] {
  return tokenize(source).map((tok) => tok.text);
}

describe("Lexer Tests", () => {
  it("tokenizes numbers", () => {
    const tokens = tokenize("42 3.14 .5 3.");
    expect(tokens.map((tok) => tok.kind)).toEqual(["Number", "Number", "Number", "Number"]);
    expect(tokens.map((tok) => tok.text)).toEqual(["42", "3.14", ".5", "3."]);
    expect(tokens.map((tok) => tok.position)).toEqual([0, 3, 8, 11]);
  });

  it("ends a number at a second decimal point", () => {
    expect(texts("1.2.3")).toEqual(["1.2", ".3"]);
  });

  it("tokenizes operators and parentheses", () => {
    const tokens = tokenize("(+-*/^%)");
    expect(tokens.map((tok) => tok.kind)).toEqual([
      "LParen",
      "Operator",
      "Operator",
      "Operator",
      "Operator",
      "Operator",
      "Operator",
      "RParen",
    ]);
    expect(tokens.map((tok) => tok.text).join("")).toBe("(+-*/^%)");
  });

  it("skips whitespace but keeps source positions", () => {
    const tokens = tokenize(" x\t+\n 1 ");
    expect(tokens).toEqual([
      { kind: "Identifier", text: "x", position: 1 },
      { kind: "Operator", text: "+", position: 3 },
      { kind: "Number", text: "1", position: 6 },
    ]);
  });

  it("returns no tokens for empty or blank input", () => {
    expect(tokenize("")).toEqual([]);
    expect(tokenize("   ")).toEqual([]);
  });

  it("recognizes keywords", () => {
    expect(isKeyword("sinh")).toBe(true);
    expect(isKeyword("pi")).toBe(true);
    expect(isKeyword("t")).toBe(true);
    expect(isKeyword("y")).toBe(false);
    expect(isKeyword("Sin")).toBe(false);
  });
});

describe("Identifier Splitting", () => {
  it("prefers the longest keyword", () => {
    expect(texts("sinh(x)")).toEqual(["sinh", "(", "x", ")"]);
    expect(texts("asinh(x)")).toEqual(["asinh", "(", "x", ")"]);
  });

  it("splits runs of adjacent names", () => {
    const tokens = tokenize("pix");
    expect(tokens).toEqual([
      { kind: "Identifier", text: "pi", position: 0 },
      { kind: "Identifier", text: "x", position: 2 },
    ]);
    expect(texts("sinx")).toEqual(["sin", "x"]);
  });

  it("keeps an unsplittable run whole", () => {
    expect(splitWord("foo", 3)).toEqual([{ kind: "Identifier", text: "foo", position: 3 }]);
    expect(splitWord("xy", 0)).toEqual([{ kind: "Identifier", text: "xy", position: 0 }]);
  });

  it("is case-sensitive", () => {
    expect(texts("SIN")).toEqual(["SIN"]);
  });
});

describe("Lex Errors", () => {
  it("rejects unknown characters with their position", () => {
    expect(() => tokenize("x + $")).toThrow(LexError);
    try {
      tokenize("x + $");
    } catch (e) {
      expect(e).toBeInstanceOf(LexError);
      if (e instanceof LexError) {
        expect(e.position).toBe(4);
        expect(e.char).toBe("$");
        expect(e.message).toBe("Unexpected character '$' at position 4");
      }
    }
  });

  it("rejects a lone decimal point", () => {
    expect(() => tokenize("1 + .")).toThrow("Unexpected character '.' at position 4");
  });

  it("rejects exponent notation", () => {
    // "1e5" lexes as 1, e, 5; the comma in "1,5" has no token
    expect(texts("1e5")).toEqual(["1", "e", "5"]);
    expect(() => tokenize("1,5")).toThrow(LexError);
  });
});
