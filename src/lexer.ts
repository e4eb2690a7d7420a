/**
 * Lexer - Splits equation text into tokens.
 */

import { CONSTANT_NAMES, FUNCTION_NAMES, VARIABLE_NAMES } from "./ast";
import { LexError } from "./errors";

// ============================================================================
// Token Types
// ============================================================================

export type TokenKind = "Number" | "Identifier" | "Operator" | "LParen" | "RParen";

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** 0-based column of the first character. */
  readonly position: number;
}

// ============================================================================
// Keywords
// ============================================================================

/** Every name the grammar knows: variables, constants and functions. */
export const KEYWORDS: readonly string[] = [...VARIABLE_NAMES, ...CONSTANT_NAMES, ...FUNCTION_NAMES];

export function isKeyword(text: string): boolean {
  return KEYWORDS.includes(text);
}

// ============================================================================
// Lexer Class
// ============================================================================

export class Lexer {
  private source: string;
  private pos: number = 0;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      const ch = this.peek();
      if (this.isDigit(ch) || (ch === "." && this.isDigit(this.peekNext()))) {
        tokens.push(this.readNumber());
      } else if (this.isAlpha(ch)) {
        tokens.push(...this.readWord());
      } else {
        tokens.push(this.readOperator());
      }
    }

    return tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos] ?? "";
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? "";
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.pos++;
      } else {
        break;
      }
    }
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
  }

  private readNumber(): Token {
    const start = this.pos;

    // Integer part (may be empty for ".5")
    while (this.isDigit(this.peek())) {
      this.pos++;
    }

    // At most one decimal point; a second one ends the literal
    if (this.peek() === ".") {
      this.pos++;
      while (this.isDigit(this.peek())) {
        this.pos++;
      }
    }

    return makeToken("Number", this.source.slice(start, this.pos), start);
  }

  private readWord(): Token[] {
    const start = this.pos;
    while (this.isAlpha(this.peek())) {
      this.pos++;
    }
    return splitWord(this.source.slice(start, this.pos), start);
  }

  private readOperator(): Token {
    const start = this.pos;
    const ch = this.peek();

    switch (ch) {
      case "+":
      case "-":
      case "*":
      case "/":
      case "^":
      case "%":
        this.pos++;
        return makeToken("Operator", ch, start);
      case "(":
        this.pos++;
        return makeToken("LParen", ch, start);
      case ")":
        this.pos++;
        return makeToken("RParen", ch, start);
      default:
        throw new LexError(start, String.fromCodePoint(this.source.codePointAt(start) ?? 0));
    }
  }
}

function makeToken(kind: TokenKind, text: string, position: number): Token {
  return { kind, text, position };
}

/**
 * Split a run of letters into keywords by greedy longest match, so `sinh`
 * wins over `sin` and `pix` becomes `pi`, `x`. A run that cannot be split
 * completely stays whole as one identifier for the parser to reject.
 */
export function splitWord(word: string, start: number): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < word.length) {
    const keyword = longestKeywordAt(word, offset);
    if (keyword === undefined) {
      return [makeToken("Identifier", word, start)];
    }
    tokens.push(makeToken("Identifier", keyword, start + offset));
    offset += keyword.length;
  }

  return tokens;
}

function longestKeywordAt(word: string, offset: number): string | undefined {
  let best: string | undefined;
  for (const keyword of KEYWORDS) {
    if (word.startsWith(keyword, offset) && (best === undefined || keyword.length > best.length)) {
      best = keyword;
    }
  }
  return best;
}

// ============================================================================
// Convenience Function
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
