/**
 * Parser - Recursive descent parser for equations in x and t.
 *
 * Grammar (lowest to highest precedence):
 *
 * expr    = term (("+" | "-") term)*           // left associative
 * term    = unary (("*" | "/" | "%") unary)*   // left associative
 * unary   = "-" unary | power
 * power   = primary ("^" unary)?               // right associative
 * primary = NUMBER | CONSTANT | VARIABLE
 *         | FUNCTION "(" expr ")"
 *         | "(" expr ")"
 *
 * A leading minus covers a whole power, so `-x^2` is `-(x^2)`, while the
 * exponent may itself be negated: `2^-3` is `2^(-3)`.
 *
 * Every construct that adds a level to the tree (a group, a call, a minus,
 * an exponent, each further operand of a `+ - * / %` chain) counts toward
 * `maxDepth`, so the height of any tree it returns is bounded.
 *
 * One token of lookahead, no backtracking, and the first error aborts.
 */

import { type Token, type TokenKind, isKeyword, tokenize } from "./lexer";
import { END_OF_INPUT, ParseError } from "./errors";
import {
  type Node,
  type BinaryOp,
  binary,
  call,
  constant,
  isConstantName,
  isFunctionName,
  isVariableName,
  lit,
  neg,
  variable,
} from "./ast";

// ============================================================================
// Options
// ============================================================================

export interface ParserOptions {
  /**
   * Deepest nesting of parentheses, function arguments, unary minus,
   * exponents and binary operator chains before parsing gives up
   * (default: 256).
   */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

const ADDITIVE: Record<string, BinaryOp> = { "+": "Add", "-": "Sub" };
const MULTIPLICATIVE: Record<string, BinaryOp> = { "*": "Mul", "/": "Div", "%": "Mod" };

// ============================================================================
// Parser Class
// ============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private depth: number = 0;
  /** Parentheses currently open, for telling a stray ')' apart. */
  private groups: number = 0;
  private readonly end: number;
  private readonly maxDepth: number;

  /**
   * @param end - position reported for errors at the end of input, normally
   *   the length of the source text
   */
  constructor(tokens: Token[], end: number, options: ParserOptions = {}) {
    this.tokens = tokens;
    this.end = end;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parse(): Node {
    const node = this.parseExpr();

    const tok = this.peek();
    if (tok !== undefined) {
      if (tok.kind === "RParen") {
        throw this.error(tok, "unexpected ')'");
      }
      if (tok.kind === "Identifier" && !isKeyword(tok.text)) {
        throw this.error(tok, "unknown identifier");
      }
      throw this.error(tok, "unexpected token");
    }

    return node;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private advance(): Token | undefined {
    const tok = this.peek();
    if (tok !== undefined) {
      this.pos++;
    }
    return tok;
  }

  private matchSymbol(symbol: string): Token | undefined {
    const tok = this.peek();
    if (tok?.kind === "Operator" && tok.text === symbol) {
      this.pos++;
      return tok;
    }
    return undefined;
  }

  private expect(kind: TokenKind, expected: string): Token {
    const tok = this.peek();
    if (tok?.kind === kind) {
      this.pos++;
      return tok;
    }
    throw this.error(tok, expected);
  }

  private error(tok: Token | undefined, expected: string): ParseError {
    return tok === undefined
      ? new ParseError(this.end, expected, END_OF_INPUT)
      : new ParseError(tok.position, expected, tok.text);
  }

  /**
   * Run a production one nesting level deeper. `at` is the token that opens
   * the level and is blamed when the limit is exceeded.
   */
  private nested<T>(at: Token, parse: () => T): T {
    this.deepen(at);
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private deepen(at: Token): void {
    if (this.depth >= this.maxDepth) {
      throw this.error(at, "expression too deeply nested");
    }
    this.depth++;
  }

  /** A parenthesized production: `(` already consumed, `)` expected after. */
  private group(open: Token, parse: () => Node): Node {
    return this.nested(open, () => {
      this.groups++;
      const inner = parse();
      this.expect("RParen", "expected ')'");
      this.groups--;
      return inner;
    });
  }

  // ==========================================================================
  // Expression Parsing
  // ==========================================================================

  private parseExpr(): Node {
    return this.parseChain(ADDITIVE, () => this.parseTerm());
  }

  private parseTerm(): Node {
    return this.parseChain(MULTIPLICATIVE, () => this.parseUnary());
  }

  /**
   * A left-associative run of operators from `table`. Each operator makes the
   * tree one level taller, so each one takes a nesting level until the run ends.
   */
  private parseChain(table: Record<string, BinaryOp>, parseOperand: () => Node): Node {
    let left = parseOperand();
    const depth = this.depth;

    try {
      for (let tok = this.peek(); tok?.kind === "Operator" && Object.hasOwn(table, tok.text); tok = this.peek()) {
        this.deepen(tok);
        this.pos++;
        left = binary(table[tok.text], left, parseOperand());
      }
    } finally {
      this.depth = depth;
    }

    return left;
  }

  private parseUnary(): Node {
    const minus = this.matchSymbol("-");
    if (minus !== undefined) {
      return this.nested(minus, () => neg(this.parseUnary()));
    }
    return this.parsePower();
  }

  private parsePower(): Node {
    const base = this.parsePrimary();

    const caret = this.matchSymbol("^");
    if (caret !== undefined) {
      // The exponent re-enters unary, which reaches power again: right associative.
      return this.nested(caret, () => binary("Pow", base, this.parseUnary()));
    }

    return base;
  }

  private parsePrimary(): Node {
    const tok = this.peek();

    if (tok === undefined) {
      throw this.error(tok, "expected expression");
    }

    switch (tok.kind) {
      case "Number":
        this.advance();
        return lit(Number(tok.text));

      case "Identifier":
        return this.parseIdentifier(tok);

      case "LParen":
        this.advance();
        return this.group(tok, () => this.parseExpr());

      case "RParen":
        throw this.error(tok, this.groups === 0 ? "unexpected ')'" : "expected expression");

      default:
        throw this.error(tok, "expected expression");
    }
  }

  private parseIdentifier(tok: Token): Node {
    const name = tok.text;

    if (isVariableName(name)) {
      this.advance();
      return variable(name);
    }

    if (isConstantName(name)) {
      this.advance();
      return constant(name);
    }

    if (isFunctionName(name)) {
      this.advance();
      const open = this.expect("LParen", "expected '(' after function name");
      return this.group(open, () => call(name, this.parseExpr()));
    }

    throw this.error(tok, "unknown identifier");
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Parse equation text into a tree. Throws LexError or ParseError.
 */
export function parseTree(source: string, options: ParserOptions = {}): Node {
  const tokens = tokenize(source);
  return new Parser(tokens, source.length, options).parse();
}
