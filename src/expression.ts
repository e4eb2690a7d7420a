/**
 * Expression - the handle a plotter holds on to.
 *
 * Built once from equation text, then evaluated for every sample of every
 * frame. Replaced wholesale when the text changes.
 */

import { type Node, type VariableName, formatNode, variablesOf } from "./ast";
import { evaluate } from "./evaluate";
import { LexError, ParseError } from "./errors";
import { type ParserOptions, parseTree } from "./parser";

export class Expression {
  readonly source: string;
  readonly root: Node;
  private readonly variables: ReadonlySet<VariableName>;

  constructor(source: string, root: Node) {
    this.source = source;
    this.root = root;
    this.variables = variablesOf(root);
    Object.freeze(this);
  }

  /**
   * f(x, t). Never throws; asymptotes and domain violations come back as
   * ±Infinity or NaN for the caller to skip.
   */
  evaluate(x: number, t: number = 0): number {
    return evaluate(this.root, { x, t });
  }

  /** Whether the tree reads the given variable. */
  dependsOn(name: VariableName): boolean {
    return this.variables.has(name);
  }

  /** Canonical equation text for the tree. */
  toString(): string {
    return formatNode(this.root);
  }
}

// ============================================================================
// Parsing
// ============================================================================

export type ParseResult =
  | { ok: true; expression: Expression }
  | { ok: false; error: LexError | ParseError };

/**
 * Build an Expression, throwing LexError or ParseError on bad input.
 */
export function compile(source: string, options: ParserOptions = {}): Expression {
  return new Expression(source, parseTree(source, options));
}

/**
 * Build an Expression, reporting the first lexical or syntax error as a value.
 */
export function parse(source: string, options: ParserOptions = {}): ParseResult {
  try {
    return { ok: true, expression: compile(source, options) };
  } catch (error) {
    if (error instanceof LexError || error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
