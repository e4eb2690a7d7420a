/**
 * Errors raised while turning equation text into a tree.
 *
 * Evaluation has no error kind: singularities and domain violations come back
 * as NaN or Infinity.
 */

// ============================================================================
// Error Classes
// ============================================================================

export abstract class EquationError extends Error {
  /** 0-based column of the offending character or token. */
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.position = position;
  }
}

export class LexError extends EquationError {
  readonly char: string;

  constructor(position: number, char: string) {
    super(`Unexpected character '${char}' at position ${position}`, position);
    this.char = char;
    this.name = "LexError";
  }
}

export class ParseError extends EquationError {
  /** What the parser wanted, e.g. "expected ')'" or "unknown identifier". */
  readonly expected: string;
  /** The offending token text, or "end of input". */
  readonly found: string;

  constructor(position: number, expected: string, found: string) {
    super(`${capitalize(expected)} at position ${position}, found ${quote(found)}`, position);
    this.expected = expected;
    this.found = found;
    this.name = "ParseError";
  }
}

export const END_OF_INPUT = "end of input";

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function quote(found: string): string {
  return found === END_OF_INPUT ? found : `'${found}'`;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Label an error for display, the way the CLI and REPL report it.
 */
export function formatError(error: unknown): string {
  if (error instanceof LexError) {
    return `Lex error: ${error.message}`;
  }
  if (error instanceof ParseError) {
    return `Parse error: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Unknown error: ${String(error)}`;
}

/**
 * Render an error with the equation and a caret under the offending column:
 *
 *   Parse error: Expected ')' at position 4, found end of input
 *     (1+2
 *         ^
 */
export function formatDiagnostic(error: EquationError, source: string): string {
  const line = source.replace(/[\t\r\n]/g, " ");
  const column = Math.min(Math.max(error.position, 0), line.length);
  return [formatError(error), `  ${line}`, `  ${" ".repeat(column)}^`].join("\n");
}
