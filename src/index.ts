/**
 * Equation parsing and evaluation for plotting y = f(x, t).
 */

// Expression handle
export { Expression, compile, parse } from "./expression";
export type { ParseResult } from "./expression";

// Errors
export { EquationError, LexError, ParseError, END_OF_INPUT, formatError, formatDiagnostic } from "./errors";

// Lexer
export { Lexer, tokenize, splitWord, isKeyword, KEYWORDS } from "./lexer";
export type { Token, TokenKind } from "./lexer";

// Parser
export { Parser, parseTree, DEFAULT_MAX_DEPTH } from "./parser";
export type { ParserOptions } from "./parser";

// Tree
export {
  VARIABLE_NAMES,
  CONSTANT_NAMES,
  CONSTANTS,
  FUNCTION_NAMES,
  isVariableName,
  isConstantName,
  isFunctionName,
  lit,
  constant,
  variable,
  neg,
  binary,
  add,
  sub,
  mul,
  div,
  pow,
  mod,
  call,
  variablesOf,
  formatNode,
} from "./ast";
export type {
  Node,
  LiteralNode,
  VariableNode,
  UnaryNode,
  BinaryNode,
  CallNode,
  UnaryOp,
  BinaryOp,
  VariableName,
  ConstantName,
  FunctionName,
} from "./ast";

// Evaluation
export { evaluate } from "./evaluate";
export type { Bindings } from "./evaluate";
export { BINARY_OPS, FUNCTIONS, naturalLog, power, roundHalfEven, sign } from "./builtins";

// Plotting
export { Viewport, parseInterval } from "./viewport";
export type { Interval, Screen } from "./viewport";
export { sampleCurve, gridLines, savePoint, FAR_SAMPLE_HEIGHTS, MAX_GRID_LINES } from "./sample";
export type { Point, Segment, SampleOptions, GridLines, SavedPoint } from "./sample";
export { riemannSum } from "./riemann";
export { Clock } from "./clock";
export { renderSvg, formatValue } from "./svg";
export type { RenderOptions } from "./svg";
