/**
 * Expression tree for equations in x and t.
 *
 * Nodes are created through the constructors below and frozen; a tree is
 * never mutated after parsing, so subtrees may be shared.
 */

// ============================================================================
// Vocabulary
// ============================================================================

export const VARIABLE_NAMES = ["x", "t"] as const;
export type VariableName = (typeof VARIABLE_NAMES)[number];

export const CONSTANT_NAMES = ["pi", "e", "g"] as const;
export type ConstantName = (typeof CONSTANT_NAMES)[number];

export const CONSTANTS: Readonly<Record<ConstantName, number>> = {
  pi: Math.PI,
  e: Math.E,
  g: 9.81,
};

export const FUNCTION_NAMES = [
  "sin",
  "cos",
  "tan",
  "asin",
  "acos",
  "atan",
  "sinh",
  "cosh",
  "tanh",
  "asinh",
  "acosh",
  "atanh",
  "rad",
  "deg",
  "log",
  "abs",
  "round",
  "sign",
] as const;
export type FunctionName = (typeof FUNCTION_NAMES)[number];

export function isVariableName(name: string): name is VariableName {
  return VARIABLE_NAMES.some((v) => v === name);
}

export function isConstantName(name: string): name is ConstantName {
  return CONSTANT_NAMES.some((c) => c === name);
}

export function isFunctionName(name: string): name is FunctionName {
  return FUNCTION_NAMES.some((f) => f === name);
}

// ============================================================================
// Node Types
// ============================================================================

export type Node = LiteralNode | VariableNode | UnaryNode | BinaryNode | CallNode;

export interface LiteralNode {
  readonly tag: "literal";
  readonly value: number;
  /** Set when the literal came from a named constant such as `pi`. */
  readonly constant?: ConstantName;
}

export interface VariableNode {
  readonly tag: "variable";
  readonly name: VariableName;
}

export type UnaryOp = "Neg";

export interface UnaryNode {
  readonly tag: "unary";
  readonly op: UnaryOp;
  readonly operand: Node;
}

export type BinaryOp = "Add" | "Sub" | "Mul" | "Div" | "Pow" | "Mod";

export interface BinaryNode {
  readonly tag: "binary";
  readonly op: BinaryOp;
  readonly left: Node;
  readonly right: Node;
}

export interface CallNode {
  readonly tag: "call";
  readonly fn: FunctionName;
  readonly arg: Node;
}

// ============================================================================
// Constructors
// ============================================================================

export const lit = (value: number): LiteralNode => Object.freeze({ tag: "literal", value });

export const constant = (name: ConstantName): LiteralNode =>
  Object.freeze({ tag: "literal", value: CONSTANTS[name], constant: name });

export const variable = (name: VariableName): VariableNode => Object.freeze({ tag: "variable", name });

export const neg = (operand: Node): UnaryNode => Object.freeze({ tag: "unary", op: "Neg", operand });

export const binary = (op: BinaryOp, left: Node, right: Node): BinaryNode =>
  Object.freeze({ tag: "binary", op, left, right });

export const add = (left: Node, right: Node) => binary("Add", left, right);
export const sub = (left: Node, right: Node) => binary("Sub", left, right);
export const mul = (left: Node, right: Node) => binary("Mul", left, right);
export const div = (left: Node, right: Node) => binary("Div", left, right);
export const pow = (left: Node, right: Node) => binary("Pow", left, right);
export const mod = (left: Node, right: Node) => binary("Mod", left, right);

export const call = (fn: FunctionName, arg: Node): CallNode => Object.freeze({ tag: "call", fn, arg });

// ============================================================================
// Queries
// ============================================================================

/**
 * Variables the tree reads. A curve whose tree never reads `t` does not
 * need redrawing as time advances.
 */
export function variablesOf(node: Node): Set<VariableName> {
  const found = new Set<VariableName>();
  const visit = (n: Node): void => {
    switch (n.tag) {
      case "literal":
        return;
      case "variable":
        found.add(n.name);
        return;
      case "unary":
        visit(n.operand);
        return;
      case "binary":
        visit(n.left);
        visit(n.right);
        return;
      case "call":
        visit(n.arg);
        return;
    }
  };
  visit(node);
  return found;
}

// ============================================================================
// Pretty Printing
// ============================================================================

// Binding strength, higher binds tighter. Mirrors the parser's productions:
// expr (additive) < term (multiplicative) < unary < power < primary.
const PREC = {
  ADDITIVE: 1,
  MULTIPLICATIVE: 2,
  UNARY: 3,
  POWER: 4,
  PRIMARY: 5,
} as const;

const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  Add: "+",
  Sub: "-",
  Mul: "*",
  Div: "/",
  Mod: "%",
  Pow: "^",
};

function precedence(node: Node): number {
  switch (node.tag) {
    case "literal":
      return node.value < 0 || Object.is(node.value, -0) ? PREC.UNARY : PREC.PRIMARY;
    case "variable":
    case "call":
      return PREC.PRIMARY;
    case "unary":
      return PREC.UNARY;
    case "binary":
      switch (node.op) {
        case "Add":
        case "Sub":
          return PREC.ADDITIVE;
        case "Mul":
        case "Div":
        case "Mod":
          return PREC.MULTIPLICATIVE;
        case "Pow":
          return PREC.POWER;
      }
  }
}

/**
 * Print a tree back to equation text with the fewest parentheses that parse
 * to the same tree. Constants print by name.
 */
export function formatNode(node: Node): string {
  switch (node.tag) {
    case "literal":
      return node.constant ?? formatLiteral(node.value);

    case "variable":
      return node.name;

    case "unary":
      return `-${formatOperand(node.operand, PREC.UNARY)}`;

    case "binary": {
      const symbol = BINARY_SYMBOLS[node.op];
      if (node.op === "Pow") {
        // Right associative: the base must be primary, the exponent may be any unary.
        return `${formatOperand(node.left, PREC.PRIMARY)}^${formatOperand(node.right, PREC.UNARY)}`;
      }
      const level = precedence(node);
      // Left associative: an equal-precedence right operand needs parentheses.
      return `${formatOperand(node.left, level)} ${symbol} ${formatOperand(node.right, level + 1)}`;
    }

    case "call":
      return `${node.fn}(${formatNode(node.arg)})`;
  }
}

function formatOperand(node: Node, minimum: number): string {
  const text = formatNode(node);
  return precedence(node) < minimum ? `(${text})` : text;
}

function formatLiteral(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  const magnitude = Math.abs(value);
  let digits = String(magnitude);
  if (digits.includes("e")) {
    // No exponent notation in the grammar; spell the number out.
    digits = Number.isInteger(magnitude)
      ? BigInt(magnitude).toString()
      : magnitude.toFixed(100).replace(/0+$/, "");
  }
  return value < 0 || Object.is(value, -0) ? `-${digits}` : digits;
}
