/**
 * Tree-walking evaluator.
 *
 * Pure: the same tree and bindings always give a bit-identical result, and
 * nothing is shared between calls, so samples may be evaluated in any order.
 */

import type { Node } from "./ast";
import { BINARY_OPS, FUNCTIONS } from "./builtins";

/**
 * Values for the two free variables. A fixed shape rather than a name map,
 * since it is built for every sample.
 */
export interface Bindings {
  readonly x: number;
  readonly t: number;
}

export function evaluate(node: Node, bindings: Bindings): number {
  switch (node.tag) {
    case "literal":
      return node.value;

    case "variable":
      return bindings[node.name];

    case "unary":
      return -evaluate(node.operand, bindings);

    case "binary":
      return BINARY_OPS[node.op](evaluate(node.left, bindings), evaluate(node.right, bindings));

    case "call":
      return FUNCTIONS[node.fn](evaluate(node.arg, bindings));

    default: {
      const unreachable: never = node;
      throw new Error(`Unknown node: ${JSON.stringify(unreachable)}`);
    }
  }
}
