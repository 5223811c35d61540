/**
 * Structural comparison of two syntax trees, ignoring metadata
 */

import type { Quoted, SourceParser } from "./parser.js";
import { blockValue, isCallTo } from "./parser.js";
import { ParseError } from "./errors.js";

export type Difference = [Quoted, Quoted];

export type EquivalenceResult =
  | { equivalent: true }
  | { equivalent: false; left: Quoted; right: Quoted };

function isNil(node: Quoted): boolean {
  return node.type === "atom" && node.value === "nil";
}

function isEmptyBlock(node: Quoted): boolean {
  return isCallTo(node, "__block__") && node.args.length === 0;
}

function listsNotEquivalent(left: Quoted[], right: Quoted[]): Difference | null {
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const difference = notEquivalent(left[i], right[i]);
    if (difference !== null) {
      return difference;
    }
  }
  if (left.length !== right.length) {
    const shared = Math.min(left.length, right.length);
    return [
      { type: "list", items: left.slice(shared) },
      { type: "list", items: right.slice(shared) },
    ];
  }
  return null;
}

/**
 * First pair of differing subtrees, or null when the trees match
 * A single-expression block is the expression and an empty block is nil.
 */
export function notEquivalent(left: Quoted, right: Quoted): Difference | null {
  const leftValue = blockValue(left);
  if (leftValue !== undefined) {
    return notEquivalent(leftValue, right);
  }
  const rightValue = blockValue(right);
  if (rightValue !== undefined) {
    return notEquivalent(left, rightValue);
  }
  if ((isEmptyBlock(left) && isNil(right)) || (isNil(left) && isEmptyBlock(right))) {
    return null;
  }

  switch (left.type) {
    case "list":
      return right.type === "list" ? listsNotEquivalent(left.items, right.items) : [left, right];

    case "pair":
      if (right.type !== "pair") {
        return [left, right];
      }
      return notEquivalent(left.left, right.left) ?? notEquivalent(left.right, right.right);

    case "var":
      return right.type === "var" && left.name === right.name && left.context === right.context
        ? null
        : [left, right];

    case "call": {
      if (right.type !== "call") {
        return [left, right];
      }
      if (typeof left.callee === "string" || typeof right.callee === "string") {
        if (left.callee !== right.callee) {
          return [left, right];
        }
      } else {
        const difference = notEquivalent(left.callee, right.callee);
        if (difference !== null) {
          return difference;
        }
      }
      return listsNotEquivalent(left.args, right.args);
    }

    default:
      return right.type === left.type && "value" in right && right.value === left.value
        ? null
        : [left, right];
  }
}

/**
 * Parse both sources and compare the trees
 */
export function equivalent(
  left: string,
  right: string,
  parser: SourceParser,
  file = "nofile",
): EquivalenceResult {
  const parse = (source: string): Quoted => {
    const result = parser.parse(source, { file, line: 1 });
    if (!result.ok) {
      throw new ParseError(result.error, file);
    }
    return result.forms;
  };

  const difference = notEquivalent(parse(left), parse(right));
  if (difference === null) {
    return { equivalent: true };
  }
  const [leftNode, rightNode] = difference;
  return { equivalent: false, left: leftNode, right: rightNode };
}
