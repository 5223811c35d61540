/**
 * Parser boundary for the Elixir formatter
 * Lexing and parsing happen outside this package; a SourceParser hands
 * over quoted forms with formatter metadata plus the captured comments.
 */

import { formatComment } from "./comments.js";

/** Smallest line a node can report */
export const MIN_LINE = 0;

/** Largest line a node can report */
export const MAX_LINE = 9_999_999;

/**
 * Layout hints recorded by the parser
 */
export type MetaFormat =
  | "charlist"
  | "listHeredoc"
  | "binHeredoc"
  | "keyword"
  | "block";

/**
 * Metadata attached to variables and calls
 */
export interface Meta {
  line?: number;
  endLine?: number;
  format?: MetaFormat;
  /** Opening delimiter of a sigil, e.g. `(` or `"""` */
  terminator?: string;
  /** The user put a newline after this token */
  eol?: boolean;
  /** Newlines that preceded this expression inside a block */
  newlines?: number;
  /** Source text of an integer or float literal */
  original?: string;
}

export interface AtomNode {
  type: "atom";
  value: string;
}

export interface IntegerNode {
  type: "integer";
  value: bigint;
}

export interface FloatNode {
  type: "float";
  value: number;
}

/**
 * String contents as written in source, escapes untouched, except that
 * an escaped delimiter is handed over unescaped.
 */
export interface StringNode {
  type: "string";
  value: string;
}

export interface ListNode {
  type: "list";
  items: Quoted[];
}

/** Two element tuple: keyword entries, map entries, `{a, b}` */
export interface PairNode {
  type: "pair";
  left: Quoted;
  right: Quoted;
}

export interface VarNode {
  type: "var";
  name: string;
  meta: Meta;
  context: string | null;
}

/**
 * A call. The callee is an operator, special form or local name, or a
 * node for remote and anonymous calls.
 */
export interface CallNode {
  type: "call";
  callee: string | Quoted;
  meta: Meta;
  args: Quoted[];
}

export type Quoted =
  | AtomNode
  | IntegerNode
  | FloatNode
  | StringNode
  | ListNode
  | PairNode
  | VarNode
  | CallNode;

/**
 * Comment as captured during tokenization
 */
export interface SourceComment {
  line: number;
  /** Newlines before the comment, or null when code precedes it on its line */
  previousEol: number | null;
  /** Newlines after the comment */
  nextEol: number;
  text: string;
}

/**
 * Token right before a comment
 */
export interface PrecedingToken {
  kind: "eol" | "," | ";" | "other";
  newlines: number;
}

/**
 * Parse failure reported by the external parser
 */
export interface ParseFailure {
  line: number;
  column?: number;
  message: string;
  token: string;
}

export type ParseResult =
  | { ok: true; forms: Quoted; comments: SourceComment[] }
  | { ok: false; error: ParseFailure };

export interface ParseOptions {
  file: string;
  line: number;
}

/**
 * Turns source text into quoted forms and comments
 */
export interface SourceParser {
  parse(source: string, options: ParseOptions): ParseResult;
}

/**
 * Build a comment entry from the tokenizer's view of it
 * @param preceding Token before the comment, undefined at the start of input
 * @param rest Source text following the comment
 */
export function captureComment(
  line: number,
  preceding: PrecedingToken | undefined,
  text: string,
  rest: string,
): SourceComment {
  return {
    line,
    previousEol: previousEol(preceding),
    nextEol: nextEol(rest),
    text: formatComment(text),
  };
}

function previousEol(token: PrecedingToken | undefined): number | null {
  if (token === undefined) {
    return 1;
  }
  if (token.kind !== "other" && token.newlines > 0) {
    return token.newlines;
  }
  return null;
}

/**
 * Count newlines at the start of `rest`, skipping spaces and tabs
 */
export function nextEol(rest: string): number {
  let count = 0;
  let i = 0;
  while (i < rest.length) {
    const char = rest[i];
    if (char === " " || char === "\t") {
      i++;
    } else if (char === "\n") {
      count++;
      i++;
    } else if (char === "\r" && rest[i + 1] === "\n") {
      count++;
      i += 2;
    } else {
      break;
    }
  }
  return count;
}

/**
 * Metadata of a node, empty for literals
 */
export function metaOf(node: Quoted): Meta {
  return node.type === "call" || node.type === "var" ? node.meta : {};
}

/**
 * Start line from metadata, MAX_LINE when unknown
 */
export function lineOf(meta: Meta): number {
  return meta.line ?? MAX_LINE;
}

/**
 * End line from metadata, MIN_LINE when unknown
 */
export function endLineOf(meta: Meta): number {
  return meta.endLine ?? MIN_LINE;
}

/**
 * Walk the tree and call visitor for each node
 */
function walkQuoted(
  node: Quoted,
  visitor: (node: Quoted, parent: Quoted | null) => void,
  parent: Quoted | null = null,
): void {
  visitor(node, parent);
  for (const child of childrenOf(node)) {
    walkQuoted(child, visitor, node);
  }
}

function childrenOf(node: Quoted): Quoted[] {
  switch (node.type) {
    case "list":
      return node.items;
    case "pair":
      return [node.left, node.right];
    case "call":
      return typeof node.callee === "string"
        ? node.args
        : [node.callee, ...node.args];
    default:
      return [];
  }
}

/**
 * Smallest and largest `line` found in a subtree
 * Returns [MAX_LINE, MIN_LINE] when no node carries a line.
 */
export function traverseLine(node: Quoted): [number, number] {
  let min = MAX_LINE;
  let max = MIN_LINE;
  walkQuoted(node, (current) => {
    const { line } = metaOf(current);
    if (line !== undefined) {
      min = Math.min(line, min);
      max = Math.max(line, max);
    }
  });
  return [min, max];
}

/**
 * Check for a call with a plain name
 */
export function isCallTo(node: Quoted, name: string): node is CallNode {
  return node.type === "call" && node.callee === name;
}

/**
 * Value of `{:__block__, _, [value]}`
 */
export function blockValue(node: Quoted): Quoted | undefined {
  if (isCallTo(node, "__block__") && node.args.length === 1) {
    return node.args[0];
  }
  return undefined;
}

/**
 * Check for a module atom such as `Kernel`
 */
export function isModuleAtom(node: Quoted, name: string): boolean {
  return node.type === "atom" && node.value === `Elixir.${name}`;
}
