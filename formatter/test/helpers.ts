/**
 * Builders for quoted forms, and a parser stand-in that hands them over
 */

import type {
  CallNode,
  Meta,
  PairNode,
  ParseFailure,
  Quoted,
  SourceComment,
  SourceParser,
  VarNode,
} from "../src/parser.js";
import { format } from "../src/format.js";
import type { FormatOptions } from "../src/state.js";

export function atom(value: string): Quoted {
  return { type: "atom", value };
}

export function variable(name: string, meta: Meta = {}): VarNode {
  return { type: "var", name, meta, context: null };
}

export function call(callee: string | Quoted, meta: Meta, args: Quoted[]): CallNode {
  return { type: "call", callee, meta, args };
}

export function block(meta: Meta, args: Quoted[]): CallNode {
  return call("__block__", meta, args);
}

/** Integer literal as the parser wraps it */
export function int(value: number | bigint, line = 1, original = String(value)): CallNode {
  return block({ line, original }, [{ type: "integer", value: BigInt(value) }]);
}

export function float(value: number, original: string, line = 1): CallNode {
  return block({ line, original }, [{ type: "float", value }]);
}

export function str(value: string, meta: Meta = { line: 1 }): CallNode {
  return block(meta, [{ type: "string", value }]);
}

export function sym(value: string, line = 1): CallNode {
  return block({ line }, [atom(value)]);
}

export function list(items: Quoted[], meta: Meta = { line: 1 }): CallNode {
  return block(meta, [{ type: "list", items }]);
}

export function tuple(left: Quoted, right: Quoted, meta: Meta = { line: 1 }): CallNode {
  return block(meta, [{ type: "pair", left, right }]);
}

export function pair(left: Quoted, right: Quoted): PairNode {
  return { type: "pair", left, right };
}

/** `key: value` */
export function kw(key: string, value: Quoted, line = 1): PairNode {
  return pair(block({ line, format: "keyword" }, [atom(key)]), value);
}

/** Keyword list as the last call argument */
export function keywords(...pairs: PairNode[]): Quoted {
  return { type: "list", items: pairs };
}

export function aliases(...names: string[]): CallNode {
  return call("__aliases__", { line: 1 }, names.map(atom));
}

export function dot(target: Quoted, fun: string): CallNode {
  return call(".", { line: 1 }, [target, atom(fun)]);
}

export function remote(target: Quoted, fun: string, args: Quoted[], meta: Meta = { line: 1 }): CallNode {
  return call(dot(target, fun), meta, args);
}

/** `do ... end` with its sections, e.g. [["do", 1, body], ["else", 3, body]] */
export function doEnd(endLine: number, ...sections: Array<[string, number, Quoted]>): Quoted {
  return {
    type: "list",
    items: sections.map(([key, line, value], i) =>
      pair(
        block(i === 0 ? { line, endLine, format: "block" } : { line }, [atom(key)]),
        value,
      ),
    ),
  };
}

/** `args -> body` */
export function clause(args: Quoted[], body: Quoted, meta: Meta = { line: 1 }): CallNode {
  return call("->", meta, [{ type: "list", items: args }, body]);
}

/** `#{expr}` inside a string */
export function interpolation(expr: Quoted, line = 1): CallNode {
  const toString = call(dot(atom("Elixir.Kernel"), "to_string"), { line, endLine: line }, [expr]);
  return call("::", { line }, [toString, variable("binary")]);
}

export function comment(
  line: number,
  text: string,
  previousEol: number | null = 1,
  nextEol = 1,
): SourceComment {
  return { line, previousEol, nextEol, text };
}

/**
 * Parser stand-in returning the given forms whatever the source
 */
export function fakeParser(forms: Quoted, comments: SourceComment[] = []): SourceParser {
  return {
    parse: () => ({ ok: true, forms, comments }),
  };
}

export function failingParser(error: ParseFailure): SourceParser {
  return {
    parse: () => ({ ok: false, error }),
  };
}

/**
 * Format forms as if they came from a source file
 */
export function print(
  forms: Quoted,
  options: FormatOptions = {},
  comments: SourceComment[] = [],
): string {
  return format("", fakeParser(forms, comments), options);
}
