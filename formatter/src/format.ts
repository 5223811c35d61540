/**
 * Entry points: source text to layout document and formatted text
 */

import type { Doc } from "prettier";
import { render } from "./algebra.js";
import { gatherComments } from "./comments.js";
import { FormatterInvariantError, ParseError } from "./errors.js";
import type { Quoted, SourceComment, SourceParser } from "./parser.js";
import { MAX_LINE, MIN_LINE } from "./parser.js";
import { blockToAlgebra } from "./printer.js";
import type { FormatOptions } from "./state.js";
import { createState, DEFAULT_PRINT_WIDTH } from "./state.js";

export type ToAlgebraResult =
  | { ok: true; doc: Doc }
  | { ok: false; error: ParseError };

function debugLog(options: FormatOptions, message: string): void {
  if (options.debug) {
    console.log(`[DEBUG] ${message}`);
  }
}

/**
 * Translate parsed forms and their comments into a document
 */
export function formsToAlgebra(
  forms: Quoted,
  comments: SourceComment[],
  options: FormatOptions = {},
): Doc {
  const gathered = gatherComments(comments);
  debugLog(
    options,
    `${comments.length} comments collected, ${gathered.length} after gathering`,
  );

  const state = createState(gathered, options);
  const doc = blockToAlgebra(forms, MIN_LINE, MAX_LINE, state);

  if (state.comments.length > 0) {
    const lines = state.comments.map((comment) => comment.line).join(", ");
    throw new FormatterInvariantError(`comments left unplaced on lines ${lines}`);
  }
  return doc;
}

/**
 * Parse `source` and translate it, reporting parse failures as a value
 */
export function toAlgebra(
  source: string,
  parser: SourceParser,
  options: FormatOptions = {},
): ToAlgebraResult {
  const file = options.file ?? "nofile";
  const line = options.line ?? 1;

  const result = parser.parse(source, { file, line });
  if (!result.ok) {
    debugLog(options, `parse failed at ${file}:${result.error.line}`);
    return { ok: false, error: new ParseError(result.error, file) };
  }

  const forms =
    result.forms.type === "call" && result.forms.callee === "__block__"
      ? result.forms.args.length
      : 1;
  debugLog(options, `${file}: ${forms} top-level forms`);

  return { ok: true, doc: formsToAlgebra(result.forms, result.comments, options) };
}

/**
 * Like toAlgebra, throwing the ParseError
 */
export function toAlgebraOrThrow(
  source: string,
  parser: SourceParser,
  options: FormatOptions = {},
): Doc {
  const result = toAlgebra(source, parser, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.doc;
}

/**
 * Format Elixir source, without a trailing newline
 */
export function format(
  source: string,
  parser: SourceParser,
  options: FormatOptions = {},
): string {
  const doc = toAlgebraOrThrow(source, parser, options);
  const printWidth = options.printWidth ?? DEFAULT_PRINT_WIDTH;
  const formatted = render(doc, printWidth);
  debugLog(options, `rendered ${formatted.split("\n").length} lines at width ${printWidth}`);
  return formatted;
}
