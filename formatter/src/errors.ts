/**
 * Errors raised while formatting
 */

import type { ParseFailure } from "./parser.js";

/**
 * The source could not be parsed
 * `loc` follows the shape Prettier reports for syntax errors.
 */
export class ParseError extends Error {
  readonly file: string;
  readonly line: number;
  readonly column: number | undefined;
  readonly token: string;
  readonly loc: { start: { line: number; column: number } };

  constructor(failure: ParseFailure, file: string) {
    super(`${file}:${failure.line}: ${failure.message}${failure.token}`);
    this.name = "ParseError";
    this.file = file;
    this.line = failure.line;
    this.column = failure.column;
    this.token = failure.token;
    this.loc = { start: { line: failure.line, column: failure.column ?? 1 } };
  }
}

/**
 * The tree handed to the formatter breaks a guarantee the parser makes
 */
export class FormatterInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatterInvariantError";
  }
}
