/**
 * Prettier Plugin for Elixir
 * Parsing is delegated to a SourceParser supplied by the host
 */

import type {
  AstPath,
  Parser,
  ParserOptions,
  Plugin,
  Printer,
  SupportLanguage,
  SupportOption,
} from "prettier";
import { doc } from "prettier";
import { ParseError } from "./errors.js";
import { formsToAlgebra } from "./format.js";
import type { Quoted, SourceComment, SourceParser } from "./parser.js";
import type { FormatOptions } from "./state.js";
import { DEFAULT_PRINT_WIDTH, parseLocalsWithoutParens } from "./state.js";

const { hardline } = doc.builders;

/**
 * Whole file as handed from the parser to the printer
 * Comments live under `sourceComments` so Prettier does not attach them.
 */
export interface ElixirRoot {
  type: "root";
  forms: Quoted;
  sourceComments: SourceComment[];
  file: string;
  end: number;
}

// Language definition
const languages: SupportLanguage[] = [
  {
    name: "Elixir",
    parsers: ["elixir"],
    extensions: [".ex", ".exs"],
    vscodeLanguageIds: ["elixir"],
  },
];

// Plugin options
const options: Record<string, SupportOption> = {
  elixirLocalsWithoutParens: {
    type: "string",
    category: "Elixir",
    default: "",
    description: "Extra local calls printed without parens, e.g. `plug/2, field/*`.",
  },
  elixirRenameDeprecatedAt: {
    type: "string",
    category: "Elixir",
    default: "",
    description: "Rename deprecated functions that have a replacement as of this Elixir version.",
  },
};

function stringOption(options: object, key: string): string | undefined {
  const value: unknown = Reflect.get(options, key);
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Formatter options from Prettier's resolved options
 */
export function formatOptionsOf(options: ParserOptions<ElixirRoot>): FormatOptions {
  const locals = stringOption(options, "elixirLocalsWithoutParens");
  return {
    localsWithoutParens: locals === undefined ? [] : parseLocalsWithoutParens(locals),
    renameDeprecatedAt: stringOption(options, "elixirRenameDeprecatedAt"),
    file: stringOption(options, "filepath"),
    printWidth: options.printWidth,
  };
}

/**
 * Build the plugin around a parser for Elixir source
 */
export function createPlugin(sourceParser: SourceParser): Plugin<ElixirRoot> {
  const parsers: Record<string, Parser<ElixirRoot>> = {
    elixir: {
      parse(text: string, parserOptions: ParserOptions<ElixirRoot>): ElixirRoot {
        const file = stringOption(parserOptions, "filepath") ?? "nofile";
        const result = sourceParser.parse(text, { file, line: 1 });
        if (!result.ok) {
          throw new ParseError(result.error, file);
        }
        return {
          type: "root",
          forms: result.forms,
          sourceComments: result.comments,
          file,
          end: text.length,
        };
      },
      astFormat: "elixir-quoted",
      locStart(): number {
        return 0;
      },
      locEnd(node: ElixirRoot): number {
        return node.end;
      },
    },
  };

  const printers: Record<string, Printer<ElixirRoot>> = {
    "elixir-quoted": {
      print(path: AstPath<ElixirRoot>, printOptions: ParserOptions<ElixirRoot>) {
        const { forms, sourceComments } = path.node;
        return [formsToAlgebra(forms, sourceComments, formatOptionsOf(printOptions)), hardline];
      },
    },
  };

  return {
    languages,
    parsers,
    printers,
    options,
    defaultOptions: { printWidth: DEFAULT_PRINT_WIDTH },
  };
}

export { languages, options };
export { ParseError, FormatterInvariantError } from "./errors.js";
export { equivalent, notEquivalent } from "./equivalence.js";
export type { Difference, EquivalenceResult } from "./equivalence.js";
export { format, formsToAlgebra, toAlgebra, toAlgebraOrThrow } from "./format.js";
export type { ToAlgebraResult } from "./format.js";
export { captureComment, nextEol } from "./parser.js";
export type {
  Meta,
  MetaFormat,
  ParseFailure,
  ParseOptions,
  ParseResult,
  PrecedingToken,
  Quoted,
  SourceComment,
  SourceParser,
} from "./parser.js";
export type { FormatOptions, LocalArity } from "./state.js";
