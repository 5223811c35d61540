import { describe, expect, test } from "vitest";
import type { Quoted } from "../src/parser.js";
import type { FormatOptions } from "../src/state.js";
import {
  aliases,
  atom,
  block,
  call,
  clause,
  doEnd,
  dot,
  float,
  int,
  interpolation,
  keywords,
  kw,
  list,
  pair,
  print,
  remote,
  str,
  sym,
  tuple,
  variable,
} from "./helpers.js";

const a = variable("a");
const b = variable("b");
const c = variable("c");

function op(name: string, left: Quoted, right: Quoted): Quoted {
  return call(name, { line: 1 }, [left, right]);
}

describe("literals", () => {
  test("prints numbers from their source text", () => {
    expect(print(int(1000000))).toBe("1_000_000");
    expect(print(int(1000, 1, "10_00"))).toBe("10_00");
    expect(print(int(9007199254740993n))).toBe("9_007_199_254_740_993");
    expect(print(int(255, 1, "0xff"))).toBe("0xFF");
    expect(print(float(1.5e10, "1.5E10"))).toBe("1.5e10");
  });

  test("prints atoms", () => {
    expect(print(sym("ok"))).toBe(":ok");
    expect(print(sym("nil"))).toBe("nil");
    expect(print(sym("with space"))).toBe(':"with space"');
  });

  test("prints strings and charlists", () => {
    expect(print(str('say "hi"'))).toBe('"say \\"hi\\""');
    expect(
      print(block({ line: 1, format: "charlist" }, [{ type: "list", items: [97, 98].map(code) }])),
    ).toBe("'ab'");
  });

  test("prints heredocs", () => {
    const heredoc = str("hello\nworld\n", { line: 1, format: "binHeredoc" });
    expect(print(heredoc)).toBe('"""\nhello\nworld\n"""');
  });

  test("prints interpolated strings", () => {
    const forms = call("<<>>", { line: 1 }, [
      { type: "string", value: "a" },
      interpolation(b),
      { type: "string", value: "c" },
    ]);
    expect(print(forms)).toBe('"a#{b}c"');
  });

  test("prints interpolated atoms", () => {
    const binary = call("<<>>", { line: 1 }, [{ type: "string", value: "key_" }, interpolation(b)]);
    const forms = remote(atom("erlang"), "binary_to_atom", [binary, atom("utf8")]);
    expect(print(forms)).toBe(':"key_#{b}"');
  });

  test("prints bitstrings with segment types", () => {
    const segment = op("::", variable("x"), variable("binary"));
    const forms = call("<<>>", { line: 1 }, [segment, int(0)]);
    expect(print(forms)).toBe("<<x::binary, 0>>");
  });

  test("prints empty bitstrings", () => {
    expect(print(call("<<>>", { line: 1 }, []))).toBe("<<>>");
  });

  test("prints sigils with modifiers", () => {
    const body = call("<<>>", { line: 1 }, [{ type: "string", value: "a/b" }]);
    const forms = call("sigil_r", { line: 1, terminator: "/" }, [
      body,
      { type: "list", items: [code(105)] },
    ]);
    expect(print(forms)).toBe("~r/a\\/b/i");
  });
});

function code(value: number): Quoted {
  return { type: "integer", value: BigInt(value) };
}

describe("containers", () => {
  test("prints lists, tuples and maps", () => {
    expect(print(list([int(1), int(2)]))).toBe("[1, 2]");
    expect(print(tuple(a, b))).toBe("{a, b}");
    expect(print(call("{}", { line: 1 }, [a, b, c]))).toBe("{a, b, c}");
    expect(print(call("%{}", { line: 1 }, [kw("a", int(1))]))).toBe("%{a: 1}");
    expect(print(call("%{}", { line: 1 }, [pair(str("a"), int(1))]))).toBe('%{"a" => 1}');
  });

  test("prints structs and map updates", () => {
    const struct = call("%", { line: 1 }, [
      aliases("User"),
      call("%{}", { line: 1 }, [kw("name", str("x"))]),
    ]);
    expect(print(struct)).toBe('%User{name: "x"}');

    const update = call("%{}", { line: 1 }, [
      call("|", { line: 1 }, [variable("map"), { type: "list", items: [kw("a", int(1))] }]),
    ]);
    expect(print(update)).toBe("%{map | a: 1}");
  });

  test("keeps a list broken when it started on a new line", () => {
    const forms = list([int(1), int(2)], { line: 1, eol: true });
    expect(print(forms)).toBe("[\n  1,\n  2\n]");
  });

  test("breaks a long list one element per line", () => {
    const forms = list([variable("alpha"), variable("beta")]);
    expect(print(forms, { printWidth: 10 })).toBe("[\n  alpha,\n  beta\n]");
  });

  test("prints empty containers", () => {
    expect(print(list([]))).toBe("[]");
    expect(print(call("%{}", { line: 1 }, []))).toBe("%{}");
  });
});

describe("operators", () => {
  test("adds parens by precedence", () => {
    expect(print(op("*", op("+", a, b), c))).toBe("(a + b) * c");
    expect(print(op("+", a, op("*", b, c)))).toBe("a + b * c");
    expect(print(op("-", a, op("-", b, c)))).toBe("a - (b - c)");
    expect(print(op("-", op("-", a, b), c))).toBe("a - b - c");
  });

  test("spaces operators by class", () => {
    expect(print(op("..", a, b))).toBe("a..b");
    expect(print(op("in", a, b))).toBe("a in b");
    expect(print(op("\\\\", a, b))).toBe("a \\\\ b");
  });

  test("prints not in", () => {
    expect(print(call("not", { line: 1 }, [op("in", a, b)]))).toBe("a not in b");
  });

  test("prints unary operators", () => {
    expect(print(call("not", { line: 1 }, [a]))).toBe("not a");
    expect(print(call("-", { line: 1 }, [a]))).toBe("-a");
    expect(print(call("!", { line: 1 }, [call("!", { line: 1 }, [a])]))).toBe("!!a");
    expect(print(call("!", { line: 1 }, [op("and", a, b)]))).toBe("!(a and b)");
    expect(print(call("not", { line: 1 }, [op("and", a, b)]))).toBe("not(a and b)");
  });

  test("breaks a pipeline before each pipe", () => {
    const forms = op("|>", op("|>", variable("input"), call("first", { line: 1 }, [])), call("second", { line: 1 }, []));
    expect(print(forms)).toBe("input |> first() |> second()");
    expect(print(forms, { printWidth: 20 })).toBe("input\n|> first()\n|> second()");
  });

  test("breaks after a flexible operator and nests the right side", () => {
    const forms = op("=", variable("result"), op("+", variable("first_value"), variable("second_value")));
    expect(print(forms, { printWidth: 30 })).toBe(
      "result =\n  first_value + second_value",
    );
  });
});

describe("calls", () => {
  test("keeps parens on unknown locals", () => {
    expect(print(call("foo", { line: 1 }, [int(1)]))).toBe("foo(1)");
    expect(print(call("foo", { line: 1 }, []))).toBe("foo()");
  });

  test("drops parens on configured locals", () => {
    const forms = call("foo", { line: 1 }, [int(1)]);
    expect(print(forms, { localsWithoutParens: [["foo", 1]] })).toBe("foo 1");
  });

  test("drops parens on built-in locals", () => {
    expect(print(call("assert", { line: 1 }, [op("==", a, b)]))).toBe("assert a == b");
  });

  test("drops parens on a no-parens call that is the only argument", () => {
    const inner = call("import", { line: 1 }, [aliases("Foo"), keywords(kw("only", list([])))]);
    expect(print(call("foo", { line: 1 }, [inner]))).toBe("foo(import Foo, only: [])");
  });

  test("keeps parens on a no-parens call among several arguments", () => {
    const inner = call("import", { line: 1 }, [aliases("Foo"), keywords(kw("only", list([])))]);
    expect(print(call("foo", { line: 1 }, [inner, a]))).toBe("foo(import(Foo, only: []), a)");
  });

  test("prints keyword arguments without brackets", () => {
    const forms = call("foo", { line: 1 }, [a, keywords(kw("b", int(1)), kw("c", int(2)))]);
    expect(print(forms)).toBe("foo(a, b: 1, c: 2)");
  });

  test("moves no-parens keywords to their own lines", () => {
    const forms = call("field", { line: 1 }, [
      sym("name"),
      sym("string"),
      keywords(kw("default", int(1)), kw("null", sym("false"))),
    ]);
    const options: FormatOptions = { localsWithoutParens: [["field", "*"]] };
    expect(print(forms, options)).toBe("field :name, :string, default: 1, null: false");
    expect(print(forms, { ...options, printWidth: 30 })).toBe(
      "field :name, :string,\n      default: 1,\n      null: false",
    );
  });

  test("prints remote calls", () => {
    expect(print(remote(aliases("Enum"), "map", [a, b]))).toBe("Enum.map(a, b)");
    expect(print(remote(aliases("Foo"), "bar", []))).toBe("Foo.bar()");
    expect(print(remote(variable("map"), "key", []))).toBe("map.key");
    expect(print(remote(aliases("Kernel"), "Foo", [a]))).toBe('Kernel."Foo"(a)');
  });

  test("prints anonymous function calls", () => {
    expect(print(call(call(".", { line: 1 }, [variable("fun")]), { line: 1 }, [a]))).toBe("fun.(a)");
  });

  test("prints access syntax", () => {
    const forms = remote(atom("Elixir.Access"), "get", [variable("map"), sym("key")]);
    expect(print(forms)).toBe("map[:key]");
  });

  test("prints multi-alias syntax", () => {
    const forms = call(dot(aliases("Foo"), "{}"), { line: 1 }, [aliases("Bar"), aliases("Baz")]);
    expect(print(forms)).toBe("Foo.{Bar, Baz}");
  });

  test("renames deprecated functions when asked", () => {
    const forms = remote(aliases("Enum"), "partition", [a, b]);
    expect(print(forms)).toBe("Enum.partition(a, b)");
    expect(print(forms, { renameDeprecatedAt: "1.4.0" })).toBe("Enum.split_with(a, b)");
    expect(print(forms, { renameDeprecatedAt: "1.3.0" })).toBe("Enum.partition(a, b)");
  });

  test("puts each argument of a comprehension with several generators on its own line", () => {
    const forms = call("for", { line: 1 }, [
      op("<-", variable("x"), a),
      op("<-", variable("y"), b),
      keywords(kw("into", call("%{}", { line: 1 }, [])), kw("do", variable("x"))),
    ]);
    expect(print(forms)).toBe("for x <- a,\n    y <- b,\n    into: %{},\n    do: x");
  });

  test("keeps a comprehension with one generator on one line", () => {
    const forms = call("for", { line: 1 }, [
      op("<-", variable("x"), a),
      keywords(kw("into", call("%{}", { line: 1 }, [])), kw("do", variable("x"))),
    ]);
    expect(print(forms)).toBe("for x <- a, into: %{}, do: x");
  });

  test("lets a trailing anonymous function break on its own", () => {
    const fn = call("fn", { line: 1 }, [clause([variable("x")], variable("x"))]);
    const forms = remote(aliases("Enum"), "map", [variable("list"), fn]);
    expect(print(forms)).toBe("Enum.map(list, fn x -> x end)");
    expect(print(forms, { printWidth: 25 })).toBe("Enum.map(list, fn x ->\n  x\nend)");
  });
});

describe("module attributes and captures", () => {
  test("prints attributes", () => {
    const doc = call("@", { line: 1 }, [call("doc", { line: 1 }, [str("hi")])]);
    expect(print(doc)).toBe('@doc "hi"');
    expect(print(call("@", { line: 1 }, [variable("timeout")]))).toBe("@timeout");
    expect(print(call("@", { line: 1 }, [aliases("Foo", "Bar")]))).toBe("@(Foo.Bar)");
  });

  test("prints captures", () => {
    const first = call("&", { line: 1 }, [code(1)]);
    expect(print(first)).toBe("&1");
    expect(print(call("&", { line: 1 }, [op("/", variable("foo"), int(2))]))).toBe("&foo/2");

    const mapCapture = op("/", remote(aliases("Enum"), "map", []), int(2));
    expect(print(call("&", { line: 1 }, [mapCapture]))).toBe("&Enum.map/2");

    expect(print(call("&", { line: 1 }, [first]))).toBe("& &1");
    expect(print(call("&", { line: 1 }, [op("+", first, int(1))]))).toBe("&(&1 + 1)");
  });
});

function def(name: string, line: number, newlines?: number): Quoted {
  const head = variable(name, { line });
  return call("def", { line, newlines }, [head, doEnd(line + 2, ["do", line, int(1, line + 1)])]);
}

describe("blocks", () => {
  test("prints do/end blocks", () => {
    const forms = call("if", { line: 1 }, [a, doEnd(3, ["do", 1, int(1, 2)])]);
    expect(print(forms)).toBe("if a do\n  1\nend");
  });

  test("prints else sections", () => {
    const forms = call("if", { line: 1 }, [a, doEnd(5, ["do", 1, int(1, 2)], ["else", 3, int(2, 4)])]);
    expect(print(forms)).toBe("if a do\n  1\nelse\n  2\nend");
  });

  test("prints empty do blocks", () => {
    const forms = call("defmodule", { line: 1 }, [aliases("Foo"), doEnd(2, ["do", 1, block({}, [])])]);
    expect(print(forms)).toBe("defmodule Foo do\nend");
  });

  test("separates multi-line expressions with a blank line", () => {
    const forms = block({}, [def("first", 1), def("second", 4, 1)]);
    expect(print(forms)).toBe("def first do\n  1\nend\n\ndef second do\n  1\nend");
  });

  test("adds a blank line before a multi-line expression", () => {
    const forms = block({}, [op("=", a, int(1)), def("first", 2, 1)]);
    expect(print(forms)).toBe("a = 1\n\ndef first do\n  1\nend");
  });

  test("keeps single-line expressions together", () => {
    const forms = block({}, [op("=", a, int(1)), call("=", { line: 2, newlines: 1 }, [b, int(2, 2)])]);
    expect(print(forms)).toBe("a = 1\nb = 2");
  });

  test("keeps one blank line the user wrote", () => {
    const forms = block({}, [variable("a", { line: 1 }), variable("b", { line: 3, newlines: 2 })]);
    expect(print(forms)).toBe("a\n\nb");
  });

  test("collapses several blank lines into one", () => {
    const forms = block({}, [variable("a", { line: 1 }), variable("b", { line: 5, newlines: 4 })]);
    expect(print(forms)).toBe("a\n\nb");
  });

  test("keeps module attributes together with the definition that follows", () => {
    const doc = call("@", { line: 1 }, [call("doc", { line: 1 }, [str("hi")])]);
    const timeout = call("@", { line: 2, newlines: 1 }, [call("timeout", { line: 2 }, [int(5, 2)])]);
    const forms = block({}, [doc, timeout, def("first", 3, 1)]);
    expect(print(forms)).toBe('@doc "hi"\n@timeout 5\ndef first do\n  1\nend');
  });

  test("wraps a multi-expression block used as a value", () => {
    const forms = op("=", a, block({ line: 1 }, [b, variable("c", { newlines: 1 })]));
    expect(print(forms)).toBe("a =\n  (\n    b\n    c\n  )");
  });
});

describe("clauses", () => {
  const caseOf = (clauses: Quoted[]): Quoted =>
    call("case", { line: 1 }, [variable("x"), doEnd(4, ["do", 1, { type: "list", items: clauses }])]);

  test("keeps short clauses on one line each", () => {
    const forms = caseOf([clause([sym("a", 2)], int(1, 2), { line: 2 }), clause([sym("b", 3)], int(2, 3), { line: 3 })]);
    expect(print(forms)).toBe("case x do\n  :a -> 1\n  :b -> 2\nend");
  });

  test("puts bodies below the arrows when a clause broke in the source", () => {
    const forms = caseOf([
      clause([sym("a", 2)], int(1, 3), { line: 2, eol: true }),
      clause([sym("b", 4)], int(2, 4), { line: 4 }),
    ]);
    expect(print(forms)).toBe("case x do\n  :a ->\n    1\n\n  :b ->\n    2\nend");
  });

  test("prints guards", () => {
    const guarded = call("when", { line: 2 }, [variable("n"), op(">", variable("n"), int(0))]);
    const forms = caseOf([clause([guarded], sym("pos", 2), { line: 2 })]);
    expect(print(forms)).toBe("case x do\n  n when n > 0 -> :pos\nend");
  });

  test("prints anonymous functions", () => {
    const single = call("fn", { line: 1 }, [clause([a, b], op("+", a, b))]);
    expect(print(single)).toBe("fn a, b -> a + b end");

    const noArgs = call("fn", { line: 1 }, [clause([], sym("ok"))]);
    expect(print(noArgs)).toBe("fn -> :ok end");
  });

  test("prints multi-clause anonymous functions on several lines", () => {
    const forms = call("fn", { line: 1, endLine: 4 }, [
      clause([int(0, 2)], sym("zero", 2), { line: 2 }),
      clause([variable("n", { line: 3 })], variable("n", { line: 3 }), { line: 3 }),
    ]);
    expect(print(forms)).toBe("fn\n  0 -> :zero\n  n -> n\nend");
  });

  test("prints type functions", () => {
    const spec = list([{ type: "list", items: [clause([variable("integer")], variable("atom"))] }]);
    expect(print(spec)).toBe("[(integer -> atom)]");
  });
});
