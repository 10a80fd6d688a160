import { describe, expect, test } from "vitest";
import { LexError } from "./lex.js";
import {
  BinaryOp,
  UnaryOp,
  binary,
  call,
  constant,
  unary,
  variable,
} from "./node.js";
import { ParseError, parseNode } from "./parse.js";

const parseError = (source: string): ParseError => {
  try {
    parseNode(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw Error(`expected ${JSON.stringify(source)} to fail`);
};

const x = variable("x");
const y = variable("y");

describe("valid", () => {
  test("power", () => {
    expect(parseNode("x^y")).toEqual(binary(BinaryOp.Power, x, y));
  });

  test("negation binds looser than power", () => {
    expect(parseNode("-x^2")).toEqual(
      unary(UnaryOp.Negate, binary(BinaryOp.Power, x, constant(2))),
    );
  });

  test("power is right-associative", () => {
    expect(parseNode("2^3^2")).toEqual(
      binary(
        BinaryOp.Power,
        constant(2),
        binary(BinaryOp.Power, constant(3), constant(2)),
      ),
    );
  });

  test("negative exponent", () => {
    expect(parseNode("2^-1")).toEqual(
      binary(BinaryOp.Power, constant(2), unary(UnaryOp.Negate, constant(1))),
    );
  });

  test("subtraction is left-associative", () => {
    expect(parseNode("1-2-3")).toEqual(
      binary(
        BinaryOp.Subtract,
        binary(BinaryOp.Subtract, constant(1), constant(2)),
        constant(3),
      ),
    );
  });

  test("product binds tighter than sum", () => {
    expect(parseNode("x*y+1")).toEqual(
      binary(BinaryOp.Add, binary(BinaryOp.Multiply, x, y), constant(1)),
    );
  });

  test("parentheses", () => {
    expect(parseNode("x*(y+1)")).toEqual(
      binary(BinaryOp.Multiply, x, binary(BinaryOp.Add, y, constant(1))),
    );
  });

  test("double negation", () => {
    expect(parseNode("--x")).toEqual(
      unary(UnaryOp.Negate, unary(UnaryOp.Negate, x)),
    );
  });

  test("function call", () => {
    expect(parseNode("min(x, sqrt(y))")).toEqual(
      call("min", [x, call("sqrt", [y])]),
    );
  });

  test("function name without parentheses is a variable", () => {
    expect(parseNode("sin")).toEqual(variable("sin"));
  });

  test("unbound dotted variable", () => {
    expect(parseNode("state.muscle1.activation^2")).toEqual(
      binary(
        BinaryOp.Power,
        variable("state.muscle1.activation"),
        constant(2),
      ),
    );
  });

  test("nodes are frozen", () => {
    const node = parseNode("f.g + sqrt(1)");
    expect(Object.isFrozen(node)).toBe(true);
  });
});

describe("invalid", () => {
  test("unknown function", () => {
    const error = parseError("frobnicate(1)");
    expect(error.data).toEqual({
      kind: "FunctionUnknown",
      position: 0,
      name: "frobnicate",
    });
    expect(error.message).toBe('unknown function "frobnicate" at 0');
  });

  test("too many arguments", () => {
    expect(parseError("sqrt(1,2)").data).toEqual({
      kind: "FunctionArity",
      position: 0,
      name: "sqrt",
      expected: 1,
      actual: 2,
    });
  });

  test("too few arguments", () => {
    expect(parseError("1 + min(1)").data).toEqual({
      kind: "FunctionArity",
      position: 4,
      name: "min",
      expected: 2,
      actual: 1,
    });
  });

  test("no arguments", () => {
    expect(parseError("cos()").data).toMatchObject({
      kind: "FunctionArity",
      actual: 0,
    });
  });

  test("empty", () => {
    expect(parseError("").data).toEqual({ kind: "OperandMissing", position: 0 });
  });

  test("missing right operand", () => {
    expect(parseError("1+").data).toEqual({
      kind: "OperandMissing",
      position: 2,
    });
  });

  test("two operators", () => {
    expect(parseError("x +* y").data).toEqual({
      kind: "OperandMissing",
      position: 3,
    });
  });

  test("empty parentheses", () => {
    expect(parseError("()").data).toEqual({
      kind: "OperandMissing",
      position: 1,
    });
  });

  test("unclosed parenthesis", () => {
    const error = parseError("(1+2");
    expect(error.data).toEqual({ kind: "Unmatched", position: 0 });
    expect(error.position).toBe(0);
  });

  test("unclosed call", () => {
    expect(parseError("sqrt(1").data).toEqual({
      kind: "Unmatched",
      position: 4,
    });
  });

  test("stray closing parenthesis", () => {
    expect(parseError("(1))").data).toEqual({
      kind: "Unexpected",
      position: 3,
    });
  });

  test("trailing tokens", () => {
    expect(parseError("1 2").data).toEqual({ kind: "Unexpected", position: 2 });
  });

  test("missing comma", () => {
    expect(parseError("max(1 2)").data).toEqual({
      kind: "Unexpected",
      position: 6,
    });
  });

  test("lexer errors pass through", () => {
    expect(() => parseNode("x % 2")).toThrow(LexError);
  });
});
