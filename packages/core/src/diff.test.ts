import { describe, expect, test } from "vitest";
import { parse } from "./tree.js";

const derivative = (source: string, name: string): string =>
  parse(source).differentiate(name).toString();

/** Central difference of `source` along `name` at `at`. */
const numeric = (
  source: string,
  name: string,
  at: Record<string, number>,
): number => {
  const h = 1e-6;
  const tree = parse(source);
  const x = at[name] ?? 0;
  const hi = tree.evaluate({ ...at, [name]: x + h });
  const lo = tree.evaluate({ ...at, [name]: x - h });
  return (hi - lo) / (2 * h);
};

describe("symbolic", () => {
  test("constant", () => {
    expect(derivative("5", "x")).toBe("0");
  });

  test("variable", () => {
    expect(derivative("x", "x")).toBe("1");
    expect(derivative("y", "x")).toBe("0");
  });

  test("power with constant exponent", () => {
    expect(derivative("x^3", "x")).toBe("3 * x^2");
    expect(derivative("x^2", "x")).toBe("2 * x");
  });

  test("power with variable exponent", () => {
    expect(derivative("2^x", "x")).toBe("2^x * log(2)");
  });

  test("negation", () => {
    expect(derivative("-x^2", "x")).toBe("-(2 * x)");
  });

  test("product", () => {
    expect(derivative("x*y", "x")).toBe("y");
    expect(derivative("x*x", "x")).toBe("x + x");
  });

  test("quotient", () => {
    expect(derivative("x/y", "x")).toBe("1 / y");
    expect(derivative("x/y", "y")).toBe("-x / square(y)");
  });

  test("functions", () => {
    expect(derivative("sin(x)", "x")).toBe("cos(x)");
    expect(derivative("sqrt(x)-1", "x")).toBe("0.5 / sqrt(x)");
    expect(derivative("log(x)", "x")).toBe("1 / x");
    expect(derivative("abs(x)", "x")).toBe("2 * step(x) - 1");
  });

  test("chain rule", () => {
    expect(derivative("exp(2*x)", "x")).toBe("2 * exp(2 * x)");
    expect(derivative("sin(x^2)", "x")).toBe("2 * x * cos(x^2)");
  });

  test("min", () => {
    expect(derivative("min(x, y)", "x")).toBe("-(step(x - y) - 1)");
    expect(derivative("min(x, y)", "y")).toBe("step(x - y)");
  });

  test("select", () => {
    expect(derivative("select(x, y^2, 3)", "y")).toBe("select(x, 2 * y, 0)");
    expect(derivative("select(x, y^2, 3)", "z")).toBe("0");
  });

  test("piecewise constant", () => {
    expect(derivative("floor(x) + ceil(x) + step(x)", "x")).toBe("0");
    expect(derivative("delta(x)", "x")).toBe("0");
  });
});

describe("values", () => {
  test("min picks the smaller argument", () => {
    const dx = parse("min(x, y)").differentiate("x");
    expect(dx.evaluate({ x: 1, y: 2 })).toBe(1);
    expect(dx.evaluate({ x: 3, y: 2 })).toBeCloseTo(0);
  });

  test("abs", () => {
    const dx = parse("abs(x)").differentiate("x");
    expect(dx.evaluate({ x: -3 })).toBe(-1);
    expect(dx.evaluate({ x: 3 })).toBe(1);
  });

  test("sqrt", () => {
    expect(parse("sqrt(x)-1").differentiate("x").evaluate({ x: 9 })).toBe(
      0.5 / 3,
    );
  });

  test("second derivative", () => {
    const d2 = parse("x^3").differentiate("x").differentiate("x");
    expect(d2.evaluate({ x: 2 })).toBe(12);
  });

  test("mixed partial", () => {
    const dxy = parse("x^2 * y^3").differentiate("x").differentiate("y");
    expect(dxy.evaluate({ x: 2, y: 1 })).toBe(12);
  });

  test("unary functions match central differences", () => {
    for (const f of [
      "sqrt",
      "exp",
      "log",
      "sin",
      "cos",
      "tan",
      "sec",
      "csc",
      "cot",
      "asin",
      "acos",
      "atan",
      "sinh",
      "cosh",
      "tanh",
      "square",
      "cube",
      "recip",
      "erf",
      "erfc",
    ]) {
      const source = `${f}(x)`;
      const at = { x: 0.3 };
      const exact = parse(source).differentiate("x").evaluate(at);
      expect(exact).toBeCloseTo(numeric(source, "x", at), 5);
    }
  });

  test("binary functions match central differences", () => {
    const at = { x: 0.7, y: 0.4 };
    for (const source of [
      "atan2(y, x)",
      "pow(x, y)",
      "x^y",
      "y / x",
      "max(x, y)",
      "sin(x * y) - exp(y / x)",
    ]) {
      for (const name of ["x", "y"]) {
        const exact = parse(source).differentiate(name).evaluate(at);
        expect(exact).toBeCloseTo(numeric(source, name, at), 5);
      }
    }
  });
});
