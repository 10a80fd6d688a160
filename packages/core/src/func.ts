import {
  add,
  div,
  fn,
  isZero,
  mul,
  neg,
  one,
  pow,
  sub,
  zero,
} from "./build.js";
import { type Node, constant as c } from "./node.js";

/** A built-in function. */
export interface Builtin {
  readonly name: string;
  readonly arity: number;
  readonly evaluate: (...args: number[]) => number;
  /**
   * Derivative of a call with the chain rule already applied: `dargs[i]` is
   * the derivative of `args[i]` with respect to the target variable.
   */
  readonly derivative: (args: readonly Node[], dargs: readonly Node[]) => Node;
}

const sqrt = fn("sqrt");
const exp = fn("exp");
const log = fn("log");
const sin = fn("sin");
const cos = fn("cos");
const tan = fn("tan");
const sec = fn("sec");
const csc = fn("csc");
const cot = fn("cot");
const sinh = fn("sinh");
const cosh = fn("cosh");
const tanh = fn("tanh");
const square = fn("square");
const step = fn("step");
const select = fn("select");

const erfSeries = (x: number): number => {
  let term = x;
  let sum = x;
  for (let n = 1; Math.abs(term) > 1e-17 * Math.abs(sum); n++) {
    term *= (-x * x) / n;
    sum += term / (2 * n + 1);
  }
  return (2 / Math.sqrt(Math.PI)) * sum;
};

/** Complementary error function; a continued fraction for `x >= 3`. */
const erfcValue = (x: number): number => {
  if (Number.isNaN(x)) return NaN;
  if (x < 0) return 2 - erfcValue(-x);
  if (x < 3) return 1 - erfSeries(x);
  let t = x;
  for (let k = 60; k > 0; k--) t = x + k / 2 / t;
  return Math.exp(-x * x) / Math.sqrt(Math.PI) / t;
};

const erfValue = (x: number): number => {
  if (Math.abs(x) < 3) return erfSeries(x);
  return x < 0 ? erfcValue(-x) - 1 : 1 - erfcValue(x);
};

/** Derivative of `erf`, without the chain rule. */
const gaussian = (x: Node): Node =>
  mul(c(2 / Math.sqrt(Math.PI)), exp(neg(square(x))));

/** Derivative of `x^y`, shared by the `^` operator and `pow`. */
export const powerDerivative = (
  x: Node,
  y: Node,
  dx: Node,
  dy: Node,
): Node => {
  if (isZero(dy)) return mul(mul(y, pow(x, sub(y, one))), dx);
  return mul(pow(x, y), add(mul(dy, log(x)), div(mul(y, dx), x)));
};

/** A unary function whose derivative is `dx * d(x)`. */
const unary = (
  name: string,
  evaluate: (x: number) => number,
  d: (x: Node) => Node,
): Builtin => ({
  name,
  arity: 1,
  evaluate,
  derivative: ([x], [dx]) => mul(dx, d(x)),
});

/** A piecewise-constant unary function. */
const flat = (name: string, evaluate: (x: number) => number): Builtin => ({
  name,
  arity: 1,
  evaluate,
  derivative: () => zero,
});

const builtins: readonly Builtin[] = [
  unary("sqrt", Math.sqrt, (x) => div(c(0.5), sqrt(x))),
  unary("exp", Math.exp, (x) => exp(x)),
  {
    name: "log",
    arity: 1,
    evaluate: Math.log,
    derivative: ([x], [dx]) => div(dx, x),
  },
  unary("sin", Math.sin, (x) => cos(x)),
  unary("cos", Math.cos, (x) => neg(sin(x))),
  unary("tan", Math.tan, (x) => add(one, square(tan(x)))),
  unary("sec", (x) => 1 / Math.cos(x), (x) => mul(sec(x), tan(x))),
  unary("csc", (x) => 1 / Math.sin(x), (x) => neg(mul(csc(x), cot(x)))),
  unary("cot", (x) => 1 / Math.tan(x), (x) => neg(add(one, square(cot(x))))),
  {
    name: "asin",
    arity: 1,
    evaluate: Math.asin,
    derivative: ([x], [dx]) => div(dx, sqrt(sub(one, square(x)))),
  },
  {
    name: "acos",
    arity: 1,
    evaluate: Math.acos,
    derivative: ([x], [dx]) => neg(div(dx, sqrt(sub(one, square(x))))),
  },
  {
    name: "atan",
    arity: 1,
    evaluate: Math.atan,
    derivative: ([x], [dx]) => div(dx, add(one, square(x))),
  },
  unary("erf", erfValue, gaussian),
  unary("erfc", erfcValue, (x) => neg(gaussian(x))),
  unary("sinh", Math.sinh, (x) => cosh(x)),
  unary("cosh", Math.cosh, (x) => sinh(x)),
  unary("tanh", Math.tanh, (x) => sub(one, square(tanh(x)))),
  unary("abs", Math.abs, (x) => sub(mul(c(2), step(x)), one)),
  unary("square", (x) => x * x, (x) => mul(c(2), x)),
  unary("cube", (x) => x * x * x, (x) => mul(c(3), square(x))),
  {
    name: "recip",
    arity: 1,
    evaluate: (x) => 1 / x,
    derivative: ([x], [dx]) => neg(div(dx, square(x))),
  },
  flat("floor", Math.floor),
  flat("ceil", Math.ceil),
  flat("step", (x) => (x >= 0 ? 1 : 0)),
  flat("delta", (x) => (x === 0 ? 1 : 0)),
  {
    name: "min",
    arity: 2,
    evaluate: Math.min,
    derivative: ([x, y], [dx, dy]) => {
      const s = step(sub(x, y));
      return sub(mul(dy, s), mul(dx, sub(s, one)));
    },
  },
  {
    name: "max",
    arity: 2,
    evaluate: Math.max,
    derivative: ([x, y], [dx, dy]) => {
      const s = step(sub(x, y));
      return sub(mul(dx, s), mul(dy, sub(s, one)));
    },
  },
  {
    name: "pow",
    arity: 2,
    evaluate: Math.pow,
    derivative: ([x, y], [dx, dy]) => powerDerivative(x, y, dx, dy),
  },
  {
    name: "atan2",
    arity: 2,
    evaluate: Math.atan2,
    derivative: ([y, x], [dy, dx]) =>
      div(sub(mul(x, dy), mul(y, dx)), add(square(x), square(y))),
  },
  {
    name: "select",
    arity: 3,
    evaluate: (cond, x, y) => (cond !== 0 ? x : y),
    derivative: ([cond], [, dx, dy]) =>
      isZero(dx) && isZero(dy) ? zero : select(cond, dx, dy),
  },
];

const registry: ReadonlyMap<string, Builtin> = new Map(
  builtins.map((f): [string, Builtin] => [f.name, Object.freeze(f)]),
);

/** Returns the built-in function called `name`, if there is one. */
export const getFunction = (name: string): Builtin | undefined =>
  registry.get(name);

export const functionNames = (): string[] => [...registry.keys()];
