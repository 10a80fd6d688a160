import {
  BinaryOp,
  type Node,
  NodeKind,
  UnaryOp,
  applyBinary,
  binary,
  call,
  constant,
  unary,
} from "./node.js";

// Builders used by differentiation. They fold away trivial identities so that
// derivatives of constant subtrees collapse to `0`, but do no other algebra.

export const zero = constant(0);
export const one = constant(1);

const constantValue = (x: Node): number | undefined =>
  x.kind === NodeKind.Constant ? x.value : undefined;

export const isZero = (x: Node): boolean => constantValue(x) === 0;

const isOne = (x: Node): boolean => constantValue(x) === 1;

/** Folds `op` over two constants when the result is finite. */
const fold = (op: BinaryOp, x: Node, y: Node): Node | undefined => {
  const a = constantValue(x);
  const b = constantValue(y);
  if (a === undefined || b === undefined) return undefined;
  const c = applyBinary(op, a, b);
  return Number.isFinite(c) ? constant(c) : undefined;
};

export const neg = (x: Node): Node => {
  if (x.kind === NodeKind.Constant) return constant(-x.value);
  if (x.kind === NodeKind.Unary && x.op === UnaryOp.Negate) return x.arg;
  return unary(UnaryOp.Negate, x);
};

export const add = (x: Node, y: Node): Node => {
  if (isZero(x)) return y;
  if (isZero(y)) return x;
  return fold(BinaryOp.Add, x, y) ?? binary(BinaryOp.Add, x, y);
};

export const sub = (x: Node, y: Node): Node => {
  if (isZero(y)) return x;
  if (isZero(x)) return neg(y);
  return fold(BinaryOp.Subtract, x, y) ?? binary(BinaryOp.Subtract, x, y);
};

export const mul = (x: Node, y: Node): Node => {
  if (isZero(x) || isZero(y)) return zero;
  if (isOne(x)) return y;
  if (isOne(y)) return x;
  return fold(BinaryOp.Multiply, x, y) ?? binary(BinaryOp.Multiply, x, y);
};

export const div = (x: Node, y: Node): Node => {
  if (isZero(x)) return zero;
  if (isOne(y)) return x;
  return fold(BinaryOp.Divide, x, y) ?? binary(BinaryOp.Divide, x, y);
};

export const pow = (x: Node, y: Node): Node => {
  if (isZero(y)) return one;
  if (isOne(y)) return x;
  return fold(BinaryOp.Power, x, y) ?? binary(BinaryOp.Power, x, y);
};

/** Call to a built-in function; never folded. */
export const fn =
  (name: string) =>
  (...args: Node[]): Node =>
    call(name, args);
