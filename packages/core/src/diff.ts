import { add, div, isZero, mul, neg, one, sub, zero } from "./build.js";
import { getFunction, powerDerivative } from "./func.js";
import { BinaryOp, type Node, NodeKind, UnaryOp, call } from "./node.js";
import { unwrap } from "./util.js";

const square = (x: Node): Node => call("square", [x]);

const unaryDerivative = (op: UnaryOp, du: Node): Node => {
  switch (op) {
    case UnaryOp.Negate:
      return neg(du);
  }
};

const binaryDerivative = (
  op: BinaryOp,
  u: Node,
  v: Node,
  du: Node,
  dv: Node,
): Node => {
  switch (op) {
    case BinaryOp.Add:
      return add(du, dv);
    case BinaryOp.Subtract:
      return sub(du, dv);
    case BinaryOp.Multiply:
      return add(mul(du, v), mul(u, dv));
    case BinaryOp.Divide:
      if (isZero(dv)) return div(du, v);
      return div(sub(mul(du, v), mul(u, dv)), square(v));
    case BinaryOp.Power:
      return powerDerivative(u, v, du, dv);
  }
};

/**
 * Returns a new tree for the partial derivative of `node` with respect to the
 * variable `name`. The input is left untouched.
 */
export const differentiate = (node: Node, name: string): Node => {
  switch (node.kind) {
    case NodeKind.Constant:
      return zero;
    case NodeKind.Variable:
      return node.name === name ? one : zero;
    case NodeKind.Unary:
      return unaryDerivative(node.op, differentiate(node.arg, name));
    case NodeKind.Binary:
      return binaryDerivative(
        node.op,
        node.left,
        node.right,
        differentiate(node.left, name),
        differentiate(node.right, name),
      );
    case NodeKind.Call: {
      const f = unwrap(getFunction(node.name));
      const dargs = node.args.map((arg) => differentiate(arg, name));
      return f.derivative(node.args, dargs);
    }
  }
};
