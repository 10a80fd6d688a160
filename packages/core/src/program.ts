import { type Variables, resolver } from "./eval.js";
import { type Builtin, getFunction } from "./func.js";
import {
  BinaryOp,
  type Node,
  NodeKind,
  UnaryOp,
  applyBinary,
  applyUnary,
} from "./node.js";
import type { ExpressionTree } from "./tree.js";
import { unwrap } from "./util.js";

/** One instruction of a postfix program. */
export type Operation =
  | { readonly kind: NodeKind.Constant; readonly value: number }
  | { readonly kind: NodeKind.Variable; readonly name: string }
  | { readonly kind: NodeKind.Unary; readonly op: UnaryOp }
  | { readonly kind: NodeKind.Binary; readonly op: BinaryOp }
  | { readonly kind: NodeKind.Call; readonly f: Builtin };

const flatten = (node: Node, ops: Operation[]): void => {
  switch (node.kind) {
    case NodeKind.Constant:
      ops.push({ kind: node.kind, value: node.value });
      break;
    case NodeKind.Variable:
      ops.push({ kind: node.kind, name: node.name });
      break;
    case NodeKind.Unary:
      flatten(node.arg, ops);
      ops.push({ kind: node.kind, op: node.op });
      break;
    case NodeKind.Binary:
      flatten(node.left, ops);
      flatten(node.right, ops);
      ops.push({ kind: node.kind, op: node.op });
      break;
    case NodeKind.Call:
      for (const arg of node.args) flatten(arg, ops);
      ops.push({ kind: node.kind, f: unwrap(getFunction(node.name)) });
      break;
  }
};

/**
 * A tree flattened into postfix order. Evaluating runs the operations against
 * a value stack that is local to the call, so one program can be evaluated
 * any number of times, interleaved, without the calls seeing each other.
 */
export class ExpressionProgram {
  readonly operations: readonly Operation[];

  constructor(tree: ExpressionTree) {
    const ops: Operation[] = [];
    flatten(tree.root, ops);
    this.operations = Object.freeze(ops.map((op) => Object.freeze(op)));
    Object.freeze(this);
  }

  get size(): number {
    return this.operations.length;
  }

  evaluate(variables: Variables = {}): number {
    const lookup = resolver(variables);
    const stack: number[] = [];
    const pop = () => unwrap(stack.pop());
    for (const op of this.operations) {
      switch (op.kind) {
        case NodeKind.Constant:
          stack.push(op.value);
          break;
        case NodeKind.Variable:
          stack.push(lookup(op.name));
          break;
        case NodeKind.Unary:
          stack.push(applyUnary(op.op, pop()));
          break;
        case NodeKind.Binary: {
          const y = pop();
          const x = pop();
          stack.push(applyBinary(op.op, x, y));
          break;
        }
        case NodeKind.Call: {
          const args = stack.splice(stack.length - op.f.arity);
          stack.push(op.f.evaluate(...args));
          break;
        }
      }
    }
    return pop();
  }
}
