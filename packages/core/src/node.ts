export enum NodeKind {
  Constant,
  Variable,
  Unary,
  Binary,
  Call,
}

export enum UnaryOp {
  Negate,
}

export enum BinaryOp {
  Add,
  Subtract,
  Multiply,
  Divide,
  Power,
}

/**
 * A node of an expression tree. Nodes are frozen when constructed, and each
 * node is the only parent of its children.
 */
export type Node =
  | { readonly kind: NodeKind.Constant; readonly value: number }
  | { readonly kind: NodeKind.Variable; readonly name: string }
  | { readonly kind: NodeKind.Unary; readonly op: UnaryOp; readonly arg: Node }
  | {
      readonly kind: NodeKind.Binary;
      readonly op: BinaryOp;
      readonly left: Node;
      readonly right: Node;
    }
  | {
      readonly kind: NodeKind.Call;
      readonly name: string;
      readonly args: readonly Node[];
    };

const freeze = <T extends Node>(node: T): T => {
  Object.freeze(node);
  return node;
};

export const constant = (value: number): Node =>
  freeze({ kind: NodeKind.Constant, value });

export const variable = (name: string): Node =>
  freeze({ kind: NodeKind.Variable, name });

export const unary = (op: UnaryOp, arg: Node): Node =>
  freeze({ kind: NodeKind.Unary, op, arg });

export const binary = (op: BinaryOp, left: Node, right: Node): Node =>
  freeze({ kind: NodeKind.Binary, op, left, right });

export const call = (name: string, args: readonly Node[]): Node =>
  freeze({ kind: NodeKind.Call, name, args: Object.freeze([...args]) });

export const applyUnary = (op: UnaryOp, x: number): number => {
  switch (op) {
    case UnaryOp.Negate:
      return -x;
  }
};

/** IEEE-754 arithmetic; division by zero yields an infinity or `NaN`. */
export const applyBinary = (op: BinaryOp, x: number, y: number): number => {
  switch (op) {
    case BinaryOp.Add:
      return x + y;
    case BinaryOp.Subtract:
      return x - y;
    case BinaryOp.Multiply:
      return x * y;
    case BinaryOp.Divide:
      return x / y;
    case BinaryOp.Power:
      return Math.pow(x, y);
  }
};

/** Calls `f` on every variable name in `node`, left to right. */
export const visitVariables = (node: Node, f: (name: string) => void): void => {
  switch (node.kind) {
    case NodeKind.Constant:
      break;
    case NodeKind.Variable:
      f(node.name);
      break;
    case NodeKind.Unary:
      visitVariables(node.arg, f);
      break;
    case NodeKind.Binary:
      visitVariables(node.left, f);
      visitVariables(node.right, f);
      break;
    case NodeKind.Call:
      for (const arg of node.args) visitVariables(arg, f);
      break;
  }
};

/** Returns a copy of `node` with each variable name passed through `f`. */
export const mapVariables = (node: Node, f: (name: string) => string): Node => {
  switch (node.kind) {
    case NodeKind.Constant:
      return node;
    case NodeKind.Variable:
      return variable(f(node.name));
    case NodeKind.Unary:
      return unary(node.op, mapVariables(node.arg, f));
    case NodeKind.Binary:
      return binary(
        node.op,
        mapVariables(node.left, f),
        mapVariables(node.right, f),
      );
    case NodeKind.Call:
      return call(node.name, node.args.map((arg) => mapVariables(arg, f)));
  }
};
