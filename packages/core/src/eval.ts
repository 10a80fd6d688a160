import { getFunction } from "./func.js";
import { type Node, NodeKind, applyBinary, applyUnary } from "./node.js";
import { unwrap } from "./util.js";

/**
 * Variable bindings for one evaluation. Only own properties of a record count
 * as bindings.
 */
export type Variables =
  | ReadonlyMap<string, number>
  | Readonly<Record<string, number>>;

export class UndefinedVariableError extends Error {
  data: { name: string };

  constructor(name: string) {
    super(`undefined variable: ${name}`);
    this.data = { name };
  }
}

const isMap = (vars: Variables): vars is ReadonlyMap<string, number> =>
  vars instanceof Map;

/** Returns a lookup that throws `UndefinedVariableError` for unbound names. */
export const resolver = (vars: Variables): ((name: string) => number) => {
  if (isMap(vars)) {
    const map = vars;
    return (name) => {
      const x = map.get(name);
      if (x === undefined) throw new UndefinedVariableError(name);
      return x;
    };
  }
  const record = vars;
  return (name) => {
    if (!Object.hasOwn(record, name)) throw new UndefinedVariableError(name);
    return unwrap(record[name]);
  };
};

/** Evaluates `node` bottom-up. */
export const evaluate = (
  node: Node,
  lookup: (name: string) => number,
): number => {
  switch (node.kind) {
    case NodeKind.Constant:
      return node.value;
    case NodeKind.Variable:
      return lookup(node.name);
    case NodeKind.Unary:
      return applyUnary(node.op, evaluate(node.arg, lookup));
    case NodeKind.Binary:
      return applyBinary(
        node.op,
        evaluate(node.left, lookup),
        evaluate(node.right, lookup),
      );
    case NodeKind.Call: {
      const f = unwrap(getFunction(node.name));
      return f.evaluate(...node.args.map((arg) => evaluate(arg, lookup)));
    }
  }
};
