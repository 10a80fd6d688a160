import { differentiate } from "./diff.js";
import { type Variables, evaluate, resolver } from "./eval.js";
import { isIdentifier } from "./lex.js";
import {
  type Node,
  NodeKind,
  mapVariables,
  visitVariables,
} from "./node.js";
import { checkCall, parseNode } from "./parse.js";
import { print } from "./pprint.js";
import { ExpressionProgram } from "./program.js";
import { unwrap } from "./util.js";

export type Renames =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;

const isMap = (r: Renames): r is ReadonlyMap<string, string> =>
  r instanceof Map;

const renamed = (replacements: Renames, name: string): string => {
  if (isMap(replacements)) return replacements.get(name) ?? name;
  if (!Object.hasOwn(replacements, name)) return name;
  return unwrap(replacements[name]);
};

/**
 * Holds a node built outside the parser to the parser's rules: calls name a
 * built-in with the right number of arguments, and variable names read back
 * as identifiers. There is no source text, so call errors are at position 0.
 */
const check = (node: Node): void => {
  switch (node.kind) {
    case NodeKind.Constant:
      break;
    case NodeKind.Variable:
      if (!isIdentifier(node.name))
        throw RangeError(`not a variable name: ${JSON.stringify(node.name)}`);
      break;
    case NodeKind.Unary:
      check(node.arg);
      break;
    case NodeKind.Binary:
      check(node.left);
      check(node.right);
      break;
    case NodeKind.Call:
      checkCall(node.name, node.args.length, 0);
      for (const arg of node.args) check(arg);
      break;
  }
};

/**
 * A parsed expression. Trees are immutable: evaluating one has no effect on
 * it, and transformations return a new tree.
 */
export class ExpressionTree {
  readonly root: Node;
  private readonly names: ReadonlySet<string>;

  /** Throws `ParseError` or `RangeError` if `root` breaks the parser's rules. */
  constructor(root: Node) {
    check(root);
    this.root = root;
    const names = new Set<string>();
    visitVariables(root, (name) => names.add(name));
    this.names = names;
    Object.freeze(this);
  }

  /**
   * Evaluates the expression. Throws `UndefinedVariableError` for the first
   * variable (left to right) that `variables` does not bind.
   */
  evaluate(variables: Variables = {}): number {
    return evaluate(this.root, resolver(variables));
  }

  /** Partial derivative with respect to the variable `name`. */
  differentiate(name: string): ExpressionTree {
    return new ExpressionTree(differentiate(this.root, name));
  }

  /** Names of the variables in the expression, in order of first use. */
  variableNames(): Set<string> {
    return new Set(this.names);
  }

  /**
   * Returns a tree with variables renamed; unlisted names are kept. Throws
   * `RangeError` if a new name is not an identifier.
   */
  renameVariables(replacements: Renames): ExpressionTree {
    return new ExpressionTree(
      mapVariables(this.root, (name) => renamed(replacements, name)),
    );
  }

  createProgram(): ExpressionProgram {
    return new ExpressionProgram(this);
  }

  toString(): string {
    return print(this.root);
  }
}

/** Parses `source`; throws `LexError` or `ParseError` on malformed input. */
export const parse = (source: string): ExpressionTree =>
  new ExpressionTree(parseNode(source));
