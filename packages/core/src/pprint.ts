import { BinaryOp, type Node, NodeKind, UnaryOp } from "./node.js";
import { formatNumber } from "./util.js";

// Binding strength of each printed form, loosest first.
const SUM = 1;
const PRODUCT = 2;
const PREFIX = 3;
const POWER = 4;
const ATOM = 5;

const symbols: Record<BinaryOp, string> = {
  [BinaryOp.Add]: " + ",
  [BinaryOp.Subtract]: " - ",
  [BinaryOp.Multiply]: " * ",
  [BinaryOp.Divide]: " / ",
  [BinaryOp.Power]: "^",
};

const binaryLevel = (op: BinaryOp): number => {
  switch (op) {
    case BinaryOp.Add:
    case BinaryOp.Subtract:
      return SUM;
    case BinaryOp.Multiply:
    case BinaryOp.Divide:
      return PRODUCT;
    case BinaryOp.Power:
      return POWER;
  }
};

const level = (node: Node): number => {
  switch (node.kind) {
    case NodeKind.Constant:
      return node.value < 0 || Object.is(node.value, -0) ? PREFIX : ATOM;
    case NodeKind.Variable:
    case NodeKind.Call:
      return ATOM;
    case NodeKind.Unary:
      return PREFIX;
    case NodeKind.Binary:
      return binaryLevel(node.op);
  }
};

/**
 * Renders nodes as expression text with just enough parentheses that parsing
 * the text gives back the same tree, for trees the parser produced. Other
 * trees read back with the same value: a negative constant `-2` reads back as
 * the negation of `2`.
 */
export class Printer {
  strings: string[];

  constructor() {
    this.strings = [];
  }

  flush(): string {
    const s = this.strings.join("");
    this.strings = [s];
    return s;
  }

  push(s: string) {
    this.strings.push(s);
  }

  /** Prints `node`, parenthesized if `parens`. */
  group(node: Node, parens: boolean) {
    if (parens) this.push("(");
    this.node(node);
    if (parens) this.push(")");
  }

  constant(value: number) {
    // Non-finite values have no literal, so spell them as arithmetic.
    if (Number.isNaN(value)) this.push("(0/0)");
    else if (value === Infinity) this.push("(1/0)");
    else if (value === -Infinity) this.push("(-1/0)");
    else this.push(formatNumber(value));
  }

  node(node: Node) {
    switch (node.kind) {
      case NodeKind.Constant:
        this.constant(node.value);
        break;
      case NodeKind.Variable:
        this.push(node.name);
        break;
      case NodeKind.Unary:
        switch (node.op) {
          case UnaryOp.Negate:
            this.push("-");
            break;
        }
        this.group(node.arg, level(node.arg) < PREFIX);
        break;
      case NodeKind.Binary: {
        const { op, left, right } = node;
        const p = binaryLevel(op);
        if (op === BinaryOp.Power) {
          this.group(left, level(left) <= POWER);
          this.push(symbols[op]);
          this.group(right, level(right) < PREFIX);
        } else {
          this.group(left, level(left) < p);
          this.push(symbols[op]);
          this.group(right, level(right) <= p);
        }
        break;
      }
      case NodeKind.Call:
        this.push(node.name);
        this.push("(");
        node.args.forEach((arg, i) => {
          if (i > 0) this.push(", ");
          this.node(arg);
        });
        this.push(")");
        break;
    }
  }
}

export const print = (node: Node): string => {
  const printer = new Printer();
  printer.node(node);
  return printer.flush();
};
