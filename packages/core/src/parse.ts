import { getFunction } from "./func.js";
import { type Token, TokenKind, tokenize } from "./lex.js";
import {
  BinaryOp,
  type Node,
  UnaryOp,
  binary,
  call,
  constant,
  unary,
  variable,
} from "./node.js";
import { unwrap } from "./util.js";

/** Character offset in the source text. */
export type Position = number;

export type ErrorData =
  | { kind: "OperandMissing"; position: Position }
  | { kind: "Unmatched"; position: Position }
  | { kind: "Unexpected"; position: Position }
  | { kind: "FunctionUnknown"; position: Position; name: string }
  | {
      kind: "FunctionArity";
      position: Position;
      name: string;
      expected: number;
      actual: number;
    };

const explain = (data: ErrorData): string => {
  switch (data.kind) {
    case "OperandMissing":
      return "expected an operand";
    case "Unmatched":
      return "unmatched parenthesis";
    case "Unexpected":
      return "unexpected token";
    case "FunctionUnknown":
      return `unknown function ${JSON.stringify(data.name)}`;
    case "FunctionArity":
      return `function ${JSON.stringify(data.name)} takes ${data.expected} argument(s), got ${data.actual}`;
  }
};

export class ParseError extends Error {
  data: ErrorData;

  constructor(data: ErrorData) {
    super(`${explain(data)} at ${data.position}`);
    this.data = data;
  }

  get position(): Position {
    return this.data.position;
  }
}

/**
 * Throws unless `name` is a built-in function taking `arity` arguments.
 * `position` is where the call starts.
 */
export const checkCall = (
  name: string,
  arity: number,
  position: Position,
): void => {
  const f = getFunction(name);
  if (f === undefined)
    throw new ParseError({ kind: "FunctionUnknown", position, name });
  if (f.arity !== arity)
    throw new ParseError({
      kind: "FunctionArity",
      position,
      name,
      expected: f.arity,
      actual: arity,
    });
};

const binaryOps = new Map<string, BinaryOp>([
  ["+", BinaryOp.Add],
  ["-", BinaryOp.Subtract],
  ["*", BinaryOp.Multiply],
  ["/", BinaryOp.Divide],
]);

/**
 * Recursive descent over a token array, one method per precedence level.
 *
 * The unary minus sits below `^`, so `-x^2` is `-(x^2)`, and the exponent of
 * `^` is itself a unary operand, which makes `^` right-associative.
 */
export class Parser {
  tokens: Token[];
  i: number;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
    this.i = 0;
  }

  peek(): Token {
    return unwrap(this.tokens[Math.min(this.i, this.tokens.length - 1)]);
  }

  pop(): Token {
    const token = this.peek();
    if (token.kind !== TokenKind.End) ++this.i;
    return token;
  }

  /** Pops the next token if it is the operator `text`. */
  operator(text: string): Token | undefined {
    const token = this.peek();
    if (token.kind === TokenKind.Operator && token.text === text) {
      ++this.i;
      return token;
    }
  }

  /** Pops a `)` that closes the `(` at `left`. */
  close(left: Token): void {
    const token = this.pop();
    if (token.kind === TokenKind.RightParen) return;
    if (token.kind === TokenKind.End)
      throw new ParseError({ kind: "Unmatched", position: left.offset });
    throw new ParseError({ kind: "Unexpected", position: token.offset });
  }

  args(): Node[] {
    const args: Node[] = [];
    if (this.peek().kind === TokenKind.RightParen) return args;
    args.push(this.expr());
    while (this.peek().kind === TokenKind.Comma) {
      this.pop();
      args.push(this.expr());
    }
    return args;
  }

  call(name: Token): Node {
    const left = this.pop();
    const args = this.args();
    this.close(left);
    checkCall(name.text, args.length, name.offset);
    return call(name.text, args);
  }

  atom(): Node {
    const token = this.pop();
    switch (token.kind) {
      case TokenKind.Number:
        return constant(unwrap(token.value));
      case TokenKind.Identifier:
        if (this.peek().kind === TokenKind.LeftParen) return this.call(token);
        return variable(token.text);
      case TokenKind.LeftParen: {
        const expr = this.expr();
        this.close(token);
        return expr;
      }
      default:
        throw new ParseError({
          kind: "OperandMissing",
          position: token.offset,
        });
    }
  }

  power(): Node {
    const base = this.atom();
    if (this.operator("^") === undefined) return base;
    return binary(BinaryOp.Power, base, this.unary());
  }

  unary(): Node {
    if (this.operator("-") === undefined) return this.power();
    return unary(UnaryOp.Negate, this.unary());
  }

  term(): Node {
    let left = this.unary();
    let token = this.peek();
    while (token.text === "*" || token.text === "/") {
      this.pop();
      const op = unwrap(binaryOps.get(token.text));
      left = binary(op, left, this.unary());
      token = this.peek();
    }
    return left;
  }

  expr(): Node {
    let left = this.term();
    let token = this.peek();
    while (token.text === "+" || token.text === "-") {
      this.pop();
      const op = unwrap(binaryOps.get(token.text));
      left = binary(op, left, this.term());
      token = this.peek();
    }
    return left;
  }

  /** Parses a whole expression, rejecting anything after it. */
  end(): Node {
    const node = this.expr();
    const token = this.peek();
    if (token.kind !== TokenKind.End)
      throw new ParseError({ kind: "Unexpected", position: token.offset });
    return node;
  }
}

/**
 * Parses `source` into a node tree. Variable names are never checked here;
 * whether a variable is bound is only known when evaluating.
 */
export const parseNode = (source: string): Node =>
  new Parser(tokenize(source)).end();
