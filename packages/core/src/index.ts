export { UndefinedVariableError } from "./eval.js";
export type { Variables } from "./eval.js";
export { differentiate } from "./diff.js";
export { functionNames, getFunction } from "./func.js";
export type { Builtin } from "./func.js";
export { ExpressionFunction } from "./function.js";
export { LexError, TokenKind, isIdentifier, tokenize } from "./lex.js";
export type { LexErrorData, Token } from "./lex.js";
export {
  BinaryOp,
  NodeKind,
  UnaryOp,
  binary,
  call,
  constant,
  unary,
  variable,
} from "./node.js";
export type { Node } from "./node.js";
export { ParseError, Parser, checkCall, parseNode } from "./parse.js";
export type { ErrorData, Position } from "./parse.js";
export { Printer, print } from "./pprint.js";
export { ExpressionProgram } from "./program.js";
export type { Operation } from "./program.js";
export { ExpressionTree, parse } from "./tree.js";
export type { Renames } from "./tree.js";
