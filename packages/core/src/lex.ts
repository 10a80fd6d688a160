import moo from "moo";

export enum TokenKind {
  Number,
  Identifier,
  Operator,
  LeftParen,
  RightParen,
  Comma,
  End,
}

export interface Token {
  kind: TokenKind;
  /** Source text of the token; empty for `End`. */
  text: string;
  /** Zero-based character offset into the source. */
  offset: number;
  /** Numeric value, only for `Number` tokens. */
  value?: number;
}

export interface LexErrorData {
  position: number;
  text: string;
}

export class LexError extends Error {
  data: LexErrorData;

  constructor(data: LexErrorData) {
    super(
      `unexpected character ${JSON.stringify(data.text)} at ${data.position}`,
    );
    this.data = data;
  }
}

const identifier = /[A-Za-z_][A-Za-z0-9_.]*/;

/** Whether `name` reads back as a single identifier token. */
export const isIdentifier = (name: string): boolean =>
  new RegExp(`^(?:${identifier.source})$`).test(name);

export const lexer = (): moo.Lexer =>
  moo.compile({
    space: { match: /\s+/, lineBreaks: true },
    num: /(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][-+]?[0-9]+)?/,
    id: identifier,
    op: /[-+*/^]/,
    lparen: "(",
    rparen: ")",
    comma: ",",
    error: moo.error,
  });

const kinds = new Map<string | undefined, TokenKind>([
  ["num", TokenKind.Number],
  ["id", TokenKind.Identifier],
  ["op", TokenKind.Operator],
  ["lparen", TokenKind.LeftParen],
  ["rparen", TokenKind.RightParen],
  ["comma", TokenKind.Comma],
]);

/**
 * Splits `source` into tokens, dropping whitespace. The result always ends
 * with an `End` token whose offset is the length of `source`.
 */
export const tokenize = (source: string): Token[] => {
  const lex = lexer();
  lex.reset(source);
  const tokens: Token[] = [];
  for (const { type, text, offset } of lex) {
    if (type === "space") continue;
    if (type === "error")
      throw new LexError({ position: offset, text: text.charAt(0) });
    const kind = kinds.get(type);
    if (kind === undefined) throw Error(`unknown token type: ${type}`);
    if (kind === TokenKind.Number)
      tokens.push({ kind, text, offset, value: Number(text) });
    else tokens.push({ kind, text, offset });
  }
  tokens.push({ kind: TokenKind.End, text: "", offset: source.length });
  return tokens;
};
