/**
 * Throws if `x === undefined`.
 * @returns `x`
 * @param f called if `x === undefined`, to produce error message
 */
export const unwrap = <T>(x: T | undefined, f?: () => string): T => {
  if (x === undefined)
    throw Error((f ?? (() => "called `unwrap` with `undefined`"))());
  return x;
};

/** Formats a number so that the tokenizer reads it back as the same value. */
export const formatNumber = (x: number): string => {
  if (Object.is(x, -0)) return "-0";
  return String(x);
};
