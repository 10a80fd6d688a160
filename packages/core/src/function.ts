import { UndefinedVariableError } from "./eval.js";
import { ExpressionTree, parse } from "./tree.js";
import { unwrap } from "./util.js";

/**
 * An expression viewed as a function of an ordered list of arguments, for
 * callers that work with argument vectors (say, a path length as a function
 * of coordinate values) instead of named bindings.
 */
export class ExpressionFunction {
  readonly expression: ExpressionTree;
  readonly argumentNames: readonly string[];
  /** `partials[i]` is the derivative with respect to argument `i`. */
  private readonly partials: readonly ExpressionTree[];

  constructor(expression: string | ExpressionTree, argumentNames: string[]) {
    if (new Set(argumentNames).size !== argumentNames.length)
      throw Error(`duplicate argument name in [${argumentNames.join(", ")}]`);
    this.expression =
      typeof expression === "string" ? parse(expression) : expression;
    this.argumentNames = Object.freeze([...argumentNames]);
    for (const name of this.expression.variableNames())
      if (!argumentNames.includes(name)) throw new UndefinedVariableError(name);
    this.partials = argumentNames.map((name) =>
      this.expression.differentiate(name),
    );
    Object.freeze(this);
  }

  get argumentSize(): number {
    return this.argumentNames.length;
  }

  private bind(args: readonly number[]): Map<string, number> {
    if (args.length !== this.argumentSize)
      throw RangeError(
        `expected ${this.argumentSize} argument(s), got ${args.length}`,
      );
    return new Map(
      this.argumentNames.map((name, i): [string, number] => [
        name,
        unwrap(args[i]),
      ]),
    );
  }

  calcValue(args: readonly number[]): number {
    return this.expression.evaluate(this.bind(args));
  }

  /**
   * Evaluates the mixed partial derivative that differentiates once with
   * respect to each argument index in `components`, in order. An empty list
   * gives the value itself.
   */
  calcDerivative(
    components: readonly number[],
    args: readonly number[],
  ): number {
    const vars = this.bind(args);
    let tree = this.expression;
    components.forEach((i, k) => {
      const name = this.argumentNames[i];
      if (name === undefined)
        throw RangeError(`no argument at index ${i} of ${this.argumentSize}`);
      // the first derivative was computed up front
      tree = k === 0 ? unwrap(this.partials[i]) : tree.differentiate(name);
    });
    return tree.evaluate(vars);
  }

  /** First partial derivatives with respect to every argument, in order. */
  gradient(args: readonly number[]): number[] {
    const vars = this.bind(args);
    return this.partials.map((partial) => partial.evaluate(vars));
  }
}
