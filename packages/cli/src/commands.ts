import type { Logger } from "@metamask/logger";
import { type ExpressionTree, parse } from "exprkit";

export interface CommandContext {
  logger: Logger;
  variables: ReadonlyMap<string, number>;
}

const load = (expression: string, logger: Logger): ExpressionTree => {
  const tree = parse(expression);
  logger.debug(`parsed ${tree}`);
  return tree;
};

/** Evaluates `expression` through a compiled program. */
export const evalCommand = (
  expression: string,
  { logger, variables }: CommandContext,
): string => {
  const program = load(expression, logger).createProgram();
  logger.debug(`compiled ${program.size} operation(s)`);
  return String(program.evaluate(variables));
};

/**
 * Prints the derivative of `expression` with respect to `variable`, or its
 * value if `evaluate`.
 */
export const diffCommand = (
  expression: string,
  variable: string,
  { logger, variables }: CommandContext,
  evaluate = false,
): string => {
  const tree = load(expression, logger);
  if (!tree.variableNames().has(variable))
    logger.warn(`"${variable}" does not appear in the expression`);
  const derivative = tree.differentiate(variable);
  logger.debug(`derivative ${derivative}`);
  return evaluate
    ? String(derivative.evaluate(variables))
    : derivative.toString();
};

/** Lists the variables of `expression`, one per line, in order of first use. */
export const varsCommand = (
  expression: string,
  { logger }: Pick<CommandContext, "logger">,
): string => [...load(expression, logger).variableNames()].join("\n");
