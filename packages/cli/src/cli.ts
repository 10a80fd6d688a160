import { LexError, ParseError, UndefinedVariableError } from "exprkit";
import yargs from "yargs";
import { diffCommand, evalCommand, varsCommand } from "./commands.js";
import type { CommandContext } from "./commands.js";
import { makeLogger } from "./logger.js";
import { VariablesError, resolveVariables } from "./vars.js";

export interface Io {
  /** Receives command results. */
  print: (line: string) => void;
  /** Receives log lines. */
  log: (line: string) => void;
}

/** Errors caused by the input rather than by a bug. */
const isUserError = (problem: unknown): problem is Error =>
  problem instanceof LexError ||
  problem instanceof ParseError ||
  problem instanceof UndefinedVariableError ||
  problem instanceof VariablesError;

/** A usage error reported by yargs, such as a missing positional. */
class UsageError extends Error {}

/** A word like `-2^2` or `-x*y`, which no option name could be. */
const expressionLike = /^-(?:[^-A-Za-z]|[A-Za-z][\w.]*[^\w.=-])/u;

/**
 * Prefixes a space to the words that must stay positional: everything after
 * `--`, and words that look like an expression. yargs then never reads them as
 * options, and the tokenizer skips the space.
 */
export const shieldPositionals = (argv: readonly string[]): string[] => {
  const end = argv.indexOf("--");
  const words = end < 0 ? argv : argv.slice(0, end);
  const rest = end < 0 ? [] : argv.slice(end + 1);
  return [
    ...words.map((word) => (expressionLike.test(word) ? ` ${word}` : word)),
    ...rest.map((word) => ` ${word}`),
  ];
};

interface GlobalArgs {
  /** A string for one `--var`, an array for several. */
  var?: string | string[];
  vars?: string;
  verbose: boolean;
}

/**
 * Runs the command line `argv` and resolves to the exit status. Input errors
 * are logged and give status 1; anything else is rethrown.
 */
export const cli = async (argv: string[], io: Io): Promise<number> => {
  let status = 0;

  const run = async (
    args: GlobalArgs,
    command: (context: CommandContext) => string,
  ): Promise<void> => {
    const logger = makeLogger(args.verbose, io.log);
    try {
      const assignments = [args.var ?? []].flat();
      const variables = await resolveVariables(args.vars, assignments);
      logger.debug(`bound ${[...variables.keys()].join(", ") || "nothing"}`);
      io.print(command({ logger, variables }));
    } catch (problem) {
      if (!isUserError(problem)) throw problem;
      logger.error(problem.message);
      status = 1;
    }
  };

  try {
    await yargs(shieldPositionals(argv))
      .scriptName("exprkit")
      .usage("$0 <command> [options]")
      .env("EXPRKIT")
      .option("var", {
        alias: "v",
        type: "string",
        requiresArg: true,
        describe: "Bind a variable, as name=value; repeatable",
      })
      .option("vars", {
        type: "string",
        normalize: true,
        describe: "JSON file of variable bindings",
      })
      .option("verbose", {
        type: "boolean",
        default: false,
        describe: "Log debug output",
      })
      .command(
        "eval <expression>",
        "Evaluate an expression",
        (_yargs) =>
          _yargs.positional("expression", { type: "string", demandOption: true }),
        async (args) =>
          run(args, (context) => evalCommand(args.expression, context)),
      )
      .command(
        "diff <expression> <variable>",
        "Differentiate an expression",
        (_yargs) =>
          _yargs
            .positional("expression", { type: "string", demandOption: true })
            .positional("variable", { type: "string", demandOption: true })
            .option("evaluate", {
              alias: "e",
              type: "boolean",
              default: false,
              describe: "Print the value of the derivative instead",
            }),
        async (args) =>
          run(args, (context) =>
            diffCommand(
              args.expression,
              args.variable.trim(),
              context,
              args.evaluate,
            ),
          ),
      )
      .command(
        "vars <expression>",
        "List the variables of an expression",
        (_yargs) =>
          _yargs.positional("expression", { type: "string", demandOption: true }),
        async (args) =>
          run(args, (context) => varsCommand(args.expression, context)),
      )
      .demandCommand(1)
      .strict()
      .help()
      .exitProcess(false)
      .fail((message: string | null, problem: Error | undefined) => {
        if (problem !== undefined && problem.name !== "YError") throw problem;
        throw new UsageError(message ?? problem?.message ?? "invalid arguments");
      })
      .parseAsync();
  } catch (problem) {
    if (!(problem instanceof UsageError)) throw problem;
    makeLogger(false, io.log).error(problem.message);
    return 1;
  }

  return status;
};
