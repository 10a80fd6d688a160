import {
  StructError,
  assert,
  number,
  record,
  string,
} from "@metamask/superstruct";
import { readFile } from "node:fs/promises";

/** Variable bindings that could not be read from the command line or a file. */
export class VariablesError extends Error {
  data: { source: string; reason: string };

  constructor(source: string, reason: string) {
    super(`${source}: ${reason}`);
    this.data = { source, reason };
  }
}

const VariableFile = record(string(), number());

const numeral = /^[-+]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][-+]?[0-9]+)?$/;

const reason = (problem: unknown): string =>
  problem instanceof Error ? problem.message : String(problem);

/** Parses `name=value` assignments. A later assignment to a name wins. */
export const parseAssignments = (
  assignments: readonly string[],
): Map<string, number> => {
  const vars = new Map<string, number>();
  for (const assignment of assignments) {
    const i = assignment.indexOf("=");
    const name = assignment.slice(0, i).trim();
    if (i < 0 || name === "")
      throw new VariablesError(assignment, "expected name=value");
    const value = assignment.slice(i + 1).trim();
    if (!numeral.test(value))
      throw new VariablesError(assignment, `not a number: "${value}"`);
    vars.set(name, Number(value));
  }
  return vars;
};

/** Reads a JSON object mapping variable names to numbers. */
export const loadVariables = async (
  file: string,
): Promise<Map<string, number>> => {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf8"));
  } catch (problem) {
    throw new VariablesError(file, reason(problem));
  }
  try {
    assert(json, VariableFile);
  } catch (problem) {
    if (problem instanceof StructError)
      throw new VariablesError(file, problem.message);
    throw problem;
  }
  return new Map(Object.entries(json));
};

/** Bindings from `file`, if given, overridden by `assignments`. */
export const resolveVariables = async (
  file: string | undefined,
  assignments: readonly string[],
): Promise<Map<string, number>> => {
  const vars =
    file === undefined ? new Map<string, number>() : await loadVariables(file);
  for (const [name, value] of parseAssignments(assignments))
    vars.set(name, value);
  return vars;
};
