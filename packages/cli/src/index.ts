export { cli } from "./cli.js";
export type { Io } from "./cli.js";
export { diffCommand, evalCommand, varsCommand } from "./commands.js";
export type { CommandContext } from "./commands.js";
export { makeLogger } from "./logger.js";
export {
  VariablesError,
  loadVariables,
  parseAssignments,
  resolveVariables,
} from "./vars.js";
