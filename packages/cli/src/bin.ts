#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { cli } from "./cli.js";

process.exitCode = await cli(hideBin(process.argv), {
  print: (line) => console.log(line),
  log: (line) => console.error(line),
});
