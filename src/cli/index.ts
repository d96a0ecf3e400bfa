#!/usr/bin/env node
import { CommanderError } from "commander";
import { buildProgram } from "./program.js";

try {
  buildProgram().parse(process.argv);
} catch (err) {
  if (!(err instanceof CommanderError)) throw err;
  process.exitCode = err.exitCode;
}
