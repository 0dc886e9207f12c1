#!/usr/bin/env node
import process from "node:process";
import { run } from "./cli.js";
import { errorMessage } from "./errors.js";

try {
  process.exitCode = await run(process.argv.slice(2));
} catch (error) {
  console.error(`lum: ${errorMessage(error)}`);
  process.exitCode = 1;
}
