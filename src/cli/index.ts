#!/usr/bin/env node

import { causeChain, getErrorMessage } from "../errors/index.js";
import { createProgram } from "./program.js";

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${getErrorMessage(error)}`);
  if (process.argv.includes("--debug")) {
    for (const cause of causeChain(error).slice(1)) {
      console.error(`   caused by: ${getErrorMessage(cause)}`);
    }
  }
  process.exitCode = 1;
});
