#!/usr/bin/env tsx
import { exitWithError } from "./lib/exit.js";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    exitWithError(err);
  });
