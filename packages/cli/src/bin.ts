#!/usr/bin/env node
import { createProgram } from "./index.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: Error) => {
    console.error(`\nError: ${err.message}`);
    process.exit(1);
  });
