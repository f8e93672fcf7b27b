#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { danger } from "./globals.js";
import { formatError } from "./infra/errors.js";
import { defaultRuntime } from "./runtime.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(danger(formatError(err)));
    defaultRuntime.exit(1);
  });
