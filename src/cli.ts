#!/usr/bin/env node
// src/cli.ts
import { cliEntrypoint } from "./cli-util.js";
import { buildProgram } from "./update.js";

cliEntrypoint(() => buildProgram()).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
