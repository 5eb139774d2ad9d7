#!/usr/bin/env node

import { buildProgram, cliExitCode } from "./program.js";
import { errorMessage } from "./errors.js";
import { EXIT } from "./commands/exit-codes.js";

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  const code = cliExitCode(err);
  if (code === EXIT.UNEXPECTED) {
    process.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
  }
  process.exit(code);
});
