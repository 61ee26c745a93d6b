#!/usr/bin/env node
// ============================================================================
// @numerals/cli — Entry point
// ============================================================================

import { runCli } from './commands.js';

process.exitCode = runCli(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
