#!/usr/bin/env node

import { getEnvironmentVariables } from './env.js';
import { main } from './main.js';

/**
 * The entrypoint to this tool.
 */
async function cli() {
  process.exitCode = await main({
    argv: process.argv,
    env: getEnvironmentVariables(),
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

cli().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
