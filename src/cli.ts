#!/usr/bin/env node

import { runCli } from './telemetry/cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
