#!/usr/bin/env node
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    // The hook fails open on its own; this only catches CLI faults
    console.error('[deletion-guard] error:', error);
    process.exitCode = 1;
  });
