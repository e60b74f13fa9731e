#!/usr/bin/env node
import { runGrammarwalk } from './cli-core';
import { errorMessage } from '../utils/errors';

process.on('unhandledRejection', (reason) => {
  console.error(`❌ Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

runGrammarwalk(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`❌ Uncaught exception: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
