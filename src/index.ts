#!/usr/bin/env node
import { runSetup } from './cli';

runSetup()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
