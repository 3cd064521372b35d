#!/usr/bin/env node

import { runCli } from './cliRunner.js';

process.on('unhandledRejection', (err) => {
  // eslint-disable-next-line no-console
  console.error('[rustext] unhandledRejection', err);
  process.exit(1);
});

void runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[rustext]', err);
    process.exit(1);
  },
);
