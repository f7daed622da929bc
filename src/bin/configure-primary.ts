#!/usr/bin/env node
import { buildRoleProgram } from '../cli.js';

buildRoleProgram('primary', (code) => {
  process.exitCode = code;
})
  .parseAsync(process.argv)
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
