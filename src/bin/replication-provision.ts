#!/usr/bin/env node
import { buildProgram } from '../cli.js';

buildProgram((code) => {
  process.exitCode = code;
})
  .parseAsync(process.argv)
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
