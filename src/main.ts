#!/usr/bin/env node
import {run} from './cli';

run(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 70; // EX_SOFTWARE
  },
);
