#!/usr/bin/env node
import process from 'node:process';
import { run } from './cli/run.js';

run(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  isTTY: process.stdout.isTTY,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof Error) {
      console.error(`domainprobe: ${err.message}`);
    } else {
      console.error('domainprobe: unexpected error', err);
    }
    process.exitCode = 1;
  });
