#!/usr/bin/env -S node --import tsx
import process from 'node:process';
import { run } from './cli.js';

process.exitCode = run(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
});
