#!/usr/bin/env node
/**
 * cdchat command-line entry point
 */

import process from 'node:process';
import { createProgram } from './program.js';
import { serveUntilSignal } from './server.js';

const program = createProgram({
  env: process.env,
  out: (text) => {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  err: (text) => {
    process.stderr.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  write: (chunk, stream) => {
    (stream === 'stdout' ? process.stdout : process.stderr).write(chunk);
  },
  exit: (code) => {
    process.exitCode = code;
  },
  interactive: process.stdin.isTTY === true,
  serve: serveUntilSignal,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`❌ ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
