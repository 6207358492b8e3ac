#!/usr/bin/env node
import { runCli } from './cli-program.js';

// Centralized exit path to guarantee a single, reasoned exit
let hasExited = false;
function exitWith(code: number, reason: string, tag = 'EXIT-CLI'): never {
  if (code !== 0) {
    try {
      process.stderr.write(`[VRB] transcript-runner ${tag}: ${reason}\n`);
    } catch { /* stderr closed */ }
  }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    exitWith(code, code === 0 ? 'all transcripts passed' : 'transcripts failed', code === 0 ? 'EXIT-OK' : 'EXIT-FAILED');
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
    exitWith(1, message, 'EXIT-UNCAUGHT');
  });
