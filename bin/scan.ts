#!/usr/bin/env node
import { types } from 'util';
import { runScan } from '../lib/cli';
import { errorMessage } from '../lib/utils';

runScan(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`policy-scan: ${types.isNativeError(error) ? (error.stack ?? error.message) : errorMessage(error)}\n`);
    process.exitCode = 2;
  });
