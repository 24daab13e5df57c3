#!/usr/bin/env node
import { run } from './cli.js';
import * as logger from './utils/logger.js';

try {
  process.exitCode = run(process.argv.slice(2), { stdout: process.stdout });
} catch (err) {
  logger.error('Fatal error', err);
  process.exitCode = 1;
}
