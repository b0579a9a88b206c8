#!/usr/bin/env node
/**
 * Evaluation runner for the watchlist screening prompt
 */

import { config } from 'dotenv';
import { runCli } from './cli.js';

config();

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
