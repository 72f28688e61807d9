#!/usr/bin/env node

/**
 * Course Planner - Main Entry Point
 */

import { config } from 'dotenv';
import { runCli } from './cli.js';
import { logger } from './logger.js';

// Load environment variables
config();

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    logger.error('CLI', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
