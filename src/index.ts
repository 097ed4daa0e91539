#!/usr/bin/env node
/**
 * link-toast 進入點
 */

import { config } from 'dotenv';
import { run } from './interfaces/cli.js';

config();

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
