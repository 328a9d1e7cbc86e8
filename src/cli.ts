#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './cli/program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Fatal:', error);
    process.exit(1);
  });
