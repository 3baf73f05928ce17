#!/usr/bin/env node

import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { createProgram } from './program';

// Load environment variables
dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`❌ Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
