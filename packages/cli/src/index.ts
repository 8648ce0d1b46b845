#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program.js';
import { ConfigError } from './config/index.js';

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exit(1);
});
