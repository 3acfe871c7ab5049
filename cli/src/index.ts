#!/usr/bin/env node

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { ErrorHandler } from '@cfupdater/utils';
import { createProgram } from './program.js';

const program = createProgram();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // commander has already printed usage errors; --help and --version land here with exit code 0
    process.exit(error.exitCode);
  }
  console.error(chalk.red(`Error: ${ErrorHandler.describe(error)}`));
  process.exit(1);
}
