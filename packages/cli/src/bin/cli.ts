#!/usr/bin/env node

import { logger as engineLogger } from '@flakelens/api';
import { ValidationError } from '@flakelens/shared';
import chalk from 'chalk';
import { CommanderError } from 'commander';

import { createProgram } from '../program.js';

// Engine progress logs are noise on a terminal unless asked for
if (process.env.LOG_LEVEL === undefined) {
  engineLogger.level = 'warn';
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(chalk.red.bold('✗ ') + chalk.red(error instanceof Error ? error.message : String(error)));
    if (error instanceof ValidationError) {
      for (const issue of error.issues) {
        console.error(chalk.gray(`  ${issue.path}: ${issue.message}`));
      }
    }
    process.exitCode = 1;
  }
}

void main();
