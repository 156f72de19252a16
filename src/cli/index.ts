#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program';

const program = createProgram({
  onExit: (err) => {
    if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(0);
    }
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(1);
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
