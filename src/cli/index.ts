#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program.js';

const program = createProgram();

if (process.argv.length === 2) {
  console.log(chalk.bold.cyan('\nMongoDB migrator\n'));
  program.help();
}

await program.parseAsync(process.argv);
