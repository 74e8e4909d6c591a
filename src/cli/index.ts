#!/usr/bin/env node

/**
 * drafter-lens CLI
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { reportCommand } from './commands/report.js';
import { watchCommand } from './commands/watch.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('drafter-lens')
  .description('Static analysis of Drafter websites: dataclasses, routes, components and complexity')
  .version('0.1.0');

// Register commands
program.addCommand(initCommand);
program.addCommand(analyzeCommand);
program.addCommand(reportCommand);
program.addCommand(watchCommand);

program.parse(process.argv);
