#!/usr/bin/env node
/**
 * Switchyard CLI
 *
 * Command-line interface for the Switchyard provider router.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { routeCommand } from './commands/route.js';
import { recommendCommand } from './commands/recommend.js';
import { checkCommand } from './commands/check.js';
import { statsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('switchyard')
  .description('Switchyard - Adaptive provider routing with fallback escalation')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(routeCommand);
program.addCommand(recommendCommand);
program.addCommand(checkCommand);
program.addCommand(statsCommand);

program.parse();
