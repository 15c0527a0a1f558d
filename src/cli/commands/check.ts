/**
 * Check Command
 *
 * Ask the Fallback Escalator whether a failing chain should fall back.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { openEngine, printDecision } from '../shared.js';

interface CheckOptions {
  dataDir?: string;
  catalog?: string;
  chain?: string;
  output: string;
}

export const checkCommand = new Command('check')
  .description('Decide whether failed providers should fall back')
  .argument('<providers...>', 'Failed provider ids')
  .option('-d, --data-dir <path>', 'Data directory path (default: $SWITCHYARD_DATA_DIR or ./data)')
  .option('-c, --catalog <path>', 'Capability catalog JSON file')
  .option('--chain <id>', 'Request chain to inspect')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action((providers: string[], options: CheckOptions) => {
    const spinner = ora('Checking failure history...').start();

    try {
      const engine = openEngine(options);
      const decision = engine.check(providers, options.chain);
      engine.close();

      spinner.succeed('Fallback check complete');

      if (options.output === 'json') {
        console.log(JSON.stringify(decision, null, 2));
      } else {
        printDecision(decision);
        console.log();
      }

    } catch (error) {
      spinner.fail(chalk.red('Fallback check failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
