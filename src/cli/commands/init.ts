/**
 * Init Command
 *
 * Initialize the Switchyard data directory and database.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { openEngine } from '../shared.js';

interface InitOptions {
  dataDir?: string;
  catalog?: string;
}

export const initCommand = new Command('init')
  .description('Initialize the Switchyard data directory')
  .option('-d, --data-dir <path>', 'Data directory path (default: $SWITCHYARD_DATA_DIR or ./data)')
  .option('-c, --catalog <path>', 'Capability catalog JSON file')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing Switchyard...').start();

    try {
      const engine = openEngine(options);
      const catalog = engine.getCatalog();
      const { dataDir, storage } = engine.getConfig();
      const dbPath = storage.sqlitePath;
      engine.close();

      spinner.succeed(chalk.green('Switchyard initialized successfully!'));
      console.log();
      console.log(chalk.dim('Data directory:'), dataDir);
      console.log(chalk.dim('Database:'), dbPath);
      console.log(chalk.dim('Providers:'), catalog.size.toString());
      for (const category of catalog.categories()) {
        const ids = catalog.byCategory(category).map(p => p.id);
        console.log(chalk.dim(`  ${category}:`), ids.join(', '));
      }
      console.log();
      console.log(chalk.cyan('Next steps:'));
      console.log('  switchyard route "What is the latest inflation rate?"');
      console.log('  switchyard stats');

    } catch (error) {
      spinner.fail(chalk.red('Initialization failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
