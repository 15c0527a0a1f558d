/**
 * Stats Command
 *
 * Display learning statistics.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { openEngine } from '../shared.js';

interface StatsOptions {
  dataDir?: string;
  catalog?: string;
  output: string;
}

export const statsCommand = new Command('stats')
  .description('Display learning statistics')
  .option('-d, --data-dir <path>', 'Data directory path (default: $SWITCHYARD_DATA_DIR or ./data)')
  .option('-c, --catalog <path>', 'Capability catalog JSON file')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action((options: StatsOptions) => {
    const spinner = ora('Gathering statistics...').start();

    try {
      const engine = openEngine(options);
      const stats = engine.statistics();
      engine.close();
      spinner.succeed('Statistics gathered');

      const weights = Array.from(stats.perProviderWeights.values());

      if (options.output === 'json') {
        console.log(JSON.stringify({ ...stats, perProviderWeights: weights }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Switchyard Learning Statistics'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log();
      console.log(chalk.dim('Records:'), chalk.white(stats.totalRecords.toString()));
      console.log(chalk.dim('Success rate:'), chalk.white(`${(stats.overallSuccessRate * 100).toFixed(1)}%`));
      console.log();
      console.log(chalk.dim('By status:'));
      for (const [status, count] of Object.entries(stats.statusCounts)) {
        if (count > 0) console.log(chalk.dim(`  ${status}:`), chalk.white(count.toString()));
      }
      console.log();
      console.log(chalk.dim('Providers:'));
      for (const weight of weights) {
        console.log(
          chalk.white(`  ${weight.providerId.padEnd(20)}`),
          chalk.dim('score'), weight.avgScore.toFixed(3),
          chalk.dim('uses'), weight.useCount.toString(),
          chalk.dim('ok'), weight.successCount.toString(),
          chalk.dim('latency'), `${Math.round(weight.avgLatencyMs)}ms`
        );
      }
      console.log();

    } catch (error) {
      spinner.fail(chalk.red('Failed to gather statistics'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
