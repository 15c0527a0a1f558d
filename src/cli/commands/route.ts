/**
 * Route Command
 *
 * Plan a request and, when an outcome is given, record it straight away.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { ResultStatus } from '../../core/types.js';
import { openEngine, printPlan } from '../shared.js';

interface RouteOptions {
  dataDir?: string;
  catalog?: string;
  chain?: string;
  status?: string;
  score: string;
  time: string;
  providers?: string;
  error?: string;
  satisfaction?: string;
  output: string;
}

const StatusSchema = z.nativeEnum(ResultStatus);

export const routeCommand = new Command('route')
  .description('Select providers for a request')
  .argument('<text...>', 'Request text')
  .option('-d, --data-dir <path>', 'Data directory path (default: $SWITCHYARD_DATA_DIR or ./data)')
  .option('-c, --catalog <path>', 'Capability catalog JSON file')
  .option('--chain <id>', 'Request chain this request continues')
  .option('-s, --status <status>', `Record an outcome (${Object.values(ResultStatus).join(', ')})`)
  .option('--score <n>', 'Success score of the outcome (0-1)', '1')
  .option('--time <ms>', 'Execution time of the outcome in ms', '0')
  .option('-p, --providers <ids>', 'Comma-separated providers used (defaults to the execution order)')
  .option('-e, --error <message>', 'Error message of a failed outcome')
  .option('--satisfaction <n>', 'User satisfaction (1-5)')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action((textParts: string[], options: RouteOptions) => {
    const spinner = ora('Selecting providers...').start();

    try {
      const status = options.status === undefined ? undefined : StatusSchema.parse(options.status);
      const engine = openEngine(options);

      const request = engine.createRequest({
        text: textParts.join(' '),
        ...(options.chain ? { chainId: options.chain } : {})
      });
      const plan = engine.select(request);

      let recordId: string | undefined;
      if (status !== undefined) {
        const providersUsed = options.providers
          ? options.providers.split(',').map(p => p.trim()).filter(p => p.length > 0)
          : [...plan.executionOrder];
        const record = engine.record(request, plan, {
          status,
          score: parseFloat(options.score),
          executionTimeMs: parseFloat(options.time),
          providersUsed,
          ...(options.error ? { error: options.error } : {}),
          ...(options.satisfaction ? { userSatisfaction: parseFloat(options.satisfaction) } : {})
        });
        recordId = record.id;
      }

      engine.close();
      spinner.succeed(plan.status === 'resolved' ? 'Plan ready' : 'No provider available');

      if (options.output === 'json') {
        console.log(JSON.stringify({ plan, recordId }, null, 2));
      } else {
        printPlan(plan);
        console.log(chalk.dim('Chain:'), request.chainId);
        if (recordId) {
          console.log(chalk.dim('Recorded:'), chalk.green(recordId));
        }
        console.log();
      }

    } catch (error) {
      spinner.fail(chalk.red('Routing failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
