/**
 * Recommend Command
 *
 * Rank catalog providers for a failure context.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { ProviderCategory } from '../../core/types.js';
import { openEngine, parseCountOption } from '../shared.js';

interface RecommendOptions {
  dataDir?: string;
  catalog?: string;
  exclude?: string;
  category?: string[];
  limit: string;
  output: string;
}

export const recommendCommand = new Command('recommend')
  .description('Recommend providers for a failure context')
  .argument('<context...>', 'Failure context (request text, error message)')
  .option('-d, --data-dir <path>', 'Data directory path (default: $SWITCHYARD_DATA_DIR or ./data)')
  .option('-c, --catalog <path>', 'Capability catalog JSON file')
  .option('-x, --exclude <ids>', 'Comma-separated providers to exclude')
  .option('--category <category...>', 'Only these categories')
  .option('-l, --limit <n>', 'Maximum recommendations', '5')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action((contextParts: string[], options: RecommendOptions) => {
    const spinner = ora('Matching providers...').start();

    try {
      const categories = options.category
        ? z.array(z.nativeEnum(ProviderCategory)).parse(options.category)
        : undefined;
      const exclude = options.exclude ? options.exclude.split(',').map(id => id.trim()) : [];
      const maxResults = parseCountOption('limit', options.limit);

      const engine = openEngine(options);
      const recommendations = engine.recommend(contextParts.join(' '), exclude, {
        maxResults,
        ...(categories ? { categories } : {})
      });
      engine.close();

      spinner.succeed(`Found ${recommendations.length} recommendation(s)`);

      if (options.output === 'json') {
        console.log(JSON.stringify(recommendations, null, 2));
        return;
      }

      console.log();
      if (recommendations.length === 0) {
        console.log(chalk.yellow('No provider matches this context'));
      }
      for (const rec of recommendations) {
        console.log(
          chalk.cyan(rec.providerId.padEnd(20)),
          chalk.white(rec.confidence.toFixed(2)),
          chalk.dim(`[${rec.matchedKeywords.join(', ')}]`)
        );
        if (rec.description) {
          console.log(chalk.dim(`  ${rec.description}`));
        }
      }
      console.log();

    } catch (error) {
      spinner.fail(chalk.red('Recommendation failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
