/**
 * Helpers shared by the CLI commands.
 */

import chalk from 'chalk';
import { z } from 'zod';
import { RoutingEngine } from '../core/RoutingEngine.js';
import type { SelectionPlan } from '../core/types.js';
import type { FallbackDecision } from '../failure/types.js';

export interface EngineCliOptions {
  dataDir?: string;
  catalog?: string;
}

/**
 * Positive integer option such as --limit
 */
export const CountOptionSchema = z.coerce.number().int().positive();

export function parseCountOption(name: string, raw: string): number {
  const parsed = CountOptionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`--${name} must be a positive integer (got "${raw}")`);
  }
  return parsed.data;
}

export function openEngine(options: EngineCliOptions): RoutingEngine {
  const engine = new RoutingEngine({
    config: {
      ...(options.dataDir ? { dataDir: options.dataDir } : {}),
      ...(options.catalog ? { catalogPath: options.catalog } : {})
    }
  });
  engine.initialize();
  return engine;
}

export function printPlan(plan: SelectionPlan): void {
  console.log();
  console.log(chalk.dim('Request:'), plan.request.text);
  console.log(chalk.dim('Complexity:'), chalk.white(plan.complexity));
  console.log(chalk.dim('Category:'), chalk.white(plan.primaryCategory));

  if (plan.status === 'unresolved') {
    console.log(chalk.yellow(`No provider available for category "${plan.primaryCategory}"`));
    return;
  }

  console.log(chalk.dim('Primary:'), chalk.cyan(plan.primary));
  if (plan.secondaries.length > 0) {
    console.log(chalk.dim('Secondaries:'), plan.secondaries.join(', '));
  }
  console.log(chalk.dim('Execution order:'), plan.executionOrder.join(' -> '));
  console.log(chalk.dim('Confidence:'), chalk.white(plan.confidence.toFixed(2)));
}

export function printDecision(decision: FallbackDecision): void {
  console.log();
  if (!decision.shouldFallback) {
    console.log(chalk.green(decision.description));
    return;
  }

  const color = decision.userVisible ? chalk.red : chalk.yellow;
  console.log(color(`Level ${decision.level}: ${decision.description}`));
  console.log(chalk.dim('Chain:'), decision.chainId ?? '-');
  console.log(chalk.dim('Failure streak:'), decision.failureStreak.toString());
  console.log(chalk.dim('Recommended tools:'), decision.recommendedTools.join(', ') || 'none');
  if (decision.recommendedServices.length > 0) {
    console.log(chalk.dim('Recommended services:'), decision.recommendedServices.join(', '));
  }
  for (const check of decision.suggestedChecks) {
    console.log(chalk.dim('  -'), check);
  }
}
