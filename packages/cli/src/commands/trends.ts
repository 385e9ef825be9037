import { DEFAULT_TREND_OPTIONS } from '@flakelens/shared';
import { Option, type Command } from 'commander';

import { renderTrendTable } from '../render/report.js';

import { parsePositiveInteger } from './policy-options.js';
import type { CommandEnvironment } from './types.js';

interface TrendsCommandOptions {
  days: number;
  minRuns?: number;
  output: 'table' | 'json';
}

export function registerTrendsCommand(program: Command, env: CommandEnvironment): void {
  program
    .command('trends')
    .description('Show whether each test is failing more or less often over recent runs')
    .option('--days <n>', 'analysis window in days', parsePositiveInteger, DEFAULT_TREND_OPTIONS.windowDays)
    .option('--min-runs <n>', 'observations in the window required per test', parsePositiveInteger)
    .addOption(new Option('--output <format>', 'output format').choices(['table', 'json']).default('table'))
    .action(async (options: TrendsCommandOptions) => {
      const service = await env.openService();
      const trends = service.trends(options.days, { minSampleSize: options.minRuns });

      if (options.output === 'json') {
        env.io.stdout(JSON.stringify(trends, null, 2) + '\n');
        return;
      }

      env.io.stdout(renderTrendTable(trends, env.palette, options.days));
    });
}
