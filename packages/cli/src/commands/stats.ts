import { Option, type Command } from 'commander';

import { renderStats } from '../render/report.js';

import { addPolicyOptions, policyFromOptions, type PolicyOptions } from './policy-options.js';
import type { CommandEnvironment } from './types.js';

interface StatsCommandOptions extends PolicyOptions {
  output: 'text' | 'json';
}

export function registerStatsCommand(program: Command, env: CommandEnvironment): void {
  const command = program
    .command('stats')
    .description('Summarise the result store')
    .addOption(new Option('--output <format>', 'output format').choices(['text', 'json']).default('text'));

  addPolicyOptions(command).action(async (options: StatsCommandOptions) => {
    const service = await env.openService();
    const stats = service.stats(policyFromOptions(options));

    env.io.stdout(options.output === 'json' ? JSON.stringify(stats, null, 2) + '\n' : renderStats(stats));
  });
}
