import { Option, type Command } from 'commander';

import { renderDetectTable } from '../render/report.js';

import { addPolicyOptions, policyFromOptions, type PolicyOptions } from './policy-options.js';
import type { CommandEnvironment } from './types.js';

interface DetectCommandOptions extends PolicyOptions {
  output: 'table' | 'json';
  all?: boolean;
}

export function registerDetectCommand(program: Command, env: CommandEnvironment): void {
  const command = program
    .command('detect')
    .description('Report flip rate, root cause and cost per test')
    .addOption(new Option('--output <format>', 'output format').choices(['table', 'json']).default('table'))
    .option('--all', 'include tests that are not flaky');

  addPolicyOptions(command).action(async (options: DetectCommandOptions) => {
    const policy = policyFromOptions(options);
    const service = await env.openService();
    const statistics = service.detect(policy);

    if (options.output === 'json') {
      const rows = options.all ? statistics : statistics.filter(entry => entry.isFlaky);
      env.io.stdout(JSON.stringify(rows, null, 2) + '\n');
      return;
    }

    env.io.stdout(renderDetectTable(statistics, env.palette, { all: options.all }));
  });
}
