import { writeFile } from 'fs/promises';

import { Option, type Command } from 'commander';

import { SKIP_LIST_FORMATS, renderSkipList, type QuarantineEntry, type SkipListFormat } from '../render/skip-list.js';

import { addPolicyOptions, policyFromOptions, type PolicyOptions } from './policy-options.js';
import type { CommandEnvironment } from './types.js';

interface QuarantineCommandOptions extends PolicyOptions {
  format: SkipListFormat;
  out?: string;
}

export function registerQuarantineCommand(program: Command, env: CommandEnvironment): void {
  const command = program
    .command('quarantine')
    .description('Emit a skip list of the tests to quarantine')
    .addOption(new Option('--format <format>', 'skip list format').choices(SKIP_LIST_FORMATS).default('pytest'))
    .option('--out <file>', 'write the skip list to a file instead of stdout');

  addPolicyOptions(command).action(async (options: QuarantineCommandOptions) => {
    const policy = policyFromOptions(options);
    const service = await env.openService();

    const statistics = new Map(service.detect(policy).map(entry => [entry.testId, entry]));
    const entries: QuarantineEntry[] = [];
    for (const testId of service.quarantine(policy)) {
      const entry = statistics.get(testId);
      if (entry) {
        entries.push({
          testId,
          flipRate: entry.flipRate,
          classification: entry.classification,
          estimatedCostUsd: entry.estimatedCostUsd,
        });
      }
    }

    const rendered = renderSkipList(options.format, entries);
    if (options.out) {
      await writeFile(options.out, rendered, 'utf-8');
      env.io.stderr(env.palette.green(`✓ ${entries.length} test(s) quarantined → ${options.out}`) + '\n');
      return;
    }

    env.io.stdout(rendered);
    env.io.stderr(env.palette.green(`✓ ${entries.length} test(s) quarantined`) + '\n');
  });
}
