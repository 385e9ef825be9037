import { stat } from 'fs/promises';

import type { BatchIngestSummary, FileIngestOutcome } from '@flakelens/shared';
import { ValidationError } from '@flakelens/shared';
import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';

import { parseNonNegative } from './policy-options.js';
import type { CommandEnvironment } from './types.js';

interface IngestCommandOptions {
  runId?: string;
  costPerRun?: number;
}

function outcomeLine(outcome: FileIngestOutcome, palette: ChalkInstance): string {
  switch (outcome.status) {
    case 'ingested':
      return palette.green(`✓ ${outcome.file} → ${outcome.runId} (${outcome.testsRecorded} results)`);
    case 'duplicate':
      return palette.yellow(`↷ ${outcome.file} already ingested as ${outcome.runId}`);
    case 'invalid':
      return palette.red(`✗ ${outcome.file}: ${outcome.message ?? 'invalid report'}`);
  }
}

export function renderBatchSummary(summary: BatchIngestSummary, palette: ChalkInstance): string {
  const lines = summary.outcomes.map(outcome => outcomeLine(outcome, palette));
  lines.push(
    palette.bold(
      `${summary.filesIngested} file(s) ingested, ${summary.filesSkipped} skipped, ` +
      `${summary.filesInvalid} invalid, ${summary.testsRecorded} results recorded`
    )
  );
  return lines.join('\n') + '\n';
}

export function registerIngestCommand(program: Command, env: CommandEnvironment): void {
  program
    .command('ingest')
    .description('Ingest a JUnit XML report, or every report below a directory')
    .argument('<path>', 'report file or directory')
    .option('--run-id <id>', 'run id for a single report (generated when omitted)')
    .option('--cost-per-run <usd>', 'rerun cost for this run only', parseNonNegative)
    .action(async (path: string, options: IngestCommandOptions) => {
      const service = await env.openService();
      const target = await stat(path);

      if (target.isDirectory()) {
        if (options.runId !== undefined) {
          throw new ValidationError('--run-id applies to a single report, not a directory');
        }
        env.log.debug('Ingesting report directory', { path });
        const summary = await service.ingestDirectory(path, { costPerRunUsd: options.costPerRun });
        env.io.stdout(renderBatchSummary(summary, env.palette));
        return;
      }

      const run = await service.ingestReport(path, {
        runId: options.runId,
        costPerRunUsd: options.costPerRun,
      });
      env.io.stdout(env.palette.green(`✓ Ingested run ${run.runId} (${run.resultCount} results)`) + '\n');
    });
}
