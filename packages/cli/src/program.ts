import { logger as engineLogger } from '@flakelens/api';
import { FLAKELENS_VERSION, type Logger } from '@flakelens/shared';
import { Command } from 'commander';

import { registerDetectCommand } from './commands/detect.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerQuarantineCommand } from './commands/quarantine.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerTrendsCommand } from './commands/trends.js';
import type { CommandEnvironment } from './commands/types.js';
import { createCliLogger, openService, processIO, type CliContext, type GlobalOptions } from './context.js';
import { createPalette } from './render/palette.js';

/**
 * Build the flakelens command tree. Commander errors are thrown as
 * CommanderError instead of exiting the process.
 */
export function createProgram(context: CliContext = {}): Command {
  const io = context.io ?? processIO;
  const program = new Command();

  program
    .name('flakelens')
    .description('Detect flaky tests, explain them, price them and quarantine them')
    .version(FLAKELENS_VERSION)
    .option('--store <path>', 'result store file (default: $FLAKELENS_STORE or .flakelens/results.json)')
    .option('--policy <path>', 'policy file (default: $FLAKELENS_POLICY_FILE or .flakelens.yml)')
    .option('-v, --verbose', 'log engine activity to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    });

  let log: Logger = createCliLogger(io, false);

  const env: CommandEnvironment = {
    io,
    palette: createPalette(io.color),
    get log() {
      return log;
    },
    openService: () => openService(context, program.opts<GlobalOptions>(), log),
  };

  program.hook('preAction', () => {
    const verbose = program.opts<GlobalOptions>().verbose === true;
    log = createCliLogger(io, verbose);
    if (verbose) {
      engineLogger.level = 'debug';
    }
  });

  registerIngestCommand(program, env);
  registerDetectCommand(program, env);
  registerQuarantineCommand(program, env);
  registerStatsCommand(program, env);
  registerTrendsCommand(program, env);

  return program;
}
