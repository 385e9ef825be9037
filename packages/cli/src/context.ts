import {
  FlakeAnalysisService,
  JsonFileResultStore,
  loadConfig,
  loadPolicyFile,
  policyToOverrides,
} from '@flakelens/api';
import { createLogger, type Logger } from '@flakelens/shared';
import chalk from 'chalk';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readonly color: boolean;
}

export interface CliContext {
  readonly io?: CliIO;
  readonly env?: NodeJS.ProcessEnv;
  readonly clock?: () => Date;
}

export type GlobalOptions = {
  store?: string;
  policy?: string;
  verbose?: boolean;
};

export const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  color: chalk.level > 0,
};

/**
 * CLI diagnostics go to stderr as JSON lines so stdout carries only command output
 */
export function createCliLogger(io: CliIO, verbose: boolean): Logger {
  return createLogger('flakelens:cli', {
    level: verbose ? 'debug' : 'warn',
    sink: {
      stdout: line => io.stderr(line + '\n'),
      stderr: line => io.stderr(line + '\n'),
    },
  });
}

/**
 * Open the result store and policy file named by the flags, falling back to
 * FLAKELENS_STORE and FLAKELENS_POLICY_FILE
 */
export async function openService(
  context: CliContext,
  globals: GlobalOptions,
  log: Logger
): Promise<FlakeAnalysisService> {
  const config = loadConfig(context.env ?? process.env);
  const storePath = globals.store ?? config.storePath;
  const policyPath = globals.policy ?? config.policyFile;

  log.debug('Opening result store', { storePath, policyPath });
  const store = await JsonFileResultStore.open(storePath);
  const policy = await loadPolicyFile(policyPath);

  return new FlakeAnalysisService(store, {
    defaults: policy ? [policyToOverrides(policy), config.engine] : [config.engine],
    clock: context.clock,
  });
}
