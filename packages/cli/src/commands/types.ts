import type { FlakeAnalysisService } from '@flakelens/api';
import type { Logger } from '@flakelens/shared';
import type { ChalkInstance } from 'chalk';

import type { CliIO } from '../context.js';

export interface CommandEnvironment {
  readonly io: CliIO;
  readonly palette: ChalkInstance;
  readonly log: Logger;
  openService(): Promise<FlakeAnalysisService>;
}
