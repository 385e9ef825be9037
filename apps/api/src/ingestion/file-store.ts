/**
 * JSON-file backed result store
 *
 * Persists exactly the run records and test results; statistics are never
 * written. Each change rewrites the snapshot through a temp file and rename.
 */

import { readFile, rename, writeFile } from 'fs/promises';

import {
  ValidationError,
  testStatusSchema,
  toValidationIssues,
  type RunRecord,
  type TestResult,
} from '@flakelens/shared';
import { z } from 'zod';

import { logger } from '../utils/logger.js';

import { InMemoryResultStore } from './store.js';
import { ensureDirectoryExists } from './utils.js';

const STORE_FILE_VERSION = 1;

const storeFileSchema = z.object({
  version: z.literal(STORE_FILE_VERSION),
  runs: z.array(z.object({
    runId: z.string().min(1),
    ingestedAt: z.coerce.date(),
    costPerRunUsd: z.number().nonnegative().optional(),
    source: z.string().optional(),
    resultCount: z.number().int().nonnegative(),
  })),
  results: z.array(z.object({
    testId: z.string().min(1),
    runId: z.string().min(1),
    status: testStatusSchema,
    durationSeconds: z.number().nonnegative(),
    errorMessage: z.string().optional(),
    timestamp: z.coerce.date(),
    position: z.number().int().nonnegative().optional(),
  })),
});

export class JsonFileResultStore extends InMemoryResultStore {
  private constructor(private readonly path: string) {
    super();
  }

  /**
   * Open a store file, creating an empty store when it does not exist yet
   */
  public static async open(path: string): Promise<JsonFileResultStore> {
    const store = new JsonFileResultStore(path);

    let content: string | null = null;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    if (content !== null) {
      const { runs, results } = JsonFileResultStore.decode(content, path);
      store.restore(runs, results);
      logger.debug({ path, runs: runs.length, results: results.length }, 'Loaded result store');
    }

    return store;
  }

  private static decode(content: string, path: string): { runs: RunRecord[]; results: TestResult[] } {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(
        `Result store ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Result store ${path} is corrupt`, toValidationIssues(parsed.error.issues));
    }
    return parsed.data;
  }

  protected override async persist(): Promise<void> {
    const file = {
      version: STORE_FILE_VERSION,
      runs: this.runRecords().map(run => ({
        ...run,
        ingestedAt: run.ingestedAt.toISOString(),
      })),
      results: this.allResults().map(result => ({
        ...result,
        timestamp: result.timestamp.toISOString(),
      })),
    };

    await ensureDirectoryExists(this.path);
    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, JSON.stringify(file, null, 2) + '\n', 'utf-8');
    await rename(tempPath, this.path);
  }
}
