import { z, type ZodIssue } from 'zod';

import { INGESTION_SETTINGS } from '../constants/index.js';
import { ValidationError, type ValidationIssue } from '../errors/index.js';
import type { NormalizedResult } from '../types/ingestion.js';

export const testStatusSchema = z.enum(['pass', 'fail', 'error', 'skipped']);

export const normalizedResultSchema = z.object({
  testId: z.string().trim().min(1, 'testId is required'),
  status: testStatusSchema,
  durationSeconds: z.number().finite().nonnegative(),
  errorMessage: z.string().max(INGESTION_SETTINGS.MAX_ERROR_MESSAGE_LENGTH).optional(),
  timestamp: z.coerce.date().optional(),
  position: z.number().int().nonnegative().optional(),
});

export const ingestRunRequestSchema = z.object({
  runId: z.string().trim().min(1, 'runId is required'),
  timestamp: z.coerce.date().optional(),
  costPerRunUsd: z.number().finite().nonnegative().optional(),
  source: z.string().optional(),
  results: z.array(z.unknown()),
});

export type NormalizedResultInput = z.input<typeof normalizedResultSchema>;
export type IngestRunRequest = z.infer<typeof ingestRunRequestSchema>;

export function toValidationIssues(issues: readonly ZodIssue[], prefix = ''): ValidationIssue[] {
  return issues.map(issue => ({
    path: [prefix, ...issue.path.map(String)].filter(Boolean).join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a whole batch of results for one run. Either every entry is valid
 * or a single ValidationError lists every problem found.
 */
export function validateResults(runId: string, input: readonly unknown[]): NormalizedResult[] {
  const issues: ValidationIssue[] = [];
  const results: NormalizedResult[] = [];
  const seen = new Set<string>();

  input.forEach((entry, index) => {
    const parsed = normalizedResultSchema.safeParse(entry);
    if (!parsed.success) {
      issues.push(...toValidationIssues(parsed.error.issues, `results.${index}`));
      return;
    }

    if (seen.has(parsed.data.testId)) {
      issues.push({
        path: `results.${index}.testId`,
        message: `Duplicate test ${parsed.data.testId} within run ${runId}`,
      });
      return;
    }

    seen.add(parsed.data.testId);
    results.push(parsed.data);
  });

  if (issues.length > 0) {
    throw new ValidationError(
      `Run ${runId} rejected: ${issues.length} invalid result(s)`,
      issues,
      runId
    );
  }

  return results;
}
