import { z } from 'zod';

import type { EngineOverrides } from '../policy/config.js';

/**
 * Per-request engine overrides accepted as query parameters
 */
export const policyQuerySchema = z.object({
  minRuns: z.coerce.number().int().min(1).optional(),
  minFlipRate: z.coerce.number().min(0).max(1).optional(),
  minCostUsd: z.coerce.number().min(0).optional(),
  costPerRunUsd: z.coerce.number().min(0).optional(),
  rerunMultiplier: z.coerce.number().min(0).optional(),
  exempt: z.string().optional(),
});

export type PolicyQuery = z.infer<typeof policyQuerySchema>;

export function queryToOverrides(query: PolicyQuery): EngineOverrides {
  return {
    minSampleSize: query.minRuns,
    minFlipRate: query.minFlipRate,
    minCostUsd: query.minCostUsd,
    costPerRunUsd: query.costPerRunUsd,
    rerunMultiplier: query.rerunMultiplier,
    exemptTests: query.exempt
      ?.split(',')
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0),
  };
}
