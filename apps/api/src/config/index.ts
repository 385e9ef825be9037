import { POLICY_FILE_NAME } from '@flakelens/shared';
import { z } from 'zod';

const numberFromEnv = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, received "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberFromEnv.default('3000'),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  RATE_LIMIT_MAX: numberFromEnv.default('100'),
  RATE_LIMIT_WINDOW_MS: numberFromEnv.default('60000'),
  // Engine
  FLAKELENS_STORE: z.string().default('.flakelens/results.json'),
  FLAKELENS_POLICY_FILE: z.string().default(POLICY_FILE_NAME),
  COST_PER_RUN_USD: numberFromEnv.optional(),
  RERUN_MULTIPLIER: numberFromEnv.optional(),
  MIN_RUNS: numberFromEnv.optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    corsOrigin: parsed.CORS_ORIGIN,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
    rateLimitWindow: parsed.RATE_LIMIT_WINDOW_MS,
    storePath: parsed.FLAKELENS_STORE,
    policyFile: parsed.FLAKELENS_POLICY_FILE,
    engine: {
      costPerRunUsd: parsed.COST_PER_RUN_USD,
      rerunMultiplier: parsed.RERUN_MULTIPLIER,
      minSampleSize: parsed.MIN_RUNS,
    },
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config = loadConfig();
