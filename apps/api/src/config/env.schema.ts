import { z } from 'zod';

export class EnvValidationError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    const lines = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Environment validation failed with the following issues:\n${lines}`);
    this.name = 'EnvValidationError';
  }
}

// Unset and empty read the same, so `FOO=` in a .env file falls back to the default.
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalUrl = z.preprocess(blankAsUndefined, z.string().url().optional());
const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const appSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  GLOBAL_PREFIX: z.string().default(''),
  CORS_ALLOWED_ORIGINS: z.string().default(''),
  THROTTLE_TTL_MS: millis(60_000),
  THROTTLE_LIMIT: z.coerce.number().int().positive().default(120),
});

const databaseSchema = z.object({
  DATABASE_URL: z.string().url(),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DB_SSL: flag,
  DB_TIMEOUT_MS: millis(200),
});

const cacheSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  CACHE_TIMEOUT_MS: millis(200),
  AVAILABLE_TTL_SECONDS: z.coerce.number().int().positive().default(86_400),
});

const upstreamSchema = z.object({
  FX_PROVIDER: z.preprocess(
    (v) => (typeof v === 'string' ? v.toUpperCase() : v),
    z.enum(['EXCHANGERATE_HOST', 'FRANKFURTER']).default('EXCHANGERATE_HOST'),
  ),
  FX_API_URL: optionalUrl,
  FX_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  FX_RATE_PLACES: z.coerce.number().int().min(0).max(10).default(4),
  FX_TIMEOUT_MS: millis(5_000),
  FORECAST_API_URL: optionalUrl,
  FORECAST_TIMEOUT_MS: millis(600_000),
});

const envSchema = appSchema.merge(databaseSchema).merge(cacheSchema).merge(upstreamSchema);

export type Env = z.infer<typeof envSchema>;

/** `ConfigModule.forRoot({ validate })` hook; throws on the first bad boot. */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) throw new EnvValidationError(result.error.issues);
  return result.data;
}
