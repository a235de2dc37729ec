import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DATABASE_URL: z.string().url().default('postgres://lemmy@localhost:5432/lemmy'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DATABASE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  DATABASE_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  FEDERATION_API_URL: z.string().url().default('http://localhost:8536'),
  FEDERATION_USERNAME: z.string().min(1).optional(),
  FEDERATION_PASSWORD: z.string().min(1).optional(),
  FEDERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  UPSTREAM_VALIDATION_ENABLED: booleanFlag('true'),

  INSTANCE_ALLOWLIST_ENABLED: booleanFlag('true'),
  INSTANCES_CSV_URL: z
    .string()
    .url()
    .default('https://raw.githubusercontent.com/maltfield/awesome-lemmy-instances/main/awesome-lemmy-instances.csv'),
  INSTANCE_REFRESH_CRON: z.string().min(1).default('0 0 * * *'),
  INVALIDATE_IDENTITY_ON_UPSTREAM_MISS: booleanFlag('false'),

  IDENTITY_CACHE_TTL_SECONDS: z.coerce.number().positive().default(180),
  AGGREGATE_CACHE_TTL_SECONDS: z.coerce.number().positive().default(180),
  VOTES_CACHE_TTL_SECONDS: z.coerce.number().positive().default(60),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(256),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
  CORS_ORIGIN: z.string().default('*'),
});

type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return parsed.data;
}

export const env = loadEnv();
