import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  AUTH_TOKEN_SECRET: z.string().min(32).default('dev-token-secret-change-me-0123456789'),
  AUTH_TOKEN_ISSUER: z.string().min(1).default('credential-lifecycle'),
  AUTH_ACCESS_TOKEN_LIFETIME_MINUTES: z.coerce.number().positive().default(3600),
  AUTH_REFRESH_TOKEN_LIFETIME_DAYS: z.coerce.number().positive().default(7),
  AUTH_REQUIRE_EMAIL_VERIFICATION: booleanFlag.default(false),
  AUTH_VERIFICATION_CODE_TTL_HOURS: z.coerce.number().int().positive().default(24),
  AUTH_RESET_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  ADMIN_EMAIL: z.preprocess(blankToUndefined, z.string().email().optional()),
  ADMIN_PASSWORD: z.preprocess(blankToUndefined, z.string().min(1).optional())
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return envSchema.parse({
    ...process.env,
    ...overrides
  });
}
