/**
 * Environment Variable Validation & Type-Safe Access
 * Validates all required env vars at startup, fails fast if missing
 */

import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),
  DEBUG_SQL: booleanString,

  // Auth (HS256 secret used to verify realtime bearer tokens)
  AUTH_SECRET: z.string().min(32),

  // Server
  PORT: z.coerce.number().int().positive().default(8080),
  REALTIME_PATH: z.string().startsWith('/').default('/ws'),

  // Realtime tuning
  REALTIME_DISPATCH_QUEUE_SIZE: z.coerce.number().int().positive().default(256),
  REALTIME_SESSION_QUEUE_SIZE: z.coerce.number().int().positive().default(256),
  REALTIME_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  REALTIME_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REALTIME_MAX_MESSAGE_BYTES: z.coerce.number().int().positive().default(1024),

  // App Config
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.errors
    .filter((e) => e.message === 'Required')
    .map((e) => e.path.join('.'));

  console.error('Invalid environment variables:');
  console.error(result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n'));

  if (missing.length > 0) {
    console.error('\nMissing required variables:', missing.join(', '));
  }
  throw new Error('Environment validation failed');
}

/**
 * Validated environment variables
 * Throws at module load time if validation fails
 */
export const env = parseEnv(process.env);

/**
 * Realtime settings derived from env. The ping period sits inside the read
 * deadline so a healthy peer always refreshes it in time.
 */
export const realtimeConfig = {
  path: env.REALTIME_PATH,
  dispatchQueueSize: env.REALTIME_DISPATCH_QUEUE_SIZE,
  sessionQueueSize: env.REALTIME_SESSION_QUEUE_SIZE,
  readTimeoutMs: env.REALTIME_READ_TIMEOUT_MS,
  writeTimeoutMs: env.REALTIME_WRITE_TIMEOUT_MS,
  pingIntervalMs: Math.floor((env.REALTIME_READ_TIMEOUT_MS * 9) / 10),
  maxMessageBytes: env.REALTIME_MAX_MESSAGE_BYTES,
} as const;
