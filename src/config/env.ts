import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // "1" turns every log line off (tests set it through vitest.config.ts)
  DISABLE_LOGGING: z
    .string()
    .default('0')
    .transform((v) => v === '1'),
  // Timeouts (in milliseconds)
  TX_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  BULK_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ESTIMATED_DELIVERY_DAYS: z.coerce.number().int().nonnegative().default(7),
  SEED_FILE: z.string().optional(),
});

export type EnvVars = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvVars {
  const rawEnv: Record<string, string | undefined> = {};

  for (const key of Object.keys(envSchema.shape)) {
    rawEnv[key] = source[key];
  }

  return envSchema.parse(rawEnv);
}

export const env = loadEnv();
