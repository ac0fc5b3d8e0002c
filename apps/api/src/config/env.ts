/**
 * Runtime configuration, read from the environment (and `.env` via dotenv).
 * An invalid value aborts startup with the ZodError.
 */

import { z } from 'zod';
import { NASA_ISS_OEM_XML_URL } from '@iss-tracker/adapters';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  OEM_FEED_URL: z.string().url().default(NASA_ISS_OEM_XML_URL),
  /** 0 disables periodic refresh */
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(0).default(12 * 60 * 60 * 1000),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FEED_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  FEED_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  LOG_REQUESTS: booleanString.default('true'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}
