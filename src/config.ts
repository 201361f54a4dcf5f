import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  SEARCH_CONCURRENCY: z.coerce.number().int().positive().default(100),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RETRY_MAX: z.coerce.number().int().nonnegative().default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  CDN_FILE: z.string().optional(),
  CLIP_STRIDE: z.coerce.number().int().positive().default(1),
  USER_AGENT: z.string().default('curl/7.54.0'),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
