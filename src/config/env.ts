/**
 * Environment configuration
 *
 * Parsed once from process.env; entry points load .env through dotenv/config
 * before importing this module.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),
  MONGO_URL: z.string().default('mongodb://127.0.0.1:27017/dase'),
  STORAGE: z.enum(['mongo', 'memory']).default('mongo'),
  ENGINE_JSON: z.string().default('engine.json'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export const env: Env = parseEnv(process.env);
