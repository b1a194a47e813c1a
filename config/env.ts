import { z } from 'zod';

import { ConfigError } from '../utils/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Winston level names (npm levels).
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  // When set, logs are also written to daily-rotated files in this directory.
  LOG_DIR: z.string().trim().min(1).optional(),

  // Where prefix_<prefix>.txt files are written unless --out-dir is given.
  CODES_OUTPUT_DIR: z.string().trim().min(1).default('.'),

  // Default for --max-attempts. Unset means the search never gives up.
  CODES_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid environment configuration:\n${message}`, parsed.error.issues);
  }
  return parsed.data;
}
