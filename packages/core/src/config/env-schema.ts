import { z } from 'zod';
import { TypeHashConfigError } from '../errors';
import { AsciiNameHashModeSchema } from '../schemas';
import type { AsciiNameHashMode } from '../types';
import { logger } from '../utils/logger';

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Which odd-byte read the ASCII name hash performs
  TYPEHASH_ASCII_MODE: AsciiNameHashModeSchema.default('corrected'),

  TYPEHASH_LOG_MISMATCHES: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface TypeHashingConfig {
  /** ASCII name hash variant used when verifying raw name bytes */
  asciiNameHashMode: AsciiNameHashMode;
  /** Log verification mismatches at warn level */
  logMismatches: boolean;
}

export const DEFAULT_TYPE_HASHING_CONFIG: TypeHashingConfig = {
  asciiNameHashMode: 'corrected',
  logMismatches: true,
};

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`);
    throw new TypeHashConfigError(issues);
  }
  return result.data;
}

/**
 * Validate the environment, apply LOG_LEVEL to the shared logger and return
 * the hashing config.
 */
export function loadTypeHashingConfig(env: NodeJS.ProcessEnv = process.env): TypeHashingConfig {
  const parsed = validateEnv(env);
  const config: TypeHashingConfig = {
    asciiNameHashMode: parsed.TYPEHASH_ASCII_MODE,
    logMismatches: parsed.TYPEHASH_LOG_MISMATCHES,
  };
  logger.level = parsed.LOG_LEVEL;
  logger.debug({ config, logLevel: parsed.LOG_LEVEL }, 'Loaded type hashing config');
  return config;
}
