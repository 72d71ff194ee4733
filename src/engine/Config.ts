/**
 * Config.ts — Environment-driven engine configuration.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  NEON_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface EngineConfig {
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: EngineConfig = { logLevel: 'warn' };

/**
 * Read configuration from an environment map. Invalid values fall back to
 * the defaults with a warning rather than aborting start-up.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    console.warn(
      '[Config] Invalid environment, using defaults:',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    );
    return { ...DEFAULT_CONFIG };
  }
  return { logLevel: parsed.data.NEON_LOG_LEVEL };
}
