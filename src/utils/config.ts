/**
 * Configuration management
 * Loads and validates environment configuration
 */

import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables
config();

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const ConfigSchema = z.object({
  // Logging
  LOG_LEVEL: LogLevelSchema.default('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

/**
 * Get validated configuration
 * Throws if configuration is invalid
 */
export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = ConfigSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  cachedConfig = null;
}
