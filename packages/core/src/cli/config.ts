/**
 * Environment configuration for the command-line front end.
 */

import { z } from 'zod';
import { CliError } from './errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const configSchema = z.object({
  logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('warn'),
  logFormat: z.string().trim().toLowerCase().pipe(z.enum(['pretty', 'json'])).default('pretty'),
  /** Zone used by `bucket` when `--tz` is not given */
  defaultTz: z.string().trim().min(1).default('UTC'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable for each configuration key.
 */
export const envMapping = {
  TZBUCKET_LOG_LEVEL: 'logLevel',
  TZBUCKET_LOG_FORMAT: 'logFormat',
  TZBUCKET_DEFAULT_TZ: 'defaultTz',
} as const satisfies Record<string, keyof Config>;

function envNameFor(key: PropertyKey | undefined): string {
  for (const [envName, configKey] of Object.entries(envMapping)) {
    if (configKey === key) {
      return envName;
    }
  }
  return String(key);
}

/**
 * Loads configuration from environment variables, applying defaults.
 *
 * @throws CliError (input) naming every invalid variable
 *
 * @example
 * loadConfig({ TZBUCKET_DEFAULT_TZ: 'Europe/Berlin' })
 * // { logLevel: 'warn', logFormat: 'pretty', defaultTz: 'Europe/Berlin' }
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Partial<Record<keyof Config, string>> = {};
  for (const [envName, configKey] of Object.entries(envMapping)) {
    const value = env[envName];
    if (value !== undefined) {
      raw[configKey] = value;
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map(
      (issue) => `${envNameFor(issue.path[0])}: ${issue.message}`,
    );
    throw CliError.input(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}
