/**
 * Application Configuration
 * Centralized configuration management with environment variable validation
 */

import { z } from 'zod';

function isIntegerInRange(value: string, min: number, max: number): boolean {
  if (!/^\d+$/.test(value)) return false;
  const parsed = Number(value);
  return parsed >= min && parsed <= max;
}

// Longest delay setTimeout honours; larger values fire after 1ms
const MAX_TIMER_MS = 2147483647;

// Environment schema validation
const envSchema = z.object({
  // Server
  PORT: z
    .string()
    .default('5001')
    .refine(value => isIntegerInRange(value, 1, 65535), 'must be an integer between 1 and 65535'),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  SHUTDOWN_TIMEOUT_MS: z
    .string()
    .default('10000')
    .refine(
      value => isIntegerInRange(value, 1, MAX_TIMER_MS),
      `must be an integer between 1 and ${MAX_TIMER_MS}`,
    ),

  // Service identity
  SERVICE_NAME: z.string().min(1).default('fivetran-universal-connector'),
  SERVICE_TITLE: z.string().min(1).default('Fivetran Connector Service'),
  SERVICE_VERSION: z.string().min(1).default('0.1.0'),

  // API docs (/docs, /openapi.json)
  DOCS_ENABLED: z.enum(['true', 'false']).default('true'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment variables: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse an environment into the typed service config.
 * Throws {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env) {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = result.data;

  return {
    // Server
    server: {
      port: parseInt(env.PORT, 10),
      host: env.HOST,
      isDev: env.NODE_ENV === 'development',
      isProd: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
      shutdownTimeoutMs: parseInt(env.SHUTDOWN_TIMEOUT_MS, 10),
    },

    // Service identity
    service: {
      name: env.SERVICE_NAME,
      title: env.SERVICE_TITLE,
      version: env.SERVICE_VERSION,
    },

    // API docs
    docs: {
      enabled: env.DOCS_ENABLED === 'true',
    },

    // Logging
    logging: {
      level: env.LOG_LEVEL,
    },
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

function loadProcessConfig(): Config {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid environment variables:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

// Export validated config
export const config = loadProcessConfig();
