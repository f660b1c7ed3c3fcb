/**
 * Configuration management with validation
 */

import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables
config();

/**
 * Configuration schema with validation
 */
const ConfigSchema = z.object({
  // Output
  outputDir: z.string().min(1).default('./data'),

  // Date handling
  timezone: z.string().min(1).default('Europe/Moscow'),
  recencyWindowDays: z.number().int().nonnegative().default(30),

  // Crawl engine (politeness and retry)
  downloadDelaySecs: z.number().nonnegative().default(2),
  downloadTimeoutSecs: z.number().int().positive().default(30),
  maxRequestRetries: z.number().int().nonnegative().default(2),
  sourceConcurrency: z.number().int().positive().default(2),

  userAgent: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0 Safari/537.36'
    ),

  // Sources to crawl; empty means every registered source
  sources: z.array(z.string().min(1)).default([]),

  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function toNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function toList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load and validate configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    outputDir: env.OUTPUT_DIR,
    timezone: env.CRAWL_TIMEZONE,
    recencyWindowDays: toNumber(env.RECENCY_WINDOW_DAYS),
    downloadDelaySecs: toNumber(env.DOWNLOAD_DELAY_SECS),
    downloadTimeoutSecs: toNumber(env.DOWNLOAD_TIMEOUT_SECS),
    maxRequestRetries: toNumber(env.MAX_REQUEST_RETRIES),
    sourceConcurrency: toNumber(env.SOURCE_CONCURRENCY),
    userAgent: env.USER_AGENT,
    sources: toList(env.CRAWL_SOURCES),
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('Invalid configuration. Please check your environment variables.');
    }
    throw error;
  }
}

/**
 * Singleton configuration instance
 */
export const appConfig = loadConfig();
