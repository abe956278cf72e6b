import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

const DEFAULT_STATIC_DIR = path.resolve(moduleDir, '../../static');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).optional(),
  HTTP_LOG_FORMAT: z.string().min(1).default('dev'),
  CORS_ORIGINS: z.string().optional(),
  STATIC_DIR: z.string().min(1).optional()
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: LogLevel;
  logDir?: string;
  httpLogFormat: string;
  corsOrigins: string[];
  staticDir: string;
}

/**
 * Validates raw environment variables and turns them into the app config.
 * Throws with every offending variable named when validation fails.
 */
export function parseEnv(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  const corsOrigins = (parsed.CORS_ORIGINS ?? '')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    logDir: parsed.LOG_DIR,
    httpLogFormat: parsed.HTTP_LOG_FORMAT,
    corsOrigins,
    staticDir: parsed.STATIC_DIR ? path.resolve(parsed.STATIC_DIR) : DEFAULT_STATIC_DIR
  };
}

const config = parseEnv(process.env);

export { config };
export default config;
