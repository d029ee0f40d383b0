import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

export type CorsOrigins = '*' | string[];

const parseOrigins = (value: string): CorsOrigins => {
  if (value.trim() === '*') {
    return '*';
  }
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  STATIC_DIR: z.string().min(1).default(path.resolve(process.cwd(), 'public')),
  CORS_ORIGINS: z.string().default('*').transform(parseOrigins),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).optional(),
  ENFORCE_CAPACITY: booleanFlag
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

const config = loadConfig();

export { config };
