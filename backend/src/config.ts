import 'dotenv/config';
import path from 'path';
import { z } from 'zod';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

// Environment schema; every value has a default so the server boots without a .env
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_PATH: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-3.5-turbo'),
  NHTSA_BASE_URL: z.string().url().default('https://vpic.nhtsa.dot.gov/api/vehicles'),
  NHTSA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REPLY_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export type AppConfig = {
  port: number;
  dataPath: string;
  openai: {
    apiKey?: string;
    model: string;
    maxTokens: number;
    temperature: number;
  };
  nhtsa: {
    baseUrl: string;
    timeoutMs: number;
  };
  replyTimeoutMs: number;
  logLevel: (typeof LOG_LEVELS)[number];
};

/**
 * Build the typed configuration from an environment map.
 * Throws with every offending variable listed when the environment is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    dataPath: e.DATA_PATH
      ? path.resolve(e.DATA_PATH)
      : path.join(__dirname, '..', 'data', 'conversations'),
    openai: {
      apiKey: e.OPENAI_API_KEY || undefined,
      model: e.OPENAI_MODEL,
      maxTokens: 200,
      temperature: 0.7
    },
    nhtsa: {
      baseUrl: e.NHTSA_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.NHTSA_TIMEOUT_MS
    },
    replyTimeoutMs: e.REPLY_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL
  };
}
