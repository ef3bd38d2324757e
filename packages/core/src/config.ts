// packages/core/src/config.ts
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_LIMIT } from './schemas.js';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  MONGO_URI: z.string().min(1).default('mongodb://127.0.0.1:27017'),
  MONGO_DB: z.string().min(1).default('docquery'),
  MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: optionalString,
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  MODEL_MAX_TOKENS: z.coerce.number().int().positive().default(2000),

  SCHEMA_PATH: optionalString,
  DEFAULT_LIMIT: z.coerce.number().int().positive().default(DEFAULT_LIMIT),
  MAX_LIMIT: z.coerce.number().int().positive().default(1000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  CORS_ORIGIN: z.string().default(''),
  DEBUG_ERRORS: z.enum(['0', '1']).default('0')
});

export interface AppConfig {
  mongo: { uri: string; db: string; timeoutMs: number };
  model: { apiKey?: string; model: string; baseURL?: string; temperature: number; maxTokens: number };
  schemaPath?: string;
  limits: { defaultLimit: number; maxLimit: number };
  logLevel: string;
  http: { host: string; port: number; corsOrigins: string[]; debugErrors: boolean };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  if (e.DEFAULT_LIMIT > e.MAX_LIMIT) {
    throw new ConfigError([`DEFAULT_LIMIT (${e.DEFAULT_LIMIT}) exceeds MAX_LIMIT (${e.MAX_LIMIT})`]);
  }

  return Object.freeze({
    mongo: { uri: e.MONGO_URI, db: e.MONGO_DB, timeoutMs: e.MONGO_TIMEOUT_MS },
    model: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      baseURL: e.OPENAI_BASE_URL,
      temperature: e.MODEL_TEMPERATURE,
      maxTokens: e.MODEL_MAX_TOKENS
    },
    schemaPath: e.SCHEMA_PATH,
    limits: { defaultLimit: e.DEFAULT_LIMIT, maxLimit: e.MAX_LIMIT },
    logLevel: e.LOG_LEVEL,
    http: {
      host: e.HOST,
      port: e.PORT,
      corsOrigins: e.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
      debugErrors: e.DEBUG_ERRORS === '1'
    }
  });
}
