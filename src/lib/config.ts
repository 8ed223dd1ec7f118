/**
 * Environment configuration
 *
 * Validates process.env once with zod and exposes a typed AppConfig.
 * Fails fast with the list of missing and invalid keys.
 */

import { ZodError, z } from 'zod';

export class ConfigValidationError extends Error {
  constructor(
    public readonly missing: string[],
    public readonly invalid: string[]
  ) {
    super(
      `Invalid environment: missing [${missing.join(', ')}] invalid [${invalid.join(', ')}]`
    );
    this.name = 'ConfigValidationError';
  }
}

const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  ALLOWED_ORIGINS: csv.default('http://localhost:3000'),

  // Shared secret checked on every WebSocket connect
  API_TOKEN: z.string().min(1),

  // Assistant service
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL_ID: z.string().default('gpt-4o-mini'),
  ASSISTANT_ID: z.string().min(1).optional(),
  ASSISTANT_CACHE_FILE: z.string().default('assistant_cache.json'),
  VISION_MODEL: z.string().default('gpt-4o-mini'),
  VISION_DETAIL_MODEL: z.string().default('gpt-4o'),

  RUN_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  RUN_POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(300),
  IMAGE_BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // Document store
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  // Providers
  GOOGLE_MAPS_API_KEY: z.string().min(1),
  YELP_API_KEY: z.string().min(1),
  EXA_API_KEY: z.string().min(1),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  logLevel: Env['LOG_LEVEL'];
  allowedOrigins: string[];
  apiToken: string;
  openai: {
    apiKey: string;
    model: string;
    assistantId: string | null;
    assistantCacheFile: string;
    visionModel: string;
    visionDetailModel: string;
  };
  polling: {
    intervalMs: number;
    maxAttempts: number;
  };
  imageBatchTimeoutMs: number;
  supabase: {
    url: string;
    serviceKey: string;
  };
  providers: {
    googleMapsApiKey: string;
    yelpApiKey: string;
    exaApiKey: string;
  };
}

/**
 * Parse and validate an environment map into AppConfig
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  let env: Env;
  try {
    env = envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing: string[] = [];
      const invalid: string[] = [];
      for (const issue of error.issues) {
        const key = issue.path.join('.');
        if (issue.code === 'invalid_type' && issue.received === 'undefined') {
          missing.push(key);
        } else {
          invalid.push(key);
        }
      }
      throw new ConfigValidationError(missing, invalid);
    }
    throw error;
  }

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    allowedOrigins: env.ALLOWED_ORIGINS,
    apiToken: env.API_TOKEN,
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL_ID,
      assistantId: env.ASSISTANT_ID ?? null,
      assistantCacheFile: env.ASSISTANT_CACHE_FILE,
      visionModel: env.VISION_MODEL,
      visionDetailModel: env.VISION_DETAIL_MODEL,
    },
    polling: {
      intervalMs: env.RUN_POLL_INTERVAL_MS,
      maxAttempts: env.RUN_POLL_MAX_ATTEMPTS,
    },
    imageBatchTimeoutMs: env.IMAGE_BATCH_TIMEOUT_MS,
    supabase: {
      url: env.SUPABASE_URL,
      serviceKey: env.SUPABASE_SERVICE_KEY,
    },
    providers: {
      googleMapsApiKey: env.GOOGLE_MAPS_API_KEY,
      yelpApiKey: env.YELP_API_KEY,
      exaApiKey: env.EXA_API_KEY,
    },
  };
}
