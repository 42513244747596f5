import Joi from 'joi';

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  databasePath: string;
  logging: {
    level: string;
    dir: string;
    toFile: boolean;
  };
  crypto: {
    timeoutMs: number;
    retryBackoffMs: number;
  };
  rateLimit: {
    windowMs: number;
    max: number;
  };
  corsOrigin: string;
  tallyRefreshCron: string;
}

interface RawEnv {
  NODE_ENV: AppConfig['nodeEnv'];
  PORT: number;
  DATABASE_PATH: string;
  LOG_LEVEL: string;
  LOG_DIR: string;
  LOG_TO_FILE: boolean;
  CRYPTO_TIMEOUT_MS: number;
  CRYPTO_RETRY_BACKOFF_MS: number;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
  CORS_ORIGIN: string;
  TALLY_REFRESH_CRON: string;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(3000),
  DATABASE_PATH: Joi.string().default('./data/ballots.db'),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'debug').default('info'),
  LOG_DIR: Joi.string().default('logs'),
  LOG_TO_FILE: Joi.boolean().default(false),
  CRYPTO_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  CRYPTO_RETRY_BACKOFF_MS: Joi.number().integer().min(0).default(250),
  RATE_LIMIT_WINDOW_MS: Joi.number().integer().min(1000).default(15 * 60 * 1000),
  RATE_LIMIT_MAX: Joi.number().integer().min(1).default(300),
  CORS_ORIGIN: Joi.string().default('http://localhost:3000'),
  TALLY_REFRESH_CRON: Joi.string().allow('').default(''),
}).unknown(true);

/**
 * Validates the process environment and maps it onto the application config.
 * Throws on the first invalid variable so a misconfigured service never starts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: true, convert: true });

  if (error) {
    throw new Error(`Invalid environment configuration: ${error.message}`);
  }

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    databasePath: value.DATABASE_PATH,
    logging: {
      level: value.LOG_LEVEL,
      dir: value.LOG_DIR,
      toFile: value.LOG_TO_FILE,
    },
    crypto: {
      timeoutMs: value.CRYPTO_TIMEOUT_MS,
      retryBackoffMs: value.CRYPTO_RETRY_BACKOFF_MS,
    },
    rateLimit: {
      windowMs: value.RATE_LIMIT_WINDOW_MS,
      max: value.RATE_LIMIT_MAX,
    },
    corsOrigin: value.CORS_ORIGIN,
    tallyRefreshCron: value.TALLY_REFRESH_CRON,
  };
}

export const config = loadConfig();
