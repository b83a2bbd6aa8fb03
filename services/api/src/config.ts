import { z } from 'zod';
import { buildMongoUri, redactMongoUri } from './mongo/client';
import { DEFAULT_PAGINATION } from './query/pagination';
import { describeSettings, loadEnvFile, resolveSettings } from './settings/resolve';
import type { PaginationLimits } from './query/pagination';
import type { EnvFile, Settings } from './settings/resolve';

const port = z.coerce.number().int().min(1).max(65535);

// OS environment > .env file > these defaults
export const settingsShape = {
  VERSION: z.string().min(1).default('0.1.0'),
  ENVIRONMENT: z.string().min(1).default('development'),
  DEBUG: z
    .string()
    .default('false')
    .transform((value) => value.trim().toLowerCase() === 'true'),
  PUBLISH_PORT: port.default(8000),
  MONGO_USER: z.string().default('root'),
  MONGO_PASS: z.string().default('pass'),
  MONGO_HOST: z.string().min(1).default('mongodb'),
  MONGO_PORT: port.default(27017),
  MONGO_AUTH_SOURCE: z.string().min(1).default('admin'),
  MONGO_DATABASE: z.string().min(1).default('items_starter'),
};

export type AppSettings = Settings<typeof settingsShape>;

export interface AppConfig {
  settings: AppSettings;
  version: string;
  env: string;
  debug: boolean;
  port: number;
  host: string;
  logLevel: string;
  mongo: {
    uri: string;
    database: string;
    timeoutMs: number;
  };
  pagination: PaginationLimits;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  envFile?: EnvFile | null;
}

/** Resolves settings once; the result is never re-read or mutated. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const settings = resolveSettings(settingsShape, {
    env: options.env ?? process.env,
    file: options.envFile === undefined ? loadEnvFile() : options.envFile,
  });
  const values = settings.values;

  return {
    settings,
    version: values.VERSION,
    env: values.ENVIRONMENT,
    debug: values.DEBUG,
    port: values.PUBLISH_PORT,
    host: '0.0.0.0',
    logLevel: values.DEBUG ? 'debug' : 'info',
    mongo: {
      uri: buildMongoUri({
        user: values.MONGO_USER,
        password: values.MONGO_PASS,
        host: values.MONGO_HOST,
        port: values.MONGO_PORT,
        database: values.MONGO_DATABASE,
        authSource: values.MONGO_AUTH_SOURCE,
      }),
      database: values.MONGO_DATABASE,
      timeoutMs: 5000,
    },
    pagination: DEFAULT_PAGINATION,
  };
}

/** Precedence report logged at startup when DEBUG is on. */
export function describeConfig(config: AppConfig): string[] {
  return describeSettings(config.settings, {
    MONGO_URI: redactMongoUri(config.mongo.uri),
    'DEBUG (bool)': String(config.debug),
  });
}
