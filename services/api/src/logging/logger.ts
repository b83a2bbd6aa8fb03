import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: string;
  version: string;
  prettyPrint?: boolean;
}

const SECRET_PATHS = ['*.MONGO_PASS', 'mongo.password', 'req.headers.authorization'];

/**
 * Structured JSON logger shared by the bootstrap code and Fastify
 * (which derives `req.log` from it). Pretty output is for local development.
 */
export function createLogger(options: LoggerOptions): Logger {
  const base: pino.LoggerOptions = {
    level: options.level,
    base: {
      service: 'items-api',
      version: options.version,
    },
    redact: {
      paths: SECRET_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (options.prettyPrint) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(base);
}
