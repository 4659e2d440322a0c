import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggingOptions {
  level: string;
  pretty: boolean;
}

const baseOptions: LoggerOptions = {
  base: { service: 'agentguard' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'authorization',
      'headers.authorization',
      'headers["x-api-key"]',
      'apiKey',
      'api_key',
      'privateKey'
    ],
    censor: '[REDACTED]'
  }
};

export function createLogger(options: LoggingOptions): Logger {
  if (options.pretty) {
    return pino({
      ...baseOptions,
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service' }
      }
    });
  }
  return pino({ ...baseOptions, level: options.level });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
