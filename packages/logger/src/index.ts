import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type Level = (typeof levels)[number];

export type Logger = PinoLogger;

export interface CreateLoggerOptions extends LoggerOptions {
  name?: string;
  level?: Level;
}

export function resolveLogLevel(value: string | undefined, fallback: Level = 'info'): Level {
  const normalised = value?.trim().toLowerCase();
  return levels.find((level) => level === normalised) ?? fallback;
}

const baseOptions: LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  redact: ['req.headers.authorization', 'headers.Authorization', 'password', 'token', 'discordToken', '*.password'],
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({ ...baseOptions, ...options });
}
