import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type Level = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type Logger = PinoLogger;

export interface CreateLoggerOptions extends LoggerOptions {
  name?: string;
  level?: Level;
}

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function resolveLevel(value: string | undefined, fallback: Level = 'info'): Level {
  const normalised = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalised) ?? fallback;
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(process.env.LOG_LEVEL),
  redact: ['token', 'password', 'authorization', 'voice.token', 'data.voice.token', 'discordToken'],
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({ ...baseOptions, ...options });
}
