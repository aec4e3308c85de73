import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const REDACTED_PATHS = [
  'password',
  'newPassword',
  'currentPassword',
  'hashedPassword',
  'token',
  'refreshToken',
  'accessToken',
  'apiKey',
  'rawKey',
  'secret',
  'code',
  'resetToken',
  '*.password',
  '*.hashedPassword',
  '*.token',
  '*.secret'
];

export interface CreateLoggerOptions {
  name: string;
  level?: LogLevel;
  destination?: pino.DestinationStream;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name,
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]'
    }
  };

  return options.destination === undefined ? pino(loggerOptions) : pino(loggerOptions, options.destination);
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
