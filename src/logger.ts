import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'staged-sql',
};

/**
 * Creates a structured JSON logger.
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };
  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };
  return pino(options);
};

/** Logger that drops everything; the default when none is injected. */
export const silentLogger = (): Logger => pino({ level: 'silent' });

export type { Logger } from 'pino';
