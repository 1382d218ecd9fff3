import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/** Create the root pino logger. Stores and the repository log through children of it. */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? 'lms',
    level: options?.level ?? 'info',
  });
}
