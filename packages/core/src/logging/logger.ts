import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
  /** File path for log output. Defaults to stderr. */
  destination?: string;
}

/**
 * Build the engine's root logger. The CLI points `destination` at a file so
 * log lines never interleave with the terminal view.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.destination
    ? pino.destination({ dest: options.destination, mkdir: true, sync: false })
    : pino.destination(2);

  return pino(
    {
      name: options.name ?? 'conclave',
      level: options.level ?? 'info',
    },
    destination,
  );
}

/** Logger that drops everything. Used as the default for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
