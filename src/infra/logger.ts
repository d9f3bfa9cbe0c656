import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Also append JSON lines to this file. */
  file?: string;
  /** Replaces the stderr destination; used by tests to capture lines. */
  stream?: DestinationStream;
}

/**
 * Logs go to stderr: stdout is reserved for the MCP stdio transport.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || 'info';
  const primary = options.stream ?? pino.destination({ fd: 2, sync: true });

  const destination = options.file
    ? pino.multistream([
        { stream: primary, level: 'trace' },
        { stream: pino.destination({ dest: options.file, mkdir: true, sync: true }), level: 'trace' },
      ])
    : primary;

  return pino(
    {
      level,
      base: { service: 'paper-tabulate' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL,
  file: process.env.LOG_FILE,
});

export type { Logger };
