import pino, { type Logger } from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';

/** Diagnostics go to stderr so they never mix with the timer's own output. */
export const logger: Logger = pino(
  {
    name: 'pomodoro',
    level,
  },
  pino.destination({ dest: 2, sync: true }),
);

export interface RunLogOptions {
  file: string;
  level?: string;
}

/**
 * Append-only log of status transitions, one JSON line per entry.
 * Writes are synchronous so nothing is lost when the process exits right after.
 */
export const createRunLog = ({ file, level: runLevel }: RunLogOptions): Logger =>
  pino(
    {
      level: runLevel ?? level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: file, append: true, mkdir: true, sync: true }),
  );
