import pino, { type Logger } from 'pino';

import type { Clock } from '../src/services/clock';
import type { Notifier } from '../src/services/notifier';
import type { ProgressBar, ProgressBarFactory } from '../src/services/progressBar';
import type { CompletionNotification } from '../src/types/timer';

export const WALL_START = new Date(2026, 9, 19, 9, 0, 0);

/** Advances only when the code under test sleeps. */
export class ManualClock implements Clock {
  private current = 0;
  sleeps = 0;

  constructor(
    private readonly options: {
      wallStart?: Date;
      stepMs?: number;
      onSleep?: (sleeps: number) => void;
    } = {},
  ) {}

  monotonicMs(): number {
    return this.current;
  }

  now(): Date {
    return new Date((this.options.wallStart ?? WALL_START).getTime() + this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.current += this.options.stepMs ?? ms;
    this.sleeps += 1;
    this.options.onSleep?.(this.sleeps);
  }
}

export interface CapturedLog {
  logger: Logger;
  entries: () => Array<Record<string, unknown> & { msg: string }>;
}

export const captureLogger = (level = 'info'): CapturedLog => {
  const lines: string[] = [];
  const logger = pino({ level, base: null }, { write: (line: string) => lines.push(line) });
  return {
    logger,
    entries: () => lines.map((line) => JSON.parse(line) as Record<string, unknown> & { msg: string }),
  };
};

export class StringStream {
  readonly chunks: string[] = [];

  constructor(public readonly columns?: number) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: CompletionNotification[] = [];

  async notify(notification: CompletionNotification): Promise<void> {
    this.sent.push(notification);
  }
}

export class RecordingProgress {
  readonly bars: Array<{ total: number; symbol: string; increments: number; cleared: boolean }> = [];

  readonly factory: ProgressBarFactory = (total, symbol) => {
    const record = { total, symbol, increments: 0, cleared: false };
    this.bars.push(record);
    const bar: ProgressBar = {
      inc: (delta = 1) => {
        record.increments += delta;
      },
      finishAndClear: () => {
        record.cleared = true;
      },
    };
    return bar;
  };
}
