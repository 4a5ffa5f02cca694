import { formatPreciseDuration } from '../utils/duration';

export interface ProgressBar {
  inc(delta?: number): void;
  finishAndClear(): void;
}

export type ProgressBarFactory = (total: number, symbol: string) => ProgressBar;

export interface ProgressStream {
  write(chunk: string): unknown;
  columns?: number;
}

const SPINNER_FRAMES = ['🔴', '⚪'];
const FILL_CHAR = '█';
const EMPTY_CHAR = ' ';
const MIN_BAR_WIDTH = 10;
const CLEAR_LINE = '\r\x1b[2K';

export class NoopProgressBar implements ProgressBar {
  inc(): void {}

  finishAndClear(): void {}
}

/** Single-line `{symbol} {spinner} [HH:MM:SS] [████    ]` bar, redrawn in place. */
export class TerminalProgressBar implements ProgressBar {
  private position = 0;
  private frame = 0;
  private finished = false;

  constructor(
    private readonly total: number,
    private readonly symbol: string,
    private readonly stream: ProgressStream,
    private readonly width?: number,
  ) {
    this.draw();
  }

  get value(): number {
    return this.position;
  }

  inc(delta = 1): void {
    if (this.finished) {
      return;
    }
    this.position = Math.min(this.total, this.position + delta);
    this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
    this.draw();
  }

  finishAndClear(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.stream.write(CLEAR_LINE);
  }

  render(): string {
    const prefix = `${this.symbol} ${SPINNER_FRAMES[this.frame]} [${formatPreciseDuration(this.total - this.position)}] `;
    const barWidth = this.width ?? Math.max(MIN_BAR_WIDTH, (this.stream.columns ?? 80) - prefix.length - 2);
    const filled = this.total <= 0 ? barWidth : Math.floor((this.position / this.total) * barWidth);
    return `${prefix}[${FILL_CHAR.repeat(filled)}${EMPTY_CHAR.repeat(barWidth - filled)}]`;
  }

  private draw(): void {
    this.stream.write(`\r${this.render()}`);
  }
}

export const createProgressBarFactory =
  (enabled: boolean, stream: ProgressStream): ProgressBarFactory =>
  (total, symbol) =>
    enabled ? new TerminalProgressBar(total, symbol, stream) : new NoopProgressBar();
