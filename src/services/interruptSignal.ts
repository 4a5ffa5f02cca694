import { errorMessage } from '../utils/errors';

export type InterruptSignal = 'SIGINT' | 'SIGTERM';

export const DEFAULT_INTERRUPT_SIGNALS: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Set once by a signal listener, read once per tick by the countdown loop.
 * Listeners run on the event-loop thread, so a plain field is never torn.
 */
export class InterruptFlag {
  private raisedBy: InterruptSignal | null = null;

  raise(signal: InterruptSignal): void {
    if (this.raisedBy === null) {
      this.raisedBy = signal;
    }
  }

  isRaised(): boolean {
    return this.raisedBy !== null;
  }

  get signal(): InterruptSignal | null {
    return this.raisedBy;
  }
}

export class InterruptHandlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterruptHandlerError';
  }
}

export interface SignalTarget {
  on(signal: InterruptSignal, listener: () => void): unknown;
  off(signal: InterruptSignal, listener: () => void): unknown;
}

export interface InstallOptions {
  target?: SignalTarget;
  signals?: readonly InterruptSignal[];
}

/**
 * Routes the given signals into `flag` instead of letting them end the process.
 * Returns a function that detaches every listener it added.
 */
export const installInterruptHandler = (
  flag: InterruptFlag,
  { target = process, signals = DEFAULT_INTERRUPT_SIGNALS }: InstallOptions = {},
): (() => void) => {
  const installed: Array<[InterruptSignal, () => void]> = [];

  const uninstall = () => {
    for (const [signal, listener] of installed.splice(0)) {
      target.off(signal, listener);
    }
  };

  for (const signal of signals) {
    const listener = () => flag.raise(signal);
    try {
      target.on(signal, listener);
    } catch (error) {
      uninstall();
      throw new InterruptHandlerError(
        `Unable to install ${signal} handler: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    installed.push([signal, listener]);
  }

  return uninstall;
};
