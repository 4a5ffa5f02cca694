import type { PersistedState } from '../types/timer';

export interface StateRepository {
  /** Never rejects: unreadable state is reported as no resumable timer. */
  load(): Promise<PersistedState>;
  save(secondsRemaining: number): Promise<void>;
}

export class StatePersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StatePersistenceError';
  }
}

export const assertSecondsRemaining = (secondsRemaining: number, filePath?: string): void => {
  if (!Number.isInteger(secondsRemaining) || secondsRemaining < 0) {
    throw new StatePersistenceError(
      `Refusing to persist invalid remaining time: ${secondsRemaining}`,
      filePath,
    );
  }
};
