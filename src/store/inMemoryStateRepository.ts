import type { PersistedState } from '../types/timer';
import { type StateRepository, assertSecondsRemaining } from './stateRepository';

export class InMemoryStateRepository implements StateRepository {
  private secondsRemaining: number;
  private readonly writes: number[] = [];

  constructor(initial: PersistedState = { secondsRemaining: 0 }) {
    this.secondsRemaining = initial.secondsRemaining;
  }

  async load(): Promise<PersistedState> {
    return { secondsRemaining: this.secondsRemaining };
  }

  async save(secondsRemaining: number): Promise<void> {
    assertSecondsRemaining(secondsRemaining);
    this.secondsRemaining = secondsRemaining;
    this.writes.push(secondsRemaining);
  }

  /** Every value passed to `save`, oldest first. */
  get history(): number[] {
    return [...this.writes];
  }
}
