import { z } from 'zod';

export const persistedStateSchema = z.object({
  secondsRemaining: z.number().int().nonnegative(),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;

export const EMPTY_STATE: PersistedState = Object.freeze({ secondsRemaining: 0 });

export interface TimerConfig {
  /** Positive values are minutes; zero and negative values are literal seconds. */
  requestedMinutes: number;
  forceRestart: boolean;
}

export type RunMode = 'resume' | 'fresh';

export interface RunPlan {
  mode: RunMode;
  durationSeconds: number;
}

export interface RunResult {
  mode: RunMode;
  completedNaturally: boolean;
  effectiveDurationSeconds: number;
  remainingSeconds: number;
  /** Wall-clock time the run finished or was interrupted. */
  endedAt: Date;
}

export interface CompletionNotification {
  title: string;
  body: string;
}

export const COMPLETION_NOTIFICATION: CompletionNotification = {
  title: 'Pomodoro finished!',
  body: 'Your pomodoro has finished.',
};
