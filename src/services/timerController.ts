import type { Logger } from 'pino';

import type { StateRepository } from '../store/stateRepository';
import {
  COMPLETION_NOTIFICATION,
  type PersistedState,
  type RunMode,
  type RunPlan,
  type RunResult,
  type TimerConfig,
} from '../types/timer';
import {
  formatClockTime,
  formatCompactDuration,
  formatHumanDuration,
  formatLongDate,
  secondsFromRequest,
} from '../utils/duration';
import type { Clock } from './clock';
import type { InterruptFlag } from './interruptSignal';
import type { Notifier } from './notifier';
import type { ProgressBarFactory } from './progressBar';

const TICK_MS = 1000;

const SYMBOLS: Record<RunMode, string> = {
  fresh: '🍅',
  resume: '🍏',
};

export interface StatusOutput {
  write(chunk: string): unknown;
}

export interface TimerControllerDependencies {
  repository: StateRepository;
  interrupt: InterruptFlag;
  clock: Clock;
  notifier: Notifier;
  progress: ProgressBarFactory;
  /** Append-only run log. */
  runLog: Logger;
  stdout: StatusOutput;
}

/**
 * Saved time wins unless a restart is forced; otherwise the requested
 * duration applies.
 */
export const planRun = (state: PersistedState, config: TimerConfig): RunPlan => {
  if (state.secondsRemaining > 0 && !config.forceRestart) {
    return { mode: 'resume', durationSeconds: state.secondsRemaining };
  }
  return { mode: 'fresh', durationSeconds: secondsFromRequest(config.requestedMinutes) };
};

export class TimerController {
  constructor(private readonly deps: TimerControllerDependencies) {}

  async run(config: TimerConfig): Promise<RunResult> {
    const { repository, interrupt, clock, runLog } = this.deps;

    const state = await repository.load();
    const plan = planRun(state, config);
    const symbol = SYMBOLS[plan.mode];
    const durationMs = plan.durationSeconds * TICK_MS;

    runLog.info(
      { mode: plan.mode, durationSeconds: plan.durationSeconds },
      `${symbol} ${plan.mode === 'resume' ? 'Continuing' : 'Starting new'} ${formatCompactDuration(
        plan.durationSeconds,
      )} Pomodoro on ${formatLongDate(clock.now())}`,
    );

    const bar = this.deps.progress(plan.durationSeconds, symbol);
    const startedAt = clock.monotonicMs();

    let elapsedMs = 0;
    let interrupted = false;
    while (elapsedMs < durationMs && !interrupted) {
      await clock.sleep(TICK_MS);
      elapsedMs = clock.monotonicMs() - startedAt;
      bar.inc(1);
      if (interrupt.isRaised()) {
        interrupted = true;
      }
    }

    bar.finishAndClear();

    const endedAt = clock.now();
    const remainingSeconds = interrupted
      ? Math.max(0, Math.round((durationMs - elapsedMs) / TICK_MS))
      : 0;

    if (interrupted) {
      this.report(
        { mode: plan.mode, remainingSeconds, signal: interrupt.signal },
        `Interrupted at ${formatClockTime(endedAt)} with ${formatHumanDuration(remainingSeconds)} remaining.`,
      );
    } else {
      this.report({ mode: plan.mode, remainingSeconds }, `Finished at ${formatClockTime(endedAt)}`);
    }

    await repository.save(remainingSeconds);

    if (!interrupted) {
      await this.deps.notifier.notify(COMPLETION_NOTIFICATION);
    }

    return {
      mode: plan.mode,
      completedNaturally: !interrupted,
      effectiveDurationSeconds: plan.durationSeconds,
      remainingSeconds,
      endedAt,
    };
  }

  private report(fields: Record<string, unknown>, message: string): void {
    this.deps.runLog.info(fields, message);
    this.deps.stdout.write(`${message}\n`);
  }
}
