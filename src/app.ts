import type { Logger } from 'pino';

import { version } from '../package.json';
import { parseArgs, UsageError, USAGE } from './cli/parseArgs';
import { loadConfig } from './config';
import { systemClock, type Clock } from './services/clock';
import { InterruptFlag, installInterruptHandler, type SignalTarget } from './services/interruptSignal';
import { createNotifier, type Notifier } from './services/notifier';
import { createProgressBarFactory, type ProgressBarFactory, type ProgressStream } from './services/progressBar';
import { TimerController } from './services/timerController';
import { FileStateRepository } from './store/fileStateRepository';
import type { StateRepository } from './store/stateRepository';
import { createRunLog, logger as diagnosticLogger } from './telemetry/logger';
import type { RunResult } from './types/timer';
import { errorMessage } from './utils/errors';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface OutputStream extends ProgressStream {
  write(chunk: string): unknown;
}

export interface AppDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: OutputStream & { isTTY?: boolean };
  stderr?: OutputStream;
  clock?: Clock;
  interrupt?: InterruptFlag;
  signalTarget?: SignalTarget;
  repository?: StateRepository;
  notifier?: Notifier;
  progress?: ProgressBarFactory;
  runLog?: Logger;
  diagnostics?: Logger;
  onResult?: (result: RunResult) => void;
}

/** Runs one invocation and resolves with the process exit code. */
export const runCli = async (argv: string[], deps: AppDependencies = {}): Promise<number> => {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const diagnostics = deps.diagnostics ?? diagnosticLogger;
  let runLog: Logger | undefined = deps.runLog;

  try {
    const config = loadConfig({
      env: deps.env,
      cwd: deps.cwd,
      isTTY: Boolean(stdout.isTTY),
    });
    diagnostics.level = config.logLevel;

    const command = parseArgs(argv, { defaultMinutes: config.defaultMinutes });
    if (command.kind === 'help') {
      stdout.write(`${USAGE}\n`);
      return EXIT_OK;
    }
    if (command.kind === 'version') {
      stdout.write(`${version}\n`);
      return EXIT_OK;
    }
    diagnostics.debug({ requestedMinutes: command.config.requestedMinutes }, 'Parsed duration');

    runLog = runLog ?? createRunLog({ file: config.logFile, level: config.logLevel });
    const interrupt = deps.interrupt ?? new InterruptFlag();
    const uninstall = installInterruptHandler(interrupt, { target: deps.signalTarget });

    try {
      const controller = new TimerController({
        repository: deps.repository ?? new FileStateRepository(config.stateFile, undefined, diagnostics),
        interrupt,
        clock: deps.clock ?? systemClock,
        notifier: deps.notifier ?? createNotifier(config.notifier, stdout),
        progress: deps.progress ?? createProgressBarFactory(config.showProgress, stdout),
        runLog,
        stdout,
      });
      const result = await controller.run(command.config);
      deps.onResult?.(result);
    } finally {
      uninstall();
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      stderr.write(`pomodoro: ${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    const message = errorMessage(error);
    diagnostics.error({ error }, 'Pomodoro run failed');
    runLog?.error({ error: message }, `Fatal: ${message}`);
    stderr.write(`pomodoro: ${message}\n`);
    return EXIT_FATAL;
  }
};
