import yargsParser from 'yargs-parser';
import { z } from 'zod';

import type { TimerConfig } from '../types/timer';

export const USAGE = `Usage: pomodoro [options]

Counts down a Pomodoro, resuming an interrupted one unless --restart is given.

Options:
  -d, --duration <n>  Duration in minutes; zero or negative values are seconds (default: 25)
  -r, --restart       Discard any interrupted Pomodoro and start a new one
  -h, --help          Show this help
  -v, --version       Show the version number`;

export type CliCommand =
  | { kind: 'run'; config: TimerConfig }
  | { kind: 'help' }
  | { kind: 'version' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const KNOWN_KEYS = new Set(['_', 'duration', 'restart', 'help', 'version']);

const durationSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be a whole number')
  .transform((value) => Number.parseInt(value, 10));

const optionsSchema = z.object({
  duration: durationSchema.optional(),
  restart: z.boolean().default(false),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
});

export const parseArgs = (argv: string[], defaults: { defaultMinutes: number }): CliCommand => {
  const parsed = yargsParser(argv, {
    alias: {
      duration: ['d'],
      restart: ['r'],
      help: ['h'],
      version: ['v'],
    },
    string: ['duration'],
    boolean: ['restart', 'help', 'version'],
    configuration: {
      'strip-aliased': true,
      'camel-case-expansion': false,
    },
  });

  const unknown = Object.keys(parsed).filter((key) => !KNOWN_KEYS.has(key));
  if (unknown.length > 0) {
    throw new UsageError(`Unknown option: ${unknown.map((key) => (key.length === 1 ? `-${key}` : `--${key}`)).join(', ')}`);
  }
  if (parsed._.length > 0) {
    throw new UsageError(`Unexpected argument: ${parsed._.join(' ')}`);
  }

  const options = optionsSchema.safeParse({
    duration: parsed.duration,
    restart: parsed.restart,
    help: parsed.help,
    version: parsed.version,
  });
  if (!options.success) {
    const issue = options.error.issues[0];
    throw new UsageError(`Invalid value for --${issue.path.join('.')}: ${issue.message}`);
  }

  if (options.data.help) {
    return { kind: 'help' };
  }
  if (options.data.version) {
    return { kind: 'version' };
  }

  return {
    kind: 'run',
    config: {
      requestedMinutes: options.data.duration ?? defaults.defaultMinutes,
      forceRestart: options.data.restart,
    },
  };
};
