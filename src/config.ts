import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { DEFAULT_STATE_FILE } from './store/fileStateRepository';
import type { NotifierSettings } from './services/notifier';

export const DEFAULT_LOG_FILE = 'pomodoros.log';
export const DEFAULT_MINUTES = 25;

const truthy = new Set(['true', '1', 'yes', 'on']);
const falsy = new Set(['false', '0', 'no', 'off']);

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => truthy.has(value) || falsy.has(value), {
    message: 'Expected one of true/false, 1/0, yes/no, on/off',
  })
  .transform((value) => truthy.has(value));

const envSchema = z.object({
  POMODORO_STATE_FILE: z.string().trim().min(1).default(DEFAULT_STATE_FILE),
  POMODORO_LOG_FILE: z.string().trim().min(1).default(DEFAULT_LOG_FILE),
  POMODORO_DEFAULT_MINUTES: z.coerce.number().int().default(DEFAULT_MINUTES),
  POMODORO_PROGRESS: booleanFlag.optional(),
  POMODORO_NOTIFIER: z.enum(['terminal', 'webhook']).default('terminal'),
  POMODORO_WEBHOOK_URL: z.string().url().optional(),
  POMODORO_WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  stateFile: string;
  logFile: string;
  defaultMinutes: number;
  showProgress: boolean;
  logLevel: string;
  notifier: NotifierSettings;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  isTTY?: boolean;
}

/** Empty strings count as unset. */
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== ''),
  );

export const loadConfig = ({
  env = process.env,
  cwd = process.cwd(),
  isTTY = Boolean(process.stdout.isTTY),
}: LoadConfigOptions = {}): AppConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  let notifier: NotifierSettings = { kind: 'terminal' };
  if (values.POMODORO_NOTIFIER === 'webhook') {
    if (!values.POMODORO_WEBHOOK_URL) {
      throw new ConfigError('Invalid configuration: POMODORO_WEBHOOK_URL is required when POMODORO_NOTIFIER=webhook');
    }
    notifier = {
      kind: 'webhook',
      webhookUrl: values.POMODORO_WEBHOOK_URL,
      webhookTimeoutMs: values.POMODORO_WEBHOOK_TIMEOUT_MS,
    };
  }

  return {
    stateFile: resolve(cwd, values.POMODORO_STATE_FILE),
    logFile: resolve(cwd, values.POMODORO_LOG_FILE),
    defaultMinutes: values.POMODORO_DEFAULT_MINUTES,
    showProgress: values.POMODORO_PROGRESS ?? isTTY,
    logLevel: values.LOG_LEVEL,
    notifier,
  };
};

/** Loads `.env` from the working directory into `process.env` when present. */
export const loadEnvFile = (cwd: string = process.cwd()): void => {
  const envPath = resolve(cwd, '.env');
  if (existsSync(envPath)) {
    loadEnv({ path: envPath });
  }
};
