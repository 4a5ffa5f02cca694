import { promises as fs } from 'node:fs';
import { basename, dirname, join } from 'node:path';

import type { Logger } from 'pino';

import { logger as defaultLogger } from '../telemetry/logger';
import { EMPTY_STATE, type PersistedState, persistedStateSchema } from '../types/timer';
import { errorMessage } from '../utils/errors';
import { StatePersistenceError, type StateRepository, assertSecondsRemaining } from './stateRepository';

export const DEFAULT_STATE_FILE = '.pomodoro_state.json';

export type FileSystem = Pick<typeof fs, 'readFile' | 'writeFile' | 'rename' | 'mkdir' | 'rm'>;

export class FileStateRepository implements StateRepository {
  constructor(
    private readonly filePath: string,
    private readonly fileSystem: FileSystem = fs,
    private readonly logger: Logger = defaultLogger,
  ) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<PersistedState> {
    let raw: string;
    try {
      raw = await this.fileSystem.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.debug({ file: this.filePath }, 'No saved timer state, starting fresh');
      } else {
        this.logger.warn({ file: this.filePath, error }, 'Unable to read saved timer state, starting fresh');
      }
      return { ...EMPTY_STATE };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ file: this.filePath, error }, 'Saved timer state is not valid JSON, starting fresh');
      return { ...EMPTY_STATE };
    }

    const parsed = persistedStateSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        { file: this.filePath, issues: parsed.error.issues },
        'Saved timer state has an unexpected shape, starting fresh',
      );
      return { ...EMPTY_STATE };
    }
    return { secondsRemaining: parsed.data.secondsRemaining };
  }

  async save(secondsRemaining: number): Promise<void> {
    assertSecondsRemaining(secondsRemaining, this.filePath);

    const payload: PersistedState = { secondsRemaining };
    const json = `${JSON.stringify(payload, null, 2)}\n`;
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${process.pid}.tmp`);

    try {
      await this.fileSystem.mkdir(directory, { recursive: true });
      await this.fileSystem.writeFile(tempPath, json, 'utf-8');
      await this.fileSystem.rename(tempPath, this.filePath);
    } catch (error) {
      this.logger.error({ error, file: this.filePath }, 'Failed to persist timer state');
      await this.fileSystem.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug({ cleanupError, file: tempPath }, 'Could not remove temporary state file');
      });
      throw new StatePersistenceError(
        `Unable to save timer state to ${this.filePath}: ${errorMessage(error)}`,
        this.filePath,
        { cause: error },
      );
    }
  }
}
