import * as fsPromises from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FileStateRepository, type FileSystem } from '../src/store/fileStateRepository';
import { StatePersistenceError } from '../src/store/stateRepository';
import { captureLogger } from './helpers';

describe('FileStateRepository', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fsPromises.mkdtemp(join(tmpdir(), 'pomodoro-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fsPromises.rm(tempDir, { recursive: true, force: true });
  });

  const quietRepository = (path: string, fileSystem?: FileSystem) =>
    new FileStateRepository(path, fileSystem, captureLogger('debug').logger);

  it('persists remaining seconds and loads them back', async () => {
    const path = join(tempDir, 'state.json');
    await quietRepository(path).save(1490);

    const raw = await fsPromises.readFile(path, 'utf-8');
    expect(raw).toBe('{\n  "secondsRemaining": 1490\n}\n');

    await expect(quietRepository(path).load()).resolves.toEqual({ secondsRemaining: 1490 });
  });

  it('loads zero after zero was saved', async () => {
    const path = join(tempDir, 'state.json');
    const repository = quietRepository(path);
    await repository.save(1490);
    await repository.save(0);

    await expect(repository.load()).resolves.toEqual({ secondsRemaining: 0 });
  });

  it('treats a missing file as no resumable timer', async () => {
    const log = captureLogger('debug');
    const repository = new FileStateRepository(join(tempDir, 'missing.json'), undefined, log.logger);

    await expect(repository.load()).resolves.toEqual({ secondsRemaining: 0 });
    expect(log.entries().map((entry) => entry.msg)).toEqual(['No saved timer state, starting fresh']);
  });

  it.each([
    ['malformed JSON', '{"secondsRemaining": '],
    ['wrong shape', '{"seconds_remaining": 12}'],
    ['negative value', '{"secondsRemaining": -4}'],
    ['fractional value', '{"secondsRemaining": 1.5}'],
    ['string value', '{"secondsRemaining": "90"}'],
    ['empty file', ''],
  ])('recovers from a corrupt state file (%s)', async (_label, content) => {
    const path = join(tempDir, 'corrupt.json');
    await fsPromises.writeFile(path, content, 'utf-8');
    const log = captureLogger();

    const state = await new FileStateRepository(path, undefined, log.logger).load();

    expect(state).toEqual({ secondsRemaining: 0 });
    expect(log.entries()).toHaveLength(1);
    expect(log.entries()[0].level).toBe(40);
  });

  it('creates missing parent directories when saving', async () => {
    const path = join(tempDir, 'nested', 'deeper', 'state.json');
    await quietRepository(path).save(42);

    await expect(quietRepository(path).load()).resolves.toEqual({ secondsRemaining: 42 });
  });

  it('writes through a temporary file and leaves no temporary file behind', async () => {
    const path = join(tempDir, 'state.json');
    await quietRepository(path).save(7);

    expect(await fsPromises.readdir(tempDir)).toEqual(['state.json']);
  });

  it('rejects invalid values before touching the disk', async () => {
    const path = join(tempDir, 'state.json');
    const repository = quietRepository(path);

    await expect(repository.save(-1)).rejects.toBeInstanceOf(StatePersistenceError);
    await expect(repository.save(2.5)).rejects.toBeInstanceOf(StatePersistenceError);
    expect(await fsPromises.readdir(tempDir)).toEqual([]);
  });

  it('surfaces write failures and lets later saves succeed', async () => {
    const path = join(tempDir, 'recovery.json');

    const writeMock = vi
      .fn<FileSystem['writeFile']>()
      .mockRejectedValueOnce(new Error('disk-full'))
      .mockImplementation((file, data, options) => fsPromises.writeFile(file, data, options));

    const fakeFs: FileSystem = {
      ...fsPromises,
      writeFile: writeMock,
    };

    const repository = quietRepository(path, fakeFs);

    const failure = repository.save(100);
    await expect(failure).rejects.toBeInstanceOf(StatePersistenceError);
    await expect(failure).rejects.toThrow(`Unable to save timer state to ${path}: disk-full`);

    await repository.save(90);
    await expect(repository.load()).resolves.toEqual({ secondsRemaining: 90 });
    expect(writeMock).toHaveBeenCalledTimes(2);
  });
});
