import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { atLeast, closeLogFile, currentLogFile, error, info, setLogFile, setLogLevel } from '../src/pipeline/log';
import { makeTmpDir } from './helpers';

describe('log', () => {
  afterEach(() => {
    closeLogFile();
    setLogLevel('error');
    vi.restoreAllMocks();
  });

  it('orders levels', () => {
    expect(atLeast('warn', 'info')).toBe(true);
    expect(atLeast('debug', 'info')).toBe(false);
  });

  it('mirrors emitted records into the run log as JSON lines', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const dir = await makeTmpDir();
    const file = path.join(dir, 'logs', 'acquire-1.log');
    setLogFile(file);
    expect(currentLogFile()).toBe(file);

    info('dropped.below.level');
    error('acquire.video.failed', { videoId: 'vid001' });
    closeLogFile();
    expect(currentLogFile()).toBeNull();

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'error', msg: 'acquire.video.failed', videoId: 'vid001' });
    expect(stderr).toHaveBeenCalledTimes(1);
    await fs.remove(dir);
  });
});
