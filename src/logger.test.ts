import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  initLogger,
  logDebug,
  logVerbose,
  logWarn,
  resetLogger,
  stripAnsi,
} from './logger.js';

describe('stripAnsi', () => {
  it('removes color escape codes', () => {
    expect(stripAnsi('\x1b[32m✓ done\x1b[39m')).toBe('✓ done');
  });
});

describe('log file', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'notion-anki-csv-log-'));
    logPath = path.join(dir, 'run.log');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    resetLogger();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes timestamped warnings', async () => {
    await initLogger(logPath);
    await logWarn('Skipped row 2');

    const content = await readFile(logPath, 'utf-8');
    expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN: Skipped row 2\n$/);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('only records verbose lines in verbose mode', async () => {
    await initLogger(logPath, false);
    await logVerbose('hidden');
    expect(await readFile(logPath, 'utf-8')).toBe('');

    await initLogger(logPath, true);
    await logVerbose('shown');
    expect(await readFile(logPath, 'utf-8')).toMatch(/\] \[VERBOSE\] shown\n$/);
  });

  it('does nothing without a log file', async () => {
    await expect(logDebug('nowhere')).resolves.toBeUndefined();
  });
});
