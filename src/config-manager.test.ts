import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  getConfigPath,
  readConfigFile,
  writeConfigFile,
} from './config-manager.js';

describe('config file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'notion-anki-csv-config-'));
    vi.stubEnv('NOTION_ANKI_CSV_CONFIG_DIR', path.join(dir, 'nested'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('resolves the path inside the configured directory', () => {
    expect(getConfigPath()).toBe(path.join(dir, 'nested', 'config.json'));
  });

  it('returns an empty config when the file does not exist', async () => {
    expect(await readConfigFile()).toEqual({});
  });

  it('reads back what was written', async () => {
    await writeConfigFile({ header: false, tagSeparator: ',' });
    expect(await readConfigFile()).toEqual({ header: false, tagSeparator: ',' });
  });

  it('ignores unknown keys', async () => {
    await writeConfigFile({ header: true });
    await writeFile(
      getConfigPath(),
      JSON.stringify({ header: true, theme: 'dark' }),
      'utf-8',
    );
    expect(await readConfigFile()).toEqual({ header: true });
  });

  it('rejects values of the wrong type', async () => {
    await writeConfigFile({});
    await writeFile(getConfigPath(), JSON.stringify({ header: 'yes' }), 'utf-8');
    await expect(readConfigFile()).rejects.toThrow(/Invalid config file/);
  });
});
