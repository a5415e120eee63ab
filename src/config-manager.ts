import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { PersistentConfig } from './config.js';

/**
 * Location of the config file. `NOTION_ANKI_CSV_CONFIG_DIR` overrides the
 * default directory under `~/.config`.
 */
export function getConfigPath(): string {
  const configDir =
    process.env.NOTION_ANKI_CSV_CONFIG_DIR ??
    path.join(os.homedir(), '.config', 'notion-anki-csv');
  return path.join(configDir, 'config.json');
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export async function readConfigFile(): Promise<PersistentConfig> {
  const configPath = getConfigPath();
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const parsed = JSON.parse(content) as unknown;
  const result = PersistentConfig.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid config file ${configPath}:\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data;
}

export async function writeConfigFile(config: PersistentConfig): Promise<void> {
  const configPath = getConfigPath();
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');
}
