import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';

interface LogTarget {
  path: string;
  verbose: boolean;
}

// Set by `convert --log`; null means console only.
let target: LogTarget | null = null;

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Sends a copy of the run's output to `path`. The file is emptied first.
 * With `verbose`, every converted record is listed there too.
 */
export async function initLogger(
  path: string,
  verbose: boolean = false,
): Promise<void> {
  target = { path, verbose };
  await writeFile(path, '', 'utf-8');
}

export function resetLogger(): void {
  target = null;
}

/**
 * Log file only: `[ISO timestamp] message`, colors removed.
 * A write failure is reported on stderr and the run carries on.
 */
export async function logDebug(message: string): Promise<void> {
  if (!target) return;

  const line = `[${new Date().toISOString()}] ${stripAnsi(message)}\n`;
  try {
    await appendFile(target.path, line, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Could not write to ${target.path}: ${reason}`));
  }
}

export function logInfo(message: string): void {
  console.log(message);
}

/** Console and log file; blank padding stays on the console. */
export async function logInfoTee(message: string): Promise<void> {
  logInfo(message);
  const trimmed = message.trim();
  if (trimmed) await logDebug(trimmed);
}

/** Used for skipped rows. */
export async function logWarn(message: string): Promise<void> {
  console.warn(chalk.yellow(`⚠️  ${message}`));
  await logDebug(`WARN: ${message}`);
}

export async function logError(
  message: string,
  error?: unknown,
): Promise<void> {
  console.error(chalk.red(`\n✗ Error: ${message}`));
  if (error === undefined) {
    await logDebug(`ERROR: ${message}`);
    return;
  }
  console.error(error);
  const details = error instanceof Error ? error.message : String(error);
  await logDebug(`ERROR: ${message}. Details: ${details}`);
}

/** Per-record detail, written only when the log was opened verbose. */
export async function logVerbose(message: string): Promise<void> {
  if (!target?.verbose) return;
  await logDebug(`[VERBOSE] ${message}`);
}
