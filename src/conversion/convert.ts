import { readFile, rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import {
  DEFAULT_CONVERSION_OPTIONS,
  type ConversionOptions,
} from '../config.js';
import { serializeRecords } from './csv.js';
import { InputReadError, OutputWriteError } from './errors.js';
import {
  extractRecords,
  type ExtractionResult,
  type FlashcardRecord,
  type SkippedRow,
} from './table.js';

export interface HtmlConversionResult extends ExtractionResult {
  csv: string;
}

export interface FileConversionResult {
  outputPath: string;
  records: FlashcardRecord[];
  rowsConverted: number;
  skipped: SkippedRow[];
}

/**
 * Runs the whole pipeline on an HTML string: table extraction, field
 * cleanup, tag normalization and CSV serialization.
 */
export function convertHtml(
  html: string,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS,
): HtmlConversionResult {
  const { records, skipped } = extractRecords(html);
  return {
    records,
    skipped,
    csv: serializeRecords(records, options),
  };
}

/**
 * Writes a file by writing a temp file beside it, then renaming.
 * A failed run never leaves a partial file at `filePath`.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
): Promise<void> {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    await writeFile(tmpPath, data, 'utf-8');
    await rename(tmpPath, filePath); // atomic on POSIX systems
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Converts a Notion HTML export on disk into an Anki CSV file.
 *
 * All rows are converted in memory before anything is written, so the
 * output file either appears complete or not at all.
 *
 * @throws {InputReadError} if the input cannot be read.
 * @throws {TableStructureError} if the export has no usable table.
 * @throws {OutputWriteError} if the CSV cannot be written.
 */
export async function convertFile(
  inputPath: string,
  outputPath: string,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS,
): Promise<FileConversionResult> {
  let html: string;
  try {
    html = await readFile(inputPath, 'utf-8');
  } catch (error) {
    throw new InputReadError(inputPath, error);
  }

  const { records, skipped, csv } = convertHtml(html, options);

  try {
    await atomicWriteFile(outputPath, csv);
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }

  return { outputPath, records, rowsConverted: records.length, skipped };
}
