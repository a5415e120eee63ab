import Papa from 'papaparse';
import { z } from 'zod';
import type { FlashcardRecord } from './table.js';
import { formatTags } from './tags.js';

export const CSV_COLUMNS = ['Notion-ID', 'Front', 'Back', 'Tags'] as const;

export interface CsvOptions {
  /** Emit `Notion-ID,Front,Back,Tags` as the first line. */
  header: boolean;
  tagSeparator: string;
}

const CsvRow = z.tuple([z.string(), z.string(), z.string(), z.string()]);

/**
 * Serializes records to CSV, one line per record in the fixed column order
 * ID, Front, Back, Tags. Fields holding commas, quotes or newlines are
 * quoted by papaparse.
 */
export function serializeRecords(
  records: readonly FlashcardRecord[],
  options: CsvOptions,
): string {
  return Papa.unparse(
    {
      fields: [...CSV_COLUMNS],
      data: records.map((record) => [
        record.id,
        record.front,
        record.back,
        formatTags(record.tags, options.tagSeparator),
      ]),
    },
    {
      header: options.header,
      delimiter: ',',
      newline: '\n',
    },
  );
}

/**
 * Reads CSV produced by serializeRecords back into records.
 */
export function parseRecords(
  csv: string,
  options: CsvOptions,
): FlashcardRecord[] {
  const parseResult = Papa.parse<string[]>(csv, {
    delimiter: ',',
    skipEmptyLines: true,
  });
  if (parseResult.errors.length > 0) {
    throw new Error(`CSV parsing errors: ${JSON.stringify(parseResult.errors)}`);
  }

  const rows = options.header ? parseResult.data.slice(1) : parseResult.data;
  return rows.map((row, index) => {
    const result = CsvRow.safeParse(row);
    if (!result.success) {
      throw new Error(
        `Row ${index + 1} does not have the columns ${CSV_COLUMNS.join(', ')}:\n${z.prettifyError(result.error)}`,
      );
    }
    const [id, front, back, tags] = result.data;
    return {
      id,
      front,
      back,
      tags: tags.split(options.tagSeparator).filter((tag) => tag.length > 0),
    };
  });
}
