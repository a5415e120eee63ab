import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { TableStructureError, UnterminatedFenceError } from './errors.js';
import { convertBack, extractTagTexts, toPlainText } from './fields.js';
import { normalizeTags } from './tags.js';

/**
 * One flashcard candidate built from a table row.
 */
export interface FlashcardRecord {
  readonly id: string;
  /** Plain text, no markup. */
  readonly front: string;
  /** Cleaned HTML. */
  readonly back: string;
  readonly tags: readonly string[];
}

export type SkipReason =
  | 'missing-cells'
  | 'missing-id'
  | 'duplicate-id'
  | 'unterminated-fence';

export interface SkippedRow {
  /** 1-based position among the table's data rows. */
  rowNumber: number;
  reason: SkipReason;
  message: string;
}

export interface ExtractionResult {
  records: FlashcardRecord[];
  skipped: SkippedRow[];
}

export interface ColumnMap {
  id: number;
  front: number;
  back: number;
  tags?: number;
}

type ColumnName = keyof ColumnMap;

const REQUIRED_COLUMNS = ['id', 'front', 'back'] as const;

function recognizeColumn(header: string): ColumnName | null {
  if (header.includes('notion-id') || header === 'id') return 'id';
  if (header === 'front') return 'front';
  if (header === 'back') return 'back';
  if (header.includes('tags')) return 'tags';
  return null;
}

/**
 * Maps header cells to field positions. The first header recognized for a
 * field wins; unrecognized columns are ignored.
 *
 * @throws {TableStructureError} if the id, front or back column is missing.
 */
export function mapColumns(headers: readonly string[]): ColumnMap {
  const found: Partial<ColumnMap> = {};
  headers.forEach((raw, index) => {
    const column = recognizeColumn(raw.trim().toLowerCase());
    if (column !== null && found[column] === undefined) {
      found[column] = index;
    }
  });

  const { id, front, back, tags } = found;
  if (id === undefined || front === undefined || back === undefined) {
    const missing = REQUIRED_COLUMNS.filter((c) => found[c] === undefined);
    throw new TableStructureError(
      `columns Notion-ID, Front and Back (missing: ${missing.join(', ')})`,
      headers.length > 0
        ? `headers [${headers.map((h) => `"${h.trim()}"`).join(', ')}]`
        : 'no header cells',
    );
  }

  return tags === undefined ? { id, front, back } : { id, front, back, tags };
}

/**
 * Locates the first table of a Notion HTML export and turns each data row
 * into a FlashcardRecord.
 *
 * Rows that cannot become a valid record (too few cells, empty or repeated
 * id, unterminated code fence) are left out and reported in `skipped`.
 *
 * @throws {TableStructureError} when there is no table or a required
 * column is missing.
 */
export function extractRecords(html: string): ExtractionResult {
  const $ = cheerio.load(html);
  const table = $('table').first();
  const tableNode = table.get(0);
  if (tableNode === undefined) {
    throw new TableStructureError('a <table> element', 'none in the document');
  }

  // Rows of nested tables belong to a cell, not to this table.
  const rows = table
    .find('tr')
    .toArray()
    .filter((tr) => $(tr).closest('table').get(0) === tableNode);

  const headerRow =
    rows.find((tr) => $(tr).parent().is('thead')) ?? rows.at(0);
  if (headerRow === undefined) {
    throw new TableStructureError('a header row', 'a table without rows');
  }

  const headers = cellsOf($, headerRow).map((cell) => $(cell).text());
  const columns = mapColumns(headers);
  const lastRequired = Math.max(columns.id, columns.front, columns.back);

  const records: FlashcardRecord[] = [];
  const skipped: SkippedRow[] = [];
  const seenIds = new Set<string>();
  let rowNumber = 0;

  for (const tr of rows) {
    if (tr === headerRow || $(tr).parent().is('thead')) continue;

    const cells = cellsOf($, tr);
    if (cells.length === 0) continue;
    rowNumber++;

    if (cells.length <= lastRequired) {
      skipped.push({
        rowNumber,
        reason: 'missing-cells',
        message: `expected at least ${lastRequired + 1} cells, found ${cells.length}`,
      });
      continue;
    }

    const id = $(cells[columns.id]).text().trim();
    if (!id) {
      skipped.push({
        rowNumber,
        reason: 'missing-id',
        message: 'the Notion-ID cell is empty',
      });
      continue;
    }
    if (seenIds.has(id)) {
      skipped.push({
        rowNumber,
        reason: 'duplicate-id',
        message: `id "${id}" already appeared in an earlier row`,
      });
      continue;
    }

    let back: string;
    try {
      back = convertBack($(cells[columns.back]).html() ?? '');
    } catch (error) {
      if (error instanceof UnterminatedFenceError) {
        skipped.push({
          rowNumber,
          reason: 'unterminated-fence',
          message: `${error.message} (row id "${id}")`,
        });
        continue;
      }
      throw error;
    }

    const tagCell =
      columns.tags === undefined ? undefined : cells.at(columns.tags);

    seenIds.add(id);
    records.push({
      id,
      front: toPlainText(cells[columns.front]),
      back,
      tags: tagCell === undefined ? [] : normalizeTags(extractTagTexts(tagCell)),
    });
  }

  return { records, skipped };
}

function cellsOf($: cheerio.CheerioAPI, tr: Element): Element[] {
  return $(tr).children('td, th').toArray();
}
