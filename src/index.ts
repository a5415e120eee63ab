export { convertFile, convertHtml, atomicWriteFile } from './conversion/convert.js';
export type {
  FileConversionResult,
  HtmlConversionResult,
} from './conversion/convert.js';
export { sanitizeMarkup, colorFromClass, NOTION_COLORS } from './conversion/sanitize-markup.js';
export { transformCodeFences, renderCodeBlock } from './conversion/code-fence.js';
export { normalizeTags, formatTags } from './conversion/tags.js';
export { extractRecords, mapColumns } from './conversion/table.js';
export type {
  ColumnMap,
  ExtractionResult,
  FlashcardRecord,
  SkipReason,
  SkippedRow,
} from './conversion/table.js';
export { serializeRecords, parseRecords, CSV_COLUMNS } from './conversion/csv.js';
export type { CsvOptions } from './conversion/csv.js';
export {
  ConversionError,
  InputReadError,
  OutputWriteError,
  TableStructureError,
  UnterminatedFenceError,
} from './conversion/errors.js';
export {
  ConversionOptions,
  DEFAULT_CONVERSION_OPTIONS,
  parseConversionOptions,
} from './config.js';
