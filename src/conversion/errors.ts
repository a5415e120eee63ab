export type ConversionErrorCode =
  | 'INPUT_READ'
  | 'TABLE_STRUCTURE'
  | 'UNTERMINATED_FENCE'
  | 'OUTPUT_WRITE';

/**
 * Base class for every failure the conversion pipeline reports.
 * The CLI prints `message` and exits; library callers can switch on `code`.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputReadError extends ConversionError {
  constructor(
    readonly inputPath: string,
    cause: unknown,
  ) {
    super(
      'INPUT_READ',
      `Could not read input file '${inputPath}': ${describeCause(cause)}`,
      cause,
    );
  }
}

/**
 * The HTML has no usable table, or its header row lacks a required column.
 */
export class TableStructureError extends ConversionError {
  constructor(
    readonly expected: string,
    readonly found: string,
  ) {
    super('TABLE_STRUCTURE', `Expected ${expected}, but found ${found}.`);
  }
}

export class UnterminatedFenceError extends ConversionError {
  constructor(readonly markerCount: number) {
    super(
      'UNTERMINATED_FENCE',
      `Unterminated code fence: found ${markerCount} \`\`\` markers, expected an even number.`,
    );
  }
}

export class OutputWriteError extends ConversionError {
  constructor(
    readonly outputPath: string,
    cause: unknown,
  ) {
    super(
      'OUTPUT_WRITE',
      `Could not write output file '${outputPath}': ${describeCause(cause)}`,
      cause,
    );
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
