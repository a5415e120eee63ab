import chalk from 'chalk';
import * as path from 'path';
import { parseConversionOptions } from '../config.js';
import { readConfigFile } from '../config-manager.js';
import { convertFile } from '../conversion/convert.js';
import { ConversionError } from '../conversion/errors.js';
import {
  initLogger,
  logError,
  logInfo,
  logInfoTee,
  logVerbose,
  logWarn,
} from '../logger.js';
import type { Command } from './types.js';

interface ConvertArgs {
  input: string;
  output?: string;
  header?: boolean;
  'tag-separator'?: string;
  log?: string;
  verbose: boolean;
}

const command: Command<ConvertArgs> = {
  command: 'convert <input> [output]',
  describe: 'Convert a Notion HTML table export into an Anki CSV file',

  builder: (yargs) => {
    return yargs
      .positional('input', {
        describe: 'Notion HTML export containing the database table',
        type: 'string',
        demandOption: true,
      })
      .positional('output', {
        describe:
          'Output CSV path. If omitted, uses the input name with a .csv extension',
        type: 'string',
      })
      .option('header', {
        describe: 'Write a Notion-ID,Front,Back,Tags header row',
        type: 'boolean',
      })
      .option('tag-separator', {
        alias: 's',
        describe:
          'Placed between tags in the Tags column (whitespace, commas or semicolons)',
        type: 'string',
      })
      .option('log', {
        alias: 'l',
        describe: 'Write a timestamped log of the run to this file',
        type: 'string',
      })
      .option('verbose', {
        alias: 'V',
        describe: 'Log every converted row (requires --log)',
        type: 'boolean',
        default: false,
      })
      .example('$0 convert export.html', 'Write export.csv next to the input')
      .example(
        '$0 convert export.html cards.csv --no-header',
        'Write cards.csv without a header row',
      )
      .example(
        '$0 convert export.html --log convert.log --verbose',
        'Record every row in convert.log',
      );
  },

  handler: async (argv) => {
    const outputPath = resolveOutputPath(argv.input, argv.output);

    try {
      if (argv.log) {
        await initLogger(argv.log, argv.verbose);
      }

      const options = parseConversionOptions(
        { header: argv.header, tagSeparator: argv['tag-separator'] },
        await readConfigFile(),
      );

      logInfo('='.repeat(60));
      await logInfoTee(`Converting ${argv.input} → ${outputPath}`);
      logInfo('='.repeat(60));

      const result = await convertFile(argv.input, outputPath, options);

      for (const row of result.skipped) {
        await logWarn(
          `Skipped row ${row.rowNumber} (${row.reason}): ${row.message}`,
        );
      }
      for (const record of result.records) {
        await logVerbose(
          `Row ${record.id}: ${JSON.stringify(record.front)} [${record.tags.join(', ')}]`,
        );
      }

      await logInfoTee(
        chalk.green(
          `\n✓ Converted ${result.rowsConverted} rows to ${result.outputPath}`,
        ),
      );
      if (result.skipped.length > 0) {
        await logInfoTee(
          chalk.yellow(`  ${result.skipped.length} rows were skipped.`),
        );
      }
    } catch (error) {
      if (error instanceof ConversionError) {
        await logError(error.message);
      } else {
        await logError('Conversion failed', error);
      }
      process.exit(1);
    }
  },
};

export default command;

/**
 * Uses the input file name with a .csv extension when no output is given.
 */
export function resolveOutputPath(inputPath: string, output?: string): string {
  if (output) return output;
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.csv`);
}
