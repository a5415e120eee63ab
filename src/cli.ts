#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import convertCmd from './commands/convert.js';
import configCmd from './commands/config.js';

void yargs(hideBin(process.argv))
  .command(convertCmd)
  .command(configCmd)
  .scriptName('notion-anki-csv')
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
