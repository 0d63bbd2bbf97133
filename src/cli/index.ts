#!/usr/bin/env node
/**
 * tablecheck CLI
 * Checks delimited data files against table definitions
 */

import { Command } from 'commander';

import { validateCommand } from './commands/validate.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('tablecheck')
  .description(
    'Reads delimited files (such as CSV) and checks them against a table definition. ' +
      "Each input may be annotated with a table name, <file>:<table>; otherwise the file's base name is used. " +
      "Use '-' to read standard input. Exits with a nonzero status when any input has errors.",
  )
  .version(VERSION)
  .argument('<inputs...>', 'Input files, each optionally suffixed with :<table>')
  .requiredOption('-s, --schema <file>', 'JSON file defining the table or model to validate against')
  .option('-d, --delim <char>', 'Field delimiter used in the inputs', ',')
  .option('--comment <char>', 'Marker of comment lines', '#')
  .option('-c, --compr <method>', 'Compression of the inputs (gzip). Inferred from the file extension when omitted')
  .option('-n, --sample <number>', 'Number of example errors shown per issue', '5')
  .option('--with-replacement', 'Draw example errors independently, allowing repeats', false)
  .action(validateCommand);

await program.parseAsync();
