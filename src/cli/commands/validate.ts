/**
 * Validate command implementation
 */

import { basename } from 'node:path';
import { createGunzip } from 'node:zlib';

import chalk from 'chalk';

import type { DataSource } from '../../domain/ports/DataSource.js';
import type { DataModel } from '../../domain/model/DataModel.js';
import { TableCheck } from '../../TableCheck.js';
import { HeaderError } from '../../application/TableValidator.js';
import { summarizeResult } from '../../domain/services/ErrorSummary.js';
import { resolveCompression } from '../../infrastructure/detectCompression.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import { StreamSource } from '../../infrastructure/sources/StreamSource.js';
import { readModelDefinitionFile } from '../../infrastructure/schema/JsonTableLoader.js';
import { formatSample, printReport } from '../output/report.js';

export interface ValidateOptions {
  schema: string;
  delim: string;
  comment: string;
  compr?: string;
  sample: string;
  withReplacement: boolean;
}

export interface InputSpec {
  readonly path: string;
  /** Explicit table name, or `undefined` when it should come from the file name. */
  readonly table?: string;
}

export const STDIN_INPUT = '-';

/** Split `file[:table]`. */
export function parseInput(arg: string): InputSpec {
  const sep = arg.indexOf(':');
  if (sep < 0) return { path: arg };

  const table = arg.slice(sep + 1);
  return table === '' ? { path: arg.slice(0, sep) } : { path: arg.slice(0, sep), table };
}

/** The explicit table, or the file's base name up to its first dot. */
export function resolveTableName(input: InputSpec): string | undefined {
  if (input.table !== undefined) return input.table;
  if (input.path === STDIN_INPUT) return undefined;
  return basename(input.path).split('.')[0];
}

function openSource(path: string, compression: string | undefined): DataSource {
  if (path !== STDIN_INPUT) {
    return new FilePathSource(path, { compression });
  }

  const stream = resolveCompression(compression, '') === 'gzip' ? process.stdin.pipe(createGunzip()) : process.stdin;
  return new StreamSource(stream, { fileName: 'stdin' });
}

function parseSampleSize(value: string): number {
  const size = Number.parseInt(value, 10);
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`--sample must be a positive integer, got '${value}'`);
  }
  return size;
}

/** Validate one input. Resolves `true` when it passed. */
async function validateInput(
  model: DataModel,
  input: InputSpec,
  options: ValidateOptions,
  sampleSize: number,
): Promise<boolean> {
  const tableName = resolveTableName(input);
  const table = tableName === undefined ? undefined : model.getTable(tableName);

  if (!table) {
    const label = tableName === undefined ? 'A table name is required for standard input' : `Unknown table '${tableName}'`;
    console.log(chalk.red(`* ${label}.`));
    console.log(chalk.gray(`Choices are: ${model.tableNames().join(', ')}`));
    return false;
  }

  console.log(chalk.white(`* Evaluating '${table.name}' table in '${input.path}'...`));

  let source: DataSource;
  try {
    source = openSource(input.path, options.compr);
  } catch (error) {
    console.log(chalk.red(`* Could not open file: ${error instanceof Error ? error.message : String(error)}`));
    return false;
  }

  const check = new TableCheck({ table, delimiter: options.delim, comment: options.comment })
    .from(source)
    .on('plan:unsupported-type', (event) => {
      console.log(chalk.yellow(`* Field '${event.field}' has unsupported type '${event.fieldType}'; only encoding and presence are checked.`));
    });

  try {
    const report = await check.run();
    printReport(
      summarizeResult(report.result, report.fields, {
        sampleSize,
        withReplacement: options.withReplacement,
      }),
    );
    return report.summary.passed;
  } catch (error) {
    if (error instanceof HeaderError) {
      console.log(chalk.red('* Problem reading CSV header:'));
      console.log(chalk.gray(`    ${formatSample(error.error)}`));
    } else {
      console.log(chalk.red(`* Problem reading CSV data: ${error instanceof Error ? error.message : String(error)}`));
    }
    return false;
  }
}

export async function validateCommand(inputs: string[], options: ValidateOptions): Promise<void> {
  let sampleSize: number;
  let model: DataModel;
  try {
    sampleSize = parseSampleSize(options.sample);
    model = await readModelDefinitionFile(options.schema);
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
    return;
  }

  const label = model.version === '' ? model.name : `${model.name}/${model.version}`;
  console.log(chalk.bold.cyan(`Validating against model '${label}'`));

  let passed = true;
  for (const arg of inputs) {
    // Inputs are checked one after another so their output does not interleave.
    const ok = await validateInput(model, parseInput(arg), options, sampleSize);
    passed = passed && ok;
  }

  if (!passed) {
    process.exitCode = 1;
  }
}
