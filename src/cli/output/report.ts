/**
 * Terminal output for validation reports
 */

import chalk from 'chalk';

import type { ErrorGroupSummary, ResultSummary } from '../../domain/services/ErrorSummary.js';
import type { ValidationError } from '../../domain/model/ValidationError.js';
import { formatContext } from '../../domain/model/ValidationError.js';

/** `line 4: \`abc\` {maxLength = 2}`. The context is left out when it has nothing to show. */
export function formatSample(error: ValidationError): string {
  const base = `line ${String(error.line)}: \`${error.value}\``;
  const context = formatContext(error.context);
  return context === '{}' ? base : `${base} ${context}`;
}

/** Plain-text lines for one group, without colors. */
export function formatGroup(group: ErrorGroupSummary): string[] {
  const title = group.field === undefined ? '' : `${group.field} `;
  const lines = [
    `${title}[${String(group.code)}] ${group.description}`,
    `  occurrences: ${String(group.occurrences)}`,
    `  lines: ${group.lines.join(', ')}`,
  ];

  for (const sample of group.samples) {
    lines.push(`    ${formatSample(sample)}`);
  }

  return lines;
}

function printGroup(group: ErrorGroupSummary): void {
  const [title, ...rest] = formatGroup(group);
  if (title !== undefined) console.log('  ' + chalk.yellow.bold(title));
  for (const line of rest) console.log('  ' + chalk.gray(line));
}

export function printReport(summary: ResultSummary): void {
  if (summary.lineIssues.length > 0) {
    console.log(chalk.red('* Row-level issues were found.'));
    summary.lineIssues.forEach(printGroup);
  }

  if (summary.fieldIssues.length > 0) {
    console.log(chalk.red('* Field-level issues were found.'));
    summary.fieldIssues.forEach(printGroup);
  }

  if (summary.passed) {
    console.log(chalk.green('* Everything looks good!'));
  }
}
