/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

let outputFormat: OutputFormat = 'json';
let quietMode = false;
let verboseMode = false;

export function parseOutputFormat(value: string): OutputFormat {
  if (value !== 'json' && value !== 'table') {
    throw new Error(`Unknown output format: ${value} (expected json or table)`);
  }
  return value;
}

export function setOutputFormat(format: OutputFormat): void {
  outputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return outputFormat;
}

export function setQuietMode(quiet: boolean): void {
  quietMode = quiet;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

/**
 * Print JSON output
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Simple table implementation
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const columnWidths: number[] = headers.map((h) => h.length);

  for (const row of rows) {
    row.forEach((cell, i) => {
      if (cell.length > (columnWidths[i] || 0)) {
        columnWidths[i] = cell.length;
      }
    });
  }

  console.log(headers.map((h, i) => chalk.bold(h.padEnd(columnWidths[i]))).join('  '));
  console.log(columnWidths.map((w) => '-'.repeat(w)).join('  '));

  for (const row of rows) {
    console.log(row.map((cell, i) => cell.padEnd(columnWidths[i])).join('  ').trimEnd());
  }
}

/**
 * Print data in current format
 */
export function printData<T>(
  data: T[],
  tableConfig: {
    headers: string[];
    getRow: (item: T) => string[];
  },
  jsonData: unknown = data
): void {
  if (outputFormat === 'json') {
    printJson(jsonData);
    return;
  }

  printTable(tableConfig.headers, data.map(tableConfig.getRow));
}

/**
 * Print success message
 */
export function success(message: string): void {
  if (!quietMode) {
    console.log(chalk.green('✓'), message);
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose message (only if verbose mode)
 */
export function verbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray('▸'), chalk.gray(message));
  }
}
