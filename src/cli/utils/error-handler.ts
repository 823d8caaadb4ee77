import chalk from 'chalk';
import { isFtxError } from '../../exchanges/ftx/ftx-errors';

export type TableRow = Record<string, string | number | boolean | null | undefined>;

/**
 * Print a CLI error and exit with code 1
 * @param error Error object or message
 * @param context Context where the error occurred
 */
export function handleError(error: unknown, context?: string): never {
  const errorMessage =
    typeof error === 'string' ? error : error instanceof Error ? error.message : String(error);
  const contextStr = context ? ` [${context}]` : '';
  const kindStr = isFtxError(error) ? chalk.gray(` (${error.kind})`) : '';

  console.error(chalk.red(`❌ Error${contextStr}: ${errorMessage}`) + kindStr);

  if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }

  process.exit(1);
}

/**
 * Handle async command execution with error handling
 * @param fn Async function to execute
 * @param context Context for error handling
 */
export async function executeCommand(fn: () => Promise<void>, context: string): Promise<void> {
  try {
    await fn();
  } catch (error) {
    handleError(error, context);
  }
}

export function showSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function showInfo(message: string): void {
  console.log(chalk.blue(`ℹ️  ${message}`));
}

/**
 * Render a loosely-typed record field for table output
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Display data in a formatted table
 * @param data Rows to display
 * @param headers Optional custom headers
 */
export function displayTable(data: TableRow[], headers?: string[]): void {
  if (data.length === 0) {
    showInfo('No data to display');
    return;
  }

  const keys = headers || Object.keys(data[0]);
  const cell = (row: TableRow, key: string): string => {
    const value = row[key];
    return value === null || value === undefined ? '' : String(value);
  };
  const columnWidths = keys.map(key => {
    const maxWidth = Math.max(key.length, ...data.map(row => cell(row, key).length));
    return Math.min(maxWidth, 20);
  });

  const headerRow = keys.map((key, i) => chalk.bold(key.padEnd(columnWidths[i]))).join(' │ ');
  console.log(headerRow);

  const separator = columnWidths.map(width => '─'.repeat(width)).join('─┼─');
  console.log(separator);

  data.forEach(row => {
    const dataRow = keys
      .map((key, i) => {
        let value = cell(row, key);
        if (value.length > columnWidths[i]) {
          value = value.substring(0, columnWidths[i] - 3) + '...';
        }
        return value.padEnd(columnWidths[i]);
      })
      .join(' │ ');
    console.log(dataRow);
  });
}
