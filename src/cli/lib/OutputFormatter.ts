/**
 * Output Formatter
 *
 * Consistent output for CLI commands: plain tables for people, JSON for
 * scripts. Status messages go to stderr so that converted documents printed
 * on stdout can be piped.
 */

import chalk from 'chalk';
import type { EDIMetaData } from '../../datatypes/edi/EDIMetaData.js';
import type { TransactionSetSummary } from '../types/index.js';

// =============================================================================
// Format Helpers
// =============================================================================

/**
 * Truncate string to max length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

/**
 * Show a delimiter character so that control characters stay visible.
 */
export function formatDelimiter(delimiter: string | undefined): string {
  if (delimiter === undefined) return '-';
  return JSON.stringify(delimiter);
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Table Formatting
// =============================================================================

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

export interface TableOptions {
  columns: TableColumn[];
  border?: boolean;
}

/**
 * Create a simple ASCII table
 */
export function createTable(data: string[][], options: TableOptions): string {
  const { columns, border = true } = options;
  const lines: string[] = [];

  // Header or column width, whichever is larger
  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] ?? '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const h = border ? '─' : '';
  const v = border ? '│' : '';

  const renderRow = (cells: readonly string[]): string => {
    const row = columns
      .map((col, i) => pad(cells[i] ?? '', widths[i] ?? 0, col.align))
      .map((cell) => (border ? ` ${cell} ` : cell))
      .join(border ? v : ' ');
    return border ? v + row + v : row;
  };

  if (border) {
    lines.push('┌' + widths.map((w) => h.repeat(w + 2)).join('┬') + '┐');
  }

  lines.push(renderRow(columns.map((col) => col.header)));

  if (border) {
    lines.push('├' + widths.map((w) => h.repeat(w + 2)).join('┼') + '┤');
  } else {
    lines.push(widths.map((w) => '-'.repeat(w)).join(' '));
  }

  for (const row of data) {
    lines.push(renderRow(row));
  }

  if (border) {
    lines.push('└' + widths.map((w) => h.repeat(w + 2)).join('┴') + '┘');
  }

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

/**
 * Format transaction sets as a table
 */
export function formatTransactionSetTable(summaries: readonly TransactionSetSummary[], border = true): string {
  const columns: TableColumn[] = [
    { header: '#', width: 3, align: 'right' },
    { header: 'TYPE', width: 4 },
    { header: 'CONTROL', width: 9 },
    { header: 'GROUP', width: 9 },
    { header: 'INTERCHANGE', width: 11 },
    { header: 'SEGMENTS', width: 8, align: 'right' },
  ];

  const data = summaries.map((summary) => [
    String(summary.index),
    summary.transactionSetId ?? '-',
    summary.controlNumber ?? '-',
    summary.groupControlNumber ?? '-',
    summary.interchangeControlNumber ?? '-',
    String(summary.segmentCount),
  ]);

  return createTable(data, { columns, border });
}

/**
 * Format interchange metadata as aligned key/value lines
 */
export function formatMetaData(metadata: EDIMetaData): string {
  const lines = [
    `${chalk.bold('Source:')}  ${metadata.source ?? '-'}`,
    `${chalk.bold('Type:')}    ${metadata.type ?? '-'}`,
    `${chalk.bold('Version:')} ${metadata.version ?? '-'}`,
  ];
  return lines.join('\n');
}

// =============================================================================
// Output Formatter Class
// =============================================================================

export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  /**
   * Output data (table or JSON based on mode)
   */
  output(tableOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(tableOutput);
    }
  }

  success(message: string): void {
    if (!this.jsonMode) {
      console.error(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(typeof details === 'string' ? details : formatJson(details)));
      }
    }
  }

  warn(message: string): void {
    if (!this.jsonMode) {
      console.error(chalk.yellow('⚠') + ' ' + message);
    }
  }
}

export default OutputFormatter;
