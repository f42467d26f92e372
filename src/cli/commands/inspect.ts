/**
 * Inspect Command
 *
 * Summarizes an EDI document: delimiters, interchange metadata and its
 * transaction sets.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { extractEDIMetaData } from '../../datatypes/edi/EDIMetaData.js';
import { EDIDocument } from '../../model/EDIDocument.js';
import {
  addDelimiterOptions,
  errorMessage,
  readInput,
  resolveDelimiterOptions,
} from '../lib/CommandSupport.js';
import {
  OutputFormatter,
  formatDelimiter,
  formatMetaData,
  formatTransactionSetTable,
} from '../lib/OutputFormatter.js';
import type { InspectOptions, InspectReport } from '../types/index.js';

/** ISA13: interchange control number */
const ISA_CONTROL_NUMBER_FIELD = 13;
/** GS06: group control number */
const GS_CONTROL_NUMBER_FIELD = 6;

export function buildInspectReport(document: EDIDocument): InspectReport {
  return {
    segmentCount: document.segments.length,
    delimiters: document.options.toJSON(),
    metadata: extractEDIMetaData(document.segments),
    transactionSets: document.transactionSets.map((transactionSet, i) => ({
      index: i + 1,
      transactionSetId: transactionSet.transactionSetId,
      controlNumber: transactionSet.controlNumber,
      groupControlNumber: transactionSet.groupHeader?.get(GS_CONTROL_NUMBER_FIELD),
      interchangeControlNumber: transactionSet.interchangeHeader?.get(ISA_CONTROL_NUMBER_FIELD),
      segmentCount: transactionSet.segments.length,
    })),
  };
}

export function formatInspectReport(report: InspectReport): string {
  const { delimiters } = report;
  const lines = [
    formatMetaData(report.metadata),
    '',
    `${chalk.bold('Segments:')} ${report.segmentCount}`,
    `${chalk.bold('Delimiters:')} segment ${formatDelimiter(delimiters.segmentTerminator)}, ` +
      `element ${formatDelimiter(delimiters.elementSeparator)}, ` +
      `component ${formatDelimiter(delimiters.componentSeparator)}, ` +
      `repetition ${formatDelimiter(delimiters.repetitionSeparator)}`,
    '',
  ];
  if (report.transactionSets.length === 0) {
    lines.push(chalk.gray('No transaction sets'));
  } else {
    lines.push(formatTransactionSetTable(report.transactionSets));
    lines.push(chalk.gray(`${report.transactionSets.length} transaction set(s)`));
  }
  return lines.join('\n');
}

/**
 * Register inspect command
 */
export function registerInspectCommand(program: Command): void {
  addDelimiterOptions(
    program
      .command('inspect <file>')
      .description('Show delimiters, metadata and transaction sets ("-" reads stdin)')
      .option('--json', 'Output as JSON')
  ).action(async (file: string, options: InspectOptions) => {
    const formatter = new OutputFormatter(options.json);
    try {
      const document = EDIDocument.parse(await readInput(file), resolveDelimiterOptions(options));
      const report = buildInspectReport(document);
      formatter.output(formatInspectReport(report), report);
    } catch (error) {
      formatter.error(`Failed to inspect ${file}`, errorMessage(error));
      process.exitCode = 1;
    }
  });
}
