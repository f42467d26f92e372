/**
 * Conversion Commands
 *
 * to-xml, from-xml and format: read one document, write it in another form.
 */

import { Command } from 'commander';
import { getCodecConfig } from '../../datatypes/edi/config.js';
import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import { EDIDocument } from '../../model/EDIDocument.js';
import {
  addDelimiterOptions,
  errorMessage,
  explicitDelimiters,
  readInput,
  resolveDelimiterOptions,
  writeOutput,
} from '../lib/CommandSupport.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import type { FormatOptions, FromXmlOptions, ToXmlOptions } from '../types/index.js';

registerComponent('cli', 'Command line interface');
const logger = getLogger('cli');

/**
 * EDI text to XML text
 */
export function convertToXml(edi: string, options: ToXmlOptions = {}): string {
  const document = EDIDocument.parse(edi, resolveDelimiterOptions(options));
  return document.toXmlString({
    rootName: options.root ?? getCodecConfig().xmlRootName,
    groupTransactionSets: options.loops ?? false,
    pretty: options.pretty ?? false,
  });
}

/**
 * XML text to EDI text. Delimiter flags seed the document; an ISA header
 * still declares its own component and repetition separators.
 */
export function convertFromXml(xml: string, options: FromXmlOptions = {}): string {
  const document = EDIDocument.parseXml(xml, resolveDelimiterOptions(options));
  return document.serialize({ lineSeparator: options.lineBreak ? '\n' : '' });
}

/**
 * Re-serialize EDI text. The input's delimiters are inferred; the flags
 * replace them on output.
 */
export function reformatEDI(edi: string, options: FormatOptions = {}): string {
  const document = EDIDocument.parse(edi, getCodecConfig().delimiters);
  return document.serialize(
    { lineSeparator: options.lineBreak ? '\n' : '' },
    explicitDelimiters(options).toJSON()
  );
}

async function runConversion(
  file: string,
  output: string | undefined,
  convert: (input: string) => string
): Promise<void> {
  const formatter = new OutputFormatter();
  try {
    const written = await writeOutput(convert(await readInput(file)), output);
    if (written) {
      formatter.success(`Wrote ${written}`);
    }
  } catch (error) {
    logger.debug(`Conversion of ${file} failed`, { error: errorMessage(error) });
    formatter.error(`Failed to convert ${file}`, errorMessage(error));
    process.exitCode = 1;
  }
}

/**
 * Register conversion commands
 */
export function registerConvertCommands(program: Command): void {
  // ==========================================================================
  // to-xml <file>
  // ==========================================================================
  addDelimiterOptions(
    program
      .command('to-xml <file>')
      .description('Convert EDI text to XML ("-" reads stdin)')
      .option('--root <name>', 'Root element name')
      .option('--loops', 'Wrap each transaction set in an <stloop> element')
      .option('--pretty', 'Indent the XML')
      .option('-o, --output <file>', 'Write to a file instead of stdout')
  ).action(async (file: string, options: ToXmlOptions) => {
    await runConversion(file, options.output, (edi) => convertToXml(edi, options));
  });

  // ==========================================================================
  // from-xml <file>
  // ==========================================================================
  addDelimiterOptions(
    program
      .command('from-xml <file>')
      .description('Convert XML to EDI text ("-" reads stdin)')
      .option('--line-break', 'Start a new line after every segment')
      .option('-o, --output <file>', 'Write to a file instead of stdout')
  ).action(async (file: string, options: FromXmlOptions) => {
    await runConversion(file, options.output, (xml) => convertFromXml(xml, options));
  });

  // ==========================================================================
  // format <file>
  // ==========================================================================
  addDelimiterOptions(
    program
      .command('format <file>')
      .description('Re-serialize EDI text, optionally with other delimiters')
      .option('--line-break', 'Start a new line after every segment')
      .option('-o, --output <file>', 'Write to a file instead of stdout')
  ).action(async (file: string, options: FormatOptions) => {
    await runConversion(file, options.output, (edi) => reformatEDI(edi, options));
  });
}
