#!/usr/bin/env node
/**
 * edi-codec CLI
 *
 * Converts ANSI X12 documents between delimited text and XML.
 *
 * Usage: edi-codec [options] <command> [arguments]
 *
 * Run `edi-codec --help` for detailed usage information. Environment
 * variables may also be set in a .env file in the working directory.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { LogLevel } from '../logging/LogLevel.js';
import { setGlobalLevel, shutdownLogging } from '../logging/LoggerFactory.js';
import { registerConvertCommands } from './commands/convert.js';
import { registerInspectCommand } from './commands/inspect.js';
import type { GlobalOptions } from './types/index.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('edi-codec')
    .description('Convert ANSI X12 EDI between delimited text and XML')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Log codec decisions to stderr');

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerConvertCommands(program);
  registerInspectCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# EDI to indented XML, one <stloop> per transaction set')}
  $ edi-codec to-xml claim.edi --pretty --loops

  ${chalk.gray('# XML back to EDI, one segment per line')}
  $ edi-codec from-xml claim.xml --line-break -o claim.edi

  ${chalk.gray('# Switch the segment terminator to a newline')}
  $ edi-codec format claim.edi --segment-terminator '\\n'

  ${chalk.gray('# List transaction sets')}
  $ cat claim.edi | edi-codec inspect -

${chalk.bold('Environment:')}
  EDI_SEGMENT_TERMINATOR, EDI_ELEMENT_SEPARATOR, EDI_COMPONENT_SEPARATOR,
  EDI_REPETITION_SEPARATOR, EDI_XML_ROOT, LOG_LEVEL, EDI_DEBUG_COMPONENTS
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
