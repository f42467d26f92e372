/**
 * Shared plumbing for the conversion commands: delimiter flags, reading the
 * input file (or stdin for "-") and writing the result.
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { getCodecConfig } from '../../datatypes/edi/config.js';
import { EDIOptions, unescapeDelimiter } from '../../datatypes/edi/EDIOptions.js';
import { readStreamText } from '../../io/EDIFileIO.js';
import type { DelimiterOptions } from '../types/index.js';

/** Input path meaning standard input */
export const STDIN_PATH = '-';

/**
 * Add the four delimiter flags. Values accept \n, \r, \t and \\ escapes.
 */
export function addDelimiterOptions(command: Command): Command {
  return command
    .option('--segment-terminator <char>', 'Segment terminator', unescapeDelimiter)
    .option('--element-separator <char>', 'Element separator', unescapeDelimiter)
    .option('--component-separator <char>', 'Component separator', unescapeDelimiter)
    .option('--repetition-separator <char>', 'Repetition separator', unescapeDelimiter);
}

/**
 * Delimiters from the command line, falling back to the environment
 * (EDI_SEGMENT_TERMINATOR and friends). Unset ones stay undefined.
 */
export function resolveDelimiterOptions(options: DelimiterOptions): EDIOptions {
  const defaults = getCodecConfig().delimiters;
  return new EDIOptions({
    segmentTerminator: options.segmentTerminator ?? defaults.segmentTerminator,
    elementSeparator: options.elementSeparator ?? defaults.elementSeparator,
    componentSeparator: options.componentSeparator ?? defaults.componentSeparator,
    repetitionSeparator: options.repetitionSeparator ?? defaults.repetitionSeparator,
  });
}

/**
 * Only the delimiters given on the command line, for overriding a parsed
 * document's own.
 */
export function explicitDelimiters(options: DelimiterOptions): EDIOptions {
  const explicit: DelimiterOptions = {};
  if (options.segmentTerminator !== undefined) explicit.segmentTerminator = options.segmentTerminator;
  if (options.elementSeparator !== undefined) explicit.elementSeparator = options.elementSeparator;
  if (options.componentSeparator !== undefined) explicit.componentSeparator = options.componentSeparator;
  if (options.repetitionSeparator !== undefined) explicit.repetitionSeparator = options.repetitionSeparator;
  return new EDIOptions(explicit);
}

export async function readInput(path: string): Promise<string> {
  if (path === STDIN_PATH) {
    return readStreamText(process.stdin);
  }
  return readFile(path, 'utf8');
}

/**
 * Write to `output` when given, otherwise print to stdout with a trailing
 * newline. Returns the file written, if any.
 */
export async function writeOutput(text: string, output?: string): Promise<string | undefined> {
  if (output) {
    await writeFile(output, text, 'utf8');
    return output;
  }
  process.stdout.write(text.endsWith('\n') ? text : text + '\n');
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
