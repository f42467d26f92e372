/**
 * Codec defaults from the environment
 *
 * Cached after the first read, like the logging configuration.
 */

import { EDIOptions, unescapeDelimiter } from './EDIOptions.js';

export interface CodecConfiguration {
  /** Delimiters applied when neither the caller nor the document supplies one */
  delimiters: EDIOptions;
  /** Root element name for XML output (EDI_XML_ROOT env, default 'edi') */
  xmlRootName: string;
}

let cachedConfig: CodecConfiguration | null = null;

function readDelimiter(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return unescapeDelimiter(raw);
}

/**
 * Reads EDI_SEGMENT_TERMINATOR, EDI_ELEMENT_SEPARATOR, EDI_COMPONENT_SEPARATOR,
 * EDI_REPETITION_SEPARATOR and EDI_XML_ROOT. Unset delimiters stay undefined so
 * that inference and the ISA header still apply.
 */
export function getCodecConfig(): CodecConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    delimiters: new EDIOptions({
      segmentTerminator: readDelimiter('EDI_SEGMENT_TERMINATOR'),
      elementSeparator: readDelimiter('EDI_ELEMENT_SEPARATOR'),
      componentSeparator: readDelimiter('EDI_COMPONENT_SEPARATOR'),
      repetitionSeparator: readDelimiter('EDI_REPETITION_SEPARATOR'),
    }),
    xmlRootName: process.env['EDI_XML_ROOT'] || 'edi',
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetCodecConfig(): void {
  cachedConfig = null;
}
