/**
 * EDI text tokenizer
 *
 * Splits raw X12 text into segments, elements, repetitions and components.
 *
 * The ISA header is read with knowledge of its fixed fields: ISA16 declares
 * the component separator and ISA11 (from version 00402) the repetition
 * separator. Both are stored as plain elements and then apply to every
 * segment that follows, whatever the caller configured.
 */

import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import { EDIComponent } from '../../model/EDIComponent.js';
import { EDIElement } from '../../model/EDIElement.js';
import { EDIRepetition } from '../../model/EDIRepetition.js';
import { EDISegment } from '../../model/EDISegment.js';
import { EDIOptions, type EDIDelimiters } from './EDIOptions.js';
import { resolveSeparators } from './SeparatorInference.js';

registerComponent('edi-parser', 'EDI text parser');
const logger = getLogger('edi-parser');
const headerLogger = logger.child('header');

/** ISA field declaring the repetition separator */
export const ISA_REPETITION_SEPARATOR_FIELD = 11;
/** ISA field holding the interchange control version, e.g. "00501" */
export const ISA_VERSION_FIELD = 12;
/** ISA field declaring the component separator */
export const ISA_COMPONENT_SEPARATOR_FIELD = 16;
/** First interchange version with a repetition separator in ISA11 */
export const REPETITION_SEPARATOR_MIN_VERSION = '00402';

const ALPHANUMERIC = /^[A-Za-z0-9]$/;

/**
 * Result of tokenizing a document: its segments and the delimiters that
 * were in effect at the end of the text.
 */
export interface ParseResult {
  segments: EDISegment[];
  options: EDIOptions;
}

/**
 * True when an ISA11 value declares a repetition separator for the given
 * ISA12 version. Versions compare as plain strings.
 */
export function declaresRepetitionSeparator(isa11: string | undefined, isa12: string | undefined): boolean {
  const first = isa11?.charAt(0) ?? '';
  return first !== '' && (isa12 ?? '') >= REPETITION_SEPARATOR_MIN_VERSION && !ALPHANUMERIC.test(first);
}

/**
 * Parse EDI text into segments
 */
export class EDIParser {
  private readonly options: EDIOptions;

  constructor(options?: EDIDelimiters | null) {
    this.options = EDIOptions.from(options);
  }

  /**
   * Tokenize a whole document. Throws FormatError when the segment terminator
   * or element separator is neither configured nor inferable.
   */
  parse(edi: string): ParseResult {
    let options = resolveSeparators(edi, this.options);
    const segmentTerminator = requireDelimiter(options.segmentTerminator);
    const elementSeparator = requireDelimiter(options.elementSeparator);

    const rawSegments = edi.split(segmentTerminator);
    const segments: EDISegment[] = [];

    for (let i = 0; i < rawSegments.length; i++) {
      const rawSegment = rawSegments[i] ?? '';
      if (i === rawSegments.length - 1 && rawSegment.trim() === '') {
        break;
      }

      const tokens = rawSegment.trimStart().split(elementSeparator);
      const segment = new EDISegment(tokens[0] ?? '');
      const isHeader = segment.is('ISA');

      for (let j = 1; j < tokens.length; j++) {
        const token = tokens[j] ?? '';
        if (isHeader) {
          const declared = readHeaderDeclaration(j, tokens, options);
          options = declared.options;
          if (declared.plain) {
            segment.elements.push(new EDIElement(token));
            continue;
          }
        }
        segment.elements.push(token === '' ? null : parseElement(token, options));
      }
      segments.push(segment);
    }

    logger.debug(`Parsed ${segments.length} segments`, { delimiters: options.toJSON() });
    return { segments, options };
  }
}

/**
 * ISA16 declares the component separator. ISA11 declares the repetition
 * separator from version 00402 on; otherwise it clears it and is parsed as an
 * ordinary element. Declaring fields are stored verbatim (`plain`) so the
 * separator is not split on itself.
 */
function readHeaderDeclaration(
  position: number,
  tokens: readonly string[],
  options: EDIOptions
): { options: EDIOptions; plain: boolean } {
  const token = tokens[position] ?? '';

  if (position === ISA_COMPONENT_SEPARATOR_FIELD && token !== '') {
    headerLogger.trace('Component separator declared', { separator: token.charAt(0) });
    return { options: options.withOverrides({ componentSeparator: token.charAt(0) }), plain: true };
  }

  if (position === ISA_REPETITION_SEPARATOR_FIELD) {
    if (declaresRepetitionSeparator(token, tokens[ISA_VERSION_FIELD])) {
      headerLogger.trace('Repetition separator declared', { separator: token.charAt(0) });
      return { options: options.withOverrides({ repetitionSeparator: token.charAt(0) }), plain: true };
    }
    return { options: options.withOverrides({ repetitionSeparator: undefined }), plain: false };
  }

  return { options, plain: false };
}

function requireDelimiter(delimiter: string | undefined): string {
  if (delimiter === undefined) {
    throw new Error('delimiter must be resolved before tokenizing');
  }
  return delimiter;
}

/**
 * Split a non-empty element token into repetitions; empty repetitions are dropped.
 * A token of repetition separators only ("^") gives an element with no
 * repetitions, not an absent slot; it serializes as an empty field.
 */
export function parseElement(rawElement: string, options: EDIDelimiters): EDIElement {
  const rawRepetitions =
    options.repetitionSeparator !== undefined ? rawElement.split(options.repetitionSeparator) : [rawElement];

  const element = new EDIElement();
  for (const rawRepetition of rawRepetitions) {
    if (rawRepetition !== '') {
      element.repetitions.push(parseRepetition(rawRepetition, options));
    }
  }
  return element;
}

/**
 * Split a repetition into components when a component separator is known;
 * otherwise keep it as a scalar.
 */
export function parseRepetition(rawRepetition: string, options: EDIDelimiters): EDIRepetition {
  if (options.componentSeparator === undefined) {
    return new EDIRepetition(rawRepetition);
  }
  const repetition = new EDIRepetition();
  for (const rawComponent of rawRepetition.split(options.componentSeparator)) {
    repetition.components.push(rawComponent !== '' ? new EDIComponent(rawComponent) : null);
  }
  return repetition;
}
