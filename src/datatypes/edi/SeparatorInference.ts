/**
 * Delimiter inference for raw EDI text
 *
 * Fills in the element separator and segment terminator when the caller did
 * not configure them. Component and repetition separators are never guessed;
 * only the ISA header declares those.
 */

import { FormatError } from '../../errors/FormatError.js';
import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import { EDIOptions } from './EDIOptions.js';

registerComponent('edi-inference', 'Delimiter inference');
const logger = getLogger('edi-inference');

/**
 * ISA is fixed width: its segment terminator always sits at this index.
 */
export const ISA_SEGMENT_TERMINATOR_INDEX = 105;

const NON_ALPHANUMERIC = /[^A-Z0-9]/i;
const TRAILING_TERMINATOR = /([\x00-\x1f~])\s*$/;

/**
 * First character that is not a letter or digit.
 */
export function inferElementSeparator(edi: string): string {
  const match = NON_ALPHANUMERIC.exec(edi);
  if (!match) {
    throw new FormatError('could not determine element separator', 'ELEMENT_SEPARATOR_UNDETERMINED');
  }
  return match[0];
}

/**
 * Character 105 of an ISA header; otherwise the last control character or "~"
 * of the text, ignoring trailing whitespace.
 */
export function inferSegmentTerminator(edi: string): string {
  if (edi.substring(0, 3).toUpperCase() === 'ISA') {
    const terminator = edi.charAt(ISA_SEGMENT_TERMINATOR_INDEX);
    if (terminator === '') {
      throw new FormatError(
        `could not determine segment terminator: ISA header is shorter than ${ISA_SEGMENT_TERMINATOR_INDEX + 1} characters`,
        'SEGMENT_TERMINATOR_UNDETERMINED'
      );
    }
    return terminator;
  }
  const match = TRAILING_TERMINATOR.exec(edi);
  if (!match?.[1]) {
    throw new FormatError('could not determine segment terminator', 'SEGMENT_TERMINATOR_UNDETERMINED');
  }
  return match[1];
}

/**
 * Copy of `options` with the segment terminator and element separator filled in.
 * Configured values are kept as they are.
 */
export function resolveSeparators(edi: string, options: EDIOptions): EDIOptions {
  const segmentTerminator = options.segmentTerminator ?? inferSegmentTerminator(edi);
  const elementSeparator = options.elementSeparator ?? inferElementSeparator(edi);

  if (options.segmentTerminator === undefined || options.elementSeparator === undefined) {
    logger.debug('Inferred delimiters', {
      segmentTerminator: JSON.stringify(segmentTerminator),
      elementSeparator: JSON.stringify(elementSeparator),
    });
  }

  return options.withOverrides({ segmentTerminator, elementSeparator });
}
