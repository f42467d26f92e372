/**
 * EDI text writer
 *
 * Renders segments back to delimited text. Each ISA header met on the way
 * re-declares the component separator (ISA16) and, from version 00402, the
 * repetition separator (ISA11) for the segments after it, the same way the
 * parser reads them. A document assembled in code therefore serializes with
 * the delimiters its own header names.
 */

import { registerComponent } from '../../logging/DebugModeRegistry.js';
import { getLogger } from '../../logging/LoggerFactory.js';
import type { EDIElement } from '../../model/EDIElement.js';
import type { EDIRepetition } from '../../model/EDIRepetition.js';
import type { EDISegment } from '../../model/EDISegment.js';
import {
  DEFAULT_ELEMENT_SEPARATOR,
  DEFAULT_SEGMENT_TERMINATOR,
  EDIOptions,
  type EDIDelimiters,
} from './EDIOptions.js';
import {
  ISA_COMPONENT_SEPARATOR_FIELD,
  ISA_REPETITION_SEPARATOR_FIELD,
  ISA_VERSION_FIELD,
  declaresRepetitionSeparator,
} from './EDIParser.js';

registerComponent('edi-serializer', 'EDI text serializer');
const logger = getLogger('edi-serializer');

export interface EDISerializeOptions {
  /** Written after every segment terminator, e.g. "\n" for one segment per line */
  lineSeparator?: string;
}

/**
 * Delimiters in effect while writing; the two required ones always set.
 */
interface WriteDelimiters {
  segmentTerminator: string;
  elementSeparator: string;
  componentSeparator?: string;
  repetitionSeparator?: string;
}

/**
 * Serialize segments to EDI text
 */
export class EDISerializer {
  private readonly options: EDIOptions;
  private readonly lineSeparator: string;

  /**
   * `options` seeds the delimiters; "~" and "*" fill a missing segment
   * terminator or element separator.
   */
  constructor(options?: EDIDelimiters | null, serializeOptions: EDISerializeOptions = {}) {
    this.options = EDIOptions.from(options);
    this.lineSeparator = serializeOptions.lineSeparator ?? '';
  }

  serialize(segments: readonly EDISegment[]): string {
    let delimiters: WriteDelimiters = {
      segmentTerminator: this.options.segmentTerminator ?? DEFAULT_SEGMENT_TERMINATOR,
      elementSeparator: this.options.elementSeparator ?? DEFAULT_ELEMENT_SEPARATOR,
      componentSeparator: this.options.componentSeparator,
      repetitionSeparator: this.options.repetitionSeparator,
    };

    let output = '';
    for (const segment of segments) {
      if (segment.is('ISA')) {
        delimiters = headerDelimiters(segment, delimiters);
      }
      output += this.serializeSegment(segment, delimiters);
    }
    return output;
  }

  private serializeSegment(segment: EDISegment, delimiters: WriteDelimiters): string {
    let output = segment.id;
    for (const element of segment.elements) {
      output += delimiters.elementSeparator;
      if (element) {
        output += this.serializeElement(segment, element, delimiters);
      }
    }
    return output + delimiters.segmentTerminator + this.lineSeparator;
  }

  private serializeElement(segment: EDISegment, element: EDIElement, delimiters: WriteDelimiters): string {
    const repetitions = element.repetitions;
    if (repetitions.length > 1 && delimiters.repetitionSeparator === undefined) {
      logger.warn(`No repetition separator in effect; writing only the first of ${repetitions.length} repetitions`, {
        segment: segment.id,
      });
      return this.serializeRepetition(segment, repetitions[0], delimiters);
    }
    return repetitions
      .map((repetition) => this.serializeRepetition(segment, repetition, delimiters))
      .join(delimiters.repetitionSeparator ?? '');
  }

  private serializeRepetition(
    segment: EDISegment,
    repetition: EDIRepetition | undefined,
    delimiters: WriteDelimiters
  ): string {
    if (!repetition) {
      return '';
    }
    if (!repetition.hasComponents()) {
      return repetition.value ?? '';
    }
    const components = repetition.components;
    if (components.length > 1 && delimiters.componentSeparator === undefined) {
      logger.warn(`No component separator in effect; writing only the first of ${components.length} components`, {
        segment: segment.id,
      });
      return components[0]?.value ?? '';
    }
    return components.map((component) => component?.value ?? '').join(delimiters.componentSeparator ?? '');
  }
}

/**
 * Delimiters for the segments after an ISA header.
 */
function headerDelimiters(isa: EDISegment, current: WriteDelimiters): WriteDelimiters {
  const isa11 = isa.get(ISA_REPETITION_SEPARATOR_FIELD);
  const isa16 = isa.get(ISA_COMPONENT_SEPARATOR_FIELD);
  return {
    ...current,
    repetitionSeparator: declaresRepetitionSeparator(isa11, isa.get(ISA_VERSION_FIELD))
      ? isa11?.charAt(0)
      : undefined,
    componentSeparator: isa16 ? isa16.charAt(0) : current.componentSeparator,
  };
}

/**
 * Serialize segments to EDI text (convenience function)
 */
export function serializeEDI(
  segments: readonly EDISegment[],
  options?: EDIDelimiters | null,
  serializeOptions?: EDISerializeOptions
): string {
  return new EDISerializer(options, serializeOptions).serialize(segments);
}
