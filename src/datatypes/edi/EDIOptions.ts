/**
 * Delimiter configuration for EDI documents.
 *
 * Segment terminator and element separator must be known (configured or
 * inferred) before text can be tokenized. Component and repetition separators
 * are optional for a whole document and are normally declared by the ISA
 * header (fields 16 and 11).
 */

export interface EDIDelimiters {
  /** Ends every segment, e.g. "~" */
  segmentTerminator?: string;
  /** Separates elements within a segment, e.g. "*" */
  elementSeparator?: string;
  /** Separates components of a composite element, e.g. ":" (ISA16) */
  componentSeparator?: string;
  /** Separates repeated values of one element, e.g. "^" (ISA11, 00402 and later) */
  repetitionSeparator?: string;
}

const DELIMITER_KEYS = [
  'segmentTerminator',
  'elementSeparator',
  'componentSeparator',
  'repetitionSeparator',
] as const;

export type DelimiterKey = (typeof DELIMITER_KEYS)[number];

/** X12 conventions used when a document has no delimiter of its own */
export const DEFAULT_SEGMENT_TERMINATOR = '~';
export const DEFAULT_ELEMENT_SEPARATOR = '*';

/**
 * Immutable set of delimiter characters. A key set to `undefined` in
 * `withOverrides` clears that delimiter.
 */
export class EDIOptions implements EDIDelimiters {
  readonly segmentTerminator?: string;
  readonly elementSeparator?: string;
  readonly componentSeparator?: string;
  readonly repetitionSeparator?: string;

  constructor(delimiters: EDIDelimiters = {}) {
    for (const key of DELIMITER_KEYS) {
      assertSingleCharacter(key, delimiters[key]);
    }
    this.segmentTerminator = delimiters.segmentTerminator;
    this.elementSeparator = delimiters.elementSeparator;
    this.componentSeparator = delimiters.componentSeparator;
    this.repetitionSeparator = delimiters.repetitionSeparator;
  }

  /**
   * Accepts another EDIOptions, a plain delimiter object, or nothing.
   */
  static from(source?: EDIDelimiters | null): EDIOptions {
    if (source instanceof EDIOptions) {
      return source;
    }
    return new EDIOptions(source ?? {});
  }

  /**
   * Copy with some delimiters replaced. Keys present with `undefined` clear
   * the delimiter; keys left out are kept.
   */
  withOverrides(overrides: EDIDelimiters): EDIOptions {
    const next: EDIDelimiters = this.toJSON();
    for (const key of DELIMITER_KEYS) {
      if (key in overrides) {
        next[key] = overrides[key];
      }
    }
    return new EDIOptions(next);
  }

  /**
   * True once both delimiters required for tokenizing are known.
   */
  isResolved(): boolean {
    return this.segmentTerminator !== undefined && this.elementSeparator !== undefined;
  }

  equals(other: EDIDelimiters): boolean {
    return DELIMITER_KEYS.every((key) => this[key] === other[key]);
  }

  toJSON(): EDIDelimiters {
    const json: EDIDelimiters = {};
    for (const key of DELIMITER_KEYS) {
      const value = this[key];
      if (value !== undefined) {
        json[key] = value;
      }
    }
    return json;
  }
}

function assertSingleCharacter(key: DelimiterKey, value: string | undefined): void {
  if (value !== undefined && value.length !== 1) {
    throw new RangeError(`${key} must be a single character, got ${JSON.stringify(value)}`);
  }
}

/**
 * Unescape \n, \r, \t and \\ in delimiters typed on a command line or in an
 * environment variable.
 */
export function unescapeDelimiter(str: string): string {
  return str.replace(/\\([nrt\\])/g, (_match, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      default:
        return '\\';
    }
  });
}
