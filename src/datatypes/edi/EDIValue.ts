/**
 * EDI scalar encodings
 *
 * X12 carries dates, times and numbers as bare digit strings:
 * - DT: yyMMdd or yyyyMMdd
 * - TM: HHmm, HHmmss, HHmmssD or HHmmssDD (D = decimal seconds)
 * - R:  plain decimal, point written only when needed
 * - Nn: integer with n implied decimal places ("1234" as N2 is 12.34)
 *
 * EDIValue converts between those strings and Date/number values.
 * decodeTypedValue() applies the same encodings to human-readable text tagged
 * with an XML `type` attribute, keeping the literal text whenever it cannot
 * be read.
 */

import { format, isValid, parse, parseISO } from 'date-fns';

/** Reference date for time-only values */
const TIME_REFERENCE_DATE = new Date(2000, 0, 1);

const DATE_FORMATS: Record<number, string> = {
  6: 'yyMMdd',
  8: 'yyyyMMdd',
};

/** Text date layouts accepted from XML, tried in order */
const DATE_TEXT_FORMATS = ['yyyyMMdd', 'MM/dd/yyyy', 'M/d/yyyy', 'yyyy/MM/dd', 'MMM d, yyyy', 'd MMM yyyy'];

/** Text time layouts accepted from XML, tried in order */
const TIME_TEXT_FORMATS = [
  'H:mm',
  'H:mm:ss',
  'H:mm:ss.S',
  'H:mm:ss.SS',
  'H:mm:ss.SSS',
  'h:mm a',
  'h:mm:ss a',
];

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ].+)?$/;
const DECIMAL_TEXT_PATTERN = /^[+-]?(?:(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d*)?|\.\d+)$/;
const REAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const NUMERIC_PATTERN = /^[+-]?\d+$/;
const NUMERIC_TYPE_PATTERN = /^n(\d)$/;

function timeFormat(length: number): string {
  if (length >= 8) return 'HHmmssSS';
  if (length === 7) return 'HHmmssS';
  if (length === 6) return 'HHmmss';
  return 'HHmm';
}

function parseStrict(value: string, pattern: string, referenceDate: Date): Date | null {
  const result = parse(value, pattern, referenceDate);
  return isValid(result) ? result : null;
}

/**
 * Add one to a string of decimal digits.
 */
function incrementDigits(digits: string): string {
  return (BigInt(digits) + 1n).toString();
}

/** Sign and digit runs of a plain decimal string ("-12.50") */
interface DecimalParts {
  negative: boolean;
  integer: string;
  fraction: string;
}

function splitDecimal(text: string): DecimalParts {
  const [integer = '', fraction = ''] = text.replace(/^[+-]/, '').split('.');
  return { negative: text.startsWith('-'), integer, fraction };
}

/**
 * Sign and digits of human-written decimal text, or null when it is not one.
 * Thousands separators are dropped; the digits are kept exactly.
 */
function readDecimalText(text: string): DecimalParts | null {
  const trimmed = text.trim();
  if (!DECIMAL_TEXT_PATTERN.test(trimmed)) {
    return null;
  }
  return splitDecimal(trimmed.replace(/,/g, ''));
}

function signed(negative: boolean, digits: string): string {
  return negative && !/^0(?:\.0*)?$/.test(digits) ? `-${digits}` : digits;
}

function plainDecimal({ negative, integer, fraction }: DecimalParts): string {
  const integerDigits = integer.replace(/^0+(?=\d)/, '') || '0';
  const fractionDigits = fraction.replace(/0+$/, '');
  return signed(negative, fractionDigits ? `${integerDigits}.${fractionDigits}` : integerDigits);
}

/**
 * Round half away from zero to `decimals` places and drop the point.
 */
function impliedDecimal({ negative, integer, fraction }: DecimalParts, decimals: number): string {
  const padded = fraction.padEnd(decimals + 1, '0');
  let digits = BigInt((integer || '0') + padded.slice(0, decimals)).toString();
  if (padded.charAt(decimals) >= '5') {
    digits = incrementDigits(digits);
  }
  return signed(negative, digits);
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`Implied decimals must be a non-negative integer, got ${decimals}`);
  }
}

/**
 * Rewrite "1.5e-7" as "0.00000015". Non-integers in exponent form always
 * have a negative exponent.
 */
function expandExponent(text: string): string {
  const [mantissa = '', exponentText = '0'] = text.toLowerCase().split('e');
  const negative = mantissa.startsWith('-');
  const unsigned = mantissa.replace(/^[+-]/, '');
  const pointIndex = unsigned.includes('.') ? unsigned.indexOf('.') : unsigned.length;
  const digits = unsigned.replace('.', '');
  const newPoint = pointIndex + Number(exponentText);

  let result: string;
  if (newPoint <= 0) {
    result = `0.${'0'.repeat(-newPoint)}${digits}`;
  } else if (newPoint >= digits.length) {
    result = digits + '0'.repeat(newPoint - digits.length);
  } else {
    result = `${digits.slice(0, newPoint)}.${digits.slice(newPoint)}`;
  }
  return negative ? `-${result}` : result;
}

/**
 * Converts between EDI digit strings and Date/number values.
 */
export class EDIValue {
  private constructor() {
    // static utility class
  }

  /**
   * Encode a date with 6 (yyMMdd) or 8 (yyyyMMdd) digits.
   */
  static date(length: number, value: Date): string {
    const pattern = DATE_FORMATS[length];
    if (!pattern) {
      throw new RangeError(`Date length must be 6 or 8, got ${length}`);
    }
    return format(value, pattern);
  }

  /**
   * Encode a time of day. Lengths below 4 are written as HHmm, above 8 as HHmmssSS.
   */
  static time(length: number, value: Date): string {
    return format(value, timeFormat(length));
  }

  /**
   * Plain decimal text: no exponent, no trailing zeros after the point.
   */
  static real(value: number): string {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot encode ${value} as an EDI real`);
    }
    if (Number.isInteger(value)) {
      return BigInt(value).toString();
    }
    const text = String(value);
    if (!/e/i.test(text)) {
      return text;
    }
    return expandExponent(text);
  }

  /**
   * Implied-decimal numeric: rounds half away from zero to `decimals` places
   * and drops the decimal point.
   */
  static numeric(decimals: number, value: number): string {
    assertDecimals(decimals);
    return impliedDecimal(splitDecimal(EDIValue.real(value)), decimals);
  }

  /**
   * real() for decimal text ("1,234.50"), keeping every digit written.
   * Null when the text is not a decimal.
   */
  static realFromText(text: string): string | null {
    const parts = readDecimalText(text);
    return parts ? plainDecimal(parts) : null;
  }

  /**
   * numeric() for decimal text, rounding the written digits rather than a
   * binary approximation. Null when the text is not a decimal.
   */
  static numericFromText(decimals: number, text: string): string | null {
    assertDecimals(decimals);
    const parts = readDecimalText(text);
    return parts ? impliedDecimal(parts, decimals) : null;
  }

  /**
   * Decode a 6 or 8 digit EDI date. Returns null for anything else.
   */
  static parseDate(value: string): Date | null {
    const pattern = DATE_FORMATS[value.length];
    if (!pattern || !/^\d+$/.test(value)) {
      return null;
    }
    return parseStrict(value, pattern, TIME_REFERENCE_DATE);
  }

  /**
   * Decode a 4, 6, 7 or 8 digit EDI time (on 2000-01-01). Returns null for anything else.
   */
  static parseTime(value: string): Date | null {
    if (value.length < 4 || value.length > 8 || value.length === 5 || !/^\d+$/.test(value)) {
      return null;
    }
    return parseStrict(value, timeFormat(value.length), TIME_REFERENCE_DATE);
  }

  static parseReal(value: string): number | null {
    const trimmed = value.trim();
    return REAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
  }

  /**
   * Decode an implied-decimal numeric: parseNumeric(2, "1234") is 12.34.
   */
  static parseNumeric(decimals: number, value: string): number | null {
    const trimmed = value.trim();
    if (!NUMERIC_PATTERN.test(trimmed)) {
      return null;
    }
    const negative = trimmed.startsWith('-');
    const digits = trimmed.replace(/^[+-]/, '').padStart(decimals + 1, '0');
    const text = decimals > 0 ? `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}` : digits;
    const result = Number(text);
    return negative ? -result : result;
  }

  /**
   * Read a human-written date: ISO-8601, yyyyMMdd, MM/dd/yyyy and similar.
   */
  static parseDateText(text: string): Date | null {
    const trimmed = text.trim();
    if (ISO_DATE_PATTERN.test(trimmed)) {
      const iso = parseISO(trimmed);
      if (isValid(iso)) return iso;
    }
    for (const pattern of DATE_TEXT_FORMATS) {
      const result = parseStrict(trimmed, pattern, TIME_REFERENCE_DATE);
      if (result) return result;
    }
    return null;
  }

  /**
   * Read a human-written time of day (13:30, 1:30, 13:30:15.25, 1:30 PM)
   * or a full ISO date-time.
   */
  static parseTimeText(text: string): Date | null {
    const trimmed = text.trim();
    for (const pattern of TIME_TEXT_FORMATS) {
      const result = parseStrict(trimmed, pattern, TIME_REFERENCE_DATE);
      if (result) return result;
    }
    if (ISO_DATE_PATTERN.test(trimmed)) {
      const iso = parseISO(trimmed);
      if (isValid(iso)) return iso;
    }
    return null;
  }

  /**
   * Read a human-written decimal, allowing a sign and thousands separators.
   */
  static parseDecimalText(text: string): number | null {
    const plain = EDIValue.realFromText(text);
    return plain === null ? null : Number(plain);
  }
}

/**
 * Encode XML leaf text according to its `type` attribute:
 *
 * | type           | result                                          |
 * |----------------|-------------------------------------------------|
 * | none, id, an   | text unchanged                                  |
 * | dt             | yyyyMMdd                                        |
 * | tm             | HHmm..HHmmssSS, length from the digits in text  |
 * | r              | plain real                                      |
 * | n0..n9         | implied-decimal numeric                         |
 *
 * Text that does not parse, and unknown types, come back unchanged.
 */
export function decodeTypedValue(text: string, type?: string | null): string {
  switch (type) {
    case undefined:
    case null:
    case 'id':
    case 'an':
      return text;
    case 'dt': {
      const date = EDIValue.parseDateText(text);
      return date ? EDIValue.date(8, date) : text;
    }
    case 'tm': {
      const time = EDIValue.parseTimeText(text);
      if (!time) return text;
      let length = text.replace(/[^0-9]/g, '').length;
      // H:mm has as many digits as HHm; count the missing leading zero.
      if (text.charAt(1) === ':') {
        length++;
      }
      return EDIValue.time(length, time);
    }
    case 'r':
      return EDIValue.realFromText(text) ?? text;
    default: {
      const match = NUMERIC_TYPE_PATTERN.exec(type);
      if (!match) return text;
      return EDIValue.numericFromText(Number(match[1]), text) ?? text;
    }
  }
}
