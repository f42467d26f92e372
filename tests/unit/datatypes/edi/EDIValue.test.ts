import { describe, it, expect } from '@jest/globals';
import { EDIValue, decodeTypedValue } from '../../../../src/datatypes/edi/EDIValue.js';

function localParts(date: Date | null): number[] | null {
  if (!date) return null;
  return [
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds(),
  ];
}

describe('EDIValue', () => {
  describe('dates', () => {
    const date = new Date(2024, 2, 5);

    it('should encode 8 and 6 digit dates', () => {
      expect(EDIValue.date(8, date)).toBe('20240305');
      expect(EDIValue.date(6, date)).toBe('240305');
    });

    it('should reject other lengths', () => {
      expect(() => EDIValue.date(7, date)).toThrow(RangeError);
    });

    it('should decode 8 and 6 digit dates in local time', () => {
      expect(localParts(EDIValue.parseDate('20240305'))).toEqual([2024, 3, 5, 0, 0, 0, 0]);
      expect(localParts(EDIValue.parseDate('240305'))).toEqual([2024, 3, 5, 0, 0, 0, 0]);
    });

    it('should return null for malformed dates', () => {
      expect(EDIValue.parseDate('2024035')).toBeNull();
      expect(EDIValue.parseDate('2024ab05')).toBeNull();
      expect(EDIValue.parseDate('20241305')).toBeNull();
    });
  });

  describe('times', () => {
    const time = new Date(2000, 0, 1, 13, 5, 9, 450);

    it('should encode by length', () => {
      expect(EDIValue.time(4, time)).toBe('1305');
      expect(EDIValue.time(6, time)).toBe('130509');
      expect(EDIValue.time(7, time)).toBe('1305094');
      expect(EDIValue.time(8, time)).toBe('13050945');
    });

    it('should clamp lengths outside 4..8', () => {
      expect(EDIValue.time(2, time)).toBe('1305');
      expect(EDIValue.time(5, time)).toBe('1305');
      expect(EDIValue.time(10, time)).toBe('13050945');
    });

    it('should decode times on 2000-01-01', () => {
      expect(localParts(EDIValue.parseTime('1305'))).toEqual([2000, 1, 1, 13, 5, 0, 0]);
      expect(localParts(EDIValue.parseTime('13050945'))).toEqual([2000, 1, 1, 13, 5, 9, 450]);
    });

    it('should return null for malformed times', () => {
      expect(EDIValue.parseTime('12345')).toBeNull();
      expect(EDIValue.parseTime('2561')).toBeNull();
      expect(EDIValue.parseTime('12:30')).toBeNull();
    });
  });

  describe('reals', () => {
    it('should write plain decimals without trailing zeros or exponents', () => {
      expect(EDIValue.real(125)).toBe('125');
      expect(EDIValue.real(12.5)).toBe('12.5');
      expect(EDIValue.real(-0.25)).toBe('-0.25');
      expect(EDIValue.real(1.5e-7)).toBe('0.00000015');
      expect(EDIValue.real(1e21)).toBe('1000000000000000000000');
    });

    it('should reject non-finite numbers', () => {
      expect(() => EDIValue.real(Number.NaN)).toThrow(RangeError);
      expect(() => EDIValue.real(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });

    it('should parse plain decimals only', () => {
      expect(EDIValue.parseReal('125.00')).toBe(125);
      expect(EDIValue.parseReal('.5')).toBe(0.5);
      expect(EDIValue.parseReal('-3')).toBe(-3);
      expect(EDIValue.parseReal('1e5')).toBeNull();
      expect(EDIValue.parseReal('abc')).toBeNull();
    });
  });

  describe('implied-decimal numerics', () => {
    it('should drop the decimal point', () => {
      expect(EDIValue.numeric(2, 12.34)).toBe('1234');
      expect(EDIValue.numeric(2, -1.5)).toBe('-150');
      expect(EDIValue.numeric(1, -1)).toBe('-10');
      expect(EDIValue.numeric(0, 42)).toBe('42');
    });

    it('should round half away from zero', () => {
      expect(EDIValue.numeric(0, 2.5)).toBe('3');
      expect(EDIValue.numeric(0, -2.5)).toBe('-3');
      expect(EDIValue.numeric(2, 1.005)).toBe('101');
      expect(EDIValue.numeric(2, 12.344)).toBe('1234');
    });

    it('should not sign a value that rounds to zero', () => {
      expect(EDIValue.numeric(2, 0.001)).toBe('0');
      expect(EDIValue.numeric(2, -0.001)).toBe('0');
    });

    it('should reject negative or fractional decimal counts', () => {
      expect(() => EDIValue.numeric(-1, 5)).toThrow(RangeError);
      expect(() => EDIValue.numeric(1.5, 5)).toThrow(RangeError);
    });

    it('should decode with the implied decimal places', () => {
      expect(EDIValue.parseNumeric(2, '1234')).toBe(12.34);
      expect(EDIValue.parseNumeric(2, '5')).toBe(0.05);
      expect(EDIValue.parseNumeric(2, '-150')).toBe(-1.5);
      expect(EDIValue.parseNumeric(0, '42')).toBe(42);
    });

    it('should round decimal text by its written digits', () => {
      expect(EDIValue.numericFromText(2, '1.005')).toBe('101');
      expect(EDIValue.numericFromText(0, '-0.4')).toBe('0');
      expect(EDIValue.numericFromText(3, '+.5')).toBe('500');
      expect(EDIValue.numericFromText(2, '12,34')).toBeNull();
      expect(() => EDIValue.numericFromText(-1, '5')).toThrow(RangeError);
      expect(EDIValue.realFromText('1,000.10')).toBe('1000.1');
      expect(EDIValue.realFromText('abc')).toBeNull();
    });

    it('should return null for malformed numerics', () => {
      expect(EDIValue.parseNumeric(2, '12.5')).toBeNull();
      expect(EDIValue.parseNumeric(2, '')).toBeNull();
    });
  });

  describe('text parsers', () => {
    it('should read ISO and common written dates', () => {
      const march5 = [2024, 3, 5, 0, 0, 0, 0];
      expect(localParts(EDIValue.parseDateText('2024-03-05'))).toEqual(march5);
      expect(localParts(EDIValue.parseDateText('20240305'))).toEqual(march5);
      expect(localParts(EDIValue.parseDateText('03/05/2024'))).toEqual(march5);
      expect(localParts(EDIValue.parseDateText('3/5/2024'))).toEqual(march5);
      expect(localParts(EDIValue.parseDateText('2024/03/05'))).toEqual(march5);
      expect(localParts(EDIValue.parseDateText('Mar 5, 2024'))).toEqual(march5);
      expect(EDIValue.parseDateText('soon')).toBeNull();
    });

    it('should read written times', () => {
      expect(localParts(EDIValue.parseTimeText('13:30'))).toEqual([2000, 1, 1, 13, 30, 0, 0]);
      expect(localParts(EDIValue.parseTimeText('1:30 PM'))).toEqual([2000, 1, 1, 13, 30, 0, 0]);
      expect(localParts(EDIValue.parseTimeText('13:30:15.25'))).toEqual([2000, 1, 1, 13, 30, 15, 250]);
      expect(EDIValue.parseTimeText('later')).toBeNull();
    });

    it('should read decimals with a sign and thousands separators', () => {
      expect(EDIValue.parseDecimalText('1,234.50')).toBe(1234.5);
      expect(EDIValue.parseDecimalText('-12')).toBe(-12);
      expect(EDIValue.parseDecimalText('+.5')).toBe(0.5);
      expect(EDIValue.parseDecimalText('12,34')).toBeNull();
      expect(EDIValue.parseDecimalText('abc')).toBeNull();
    });
  });
});

describe('decodeTypedValue', () => {
  it('should keep untyped, id and an text literally', () => {
    expect(decodeTypedValue(' 2024-03-05 ')).toBe(' 2024-03-05 ');
    expect(decodeTypedValue('2024-03-05', 'id')).toBe('2024-03-05');
    expect(decodeTypedValue('12.5', 'an')).toBe('12.5');
  });

  it('should encode dates as yyyyMMdd', () => {
    expect(decodeTypedValue('2024-03-05', 'dt')).toBe('20240305');
    expect(decodeTypedValue('03/05/2024', 'dt')).toBe('20240305');
  });

  it('should size times by the digits written', () => {
    expect(decodeTypedValue('13:30', 'tm')).toBe('1330');
    expect(decodeTypedValue('9:05', 'tm')).toBe('0905');
    expect(decodeTypedValue('1:30 PM', 'tm')).toBe('1330');
    expect(decodeTypedValue('13:30:15', 'tm')).toBe('133015');
    expect(decodeTypedValue('13:30:15.25', 'tm')).toBe('13301525');
  });

  it('should encode reals and implied-decimal numerics', () => {
    expect(decodeTypedValue('1,234.50', 'r')).toBe('1234.5');
    expect(decodeTypedValue('12.0', 'r')).toBe('12');
    expect(decodeTypedValue('12.34', 'n2')).toBe('1234');
    expect(decodeTypedValue('12.345', 'n2')).toBe('1235');
    expect(decodeTypedValue('7', 'n0')).toBe('7');
  });

  it('should keep every digit of long decimals', () => {
    expect(decodeTypedValue('12345678901234567.89', 'n2')).toBe('1234567890123456789');
    expect(decodeTypedValue('-98,765,432,109,876,543.215', 'n2')).toBe('-9876543210987654322');
    expect(decodeTypedValue('0012345678901234567.8900', 'r')).toBe('12345678901234567.89');
    expect(decodeTypedValue('-0.000', 'r')).toBe('0');
  });

  it('should fall back to the literal text', () => {
    expect(decodeTypedValue('soon', 'dt')).toBe('soon');
    expect(decodeTypedValue('later', 'tm')).toBe('later');
    expect(decodeTypedValue('x', 'r')).toBe('x');
    expect(decodeTypedValue('abc', 'n2')).toBe('abc');
    expect(decodeTypedValue('12.34', 'n')).toBe('12.34');
    expect(decodeTypedValue('12.34', 'n10')).toBe('12.34');
    expect(decodeTypedValue('12.34', 'zz')).toBe('12.34');
  });
});
