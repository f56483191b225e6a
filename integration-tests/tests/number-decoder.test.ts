/**
 * DATEV number decoding
 */

import {
  decodeDatevNumber,
  encodeDatevNumber,
  formatMinor,
  parseDecimalToMinor,
  DecodeError,
  EMPTY,
  isEmpty,
} from '@lohnjournal/shared';

describe('decodeDatevNumber', () => {
  it('reads the last two digits of a currency value as cents', () => {
    expect(decodeDatevNumber('2.43000', 'currency')).toEqual({ kind: 'currency', minor: 243000 });
    expect(decodeDatevNumber('18041', 'currency')).toEqual({ kind: 'currency', minor: 18041 });
    expect(decodeDatevNumber('5', 'currency')).toEqual({ kind: 'currency', minor: 5 });
  });

  it('negates values with a trailing minus', () => {
    expect(decodeDatevNumber('1.50000-', 'currency')).toEqual({ kind: 'currency', minor: -150000 });
    expect(decodeDatevNumber('12-', 'integer')).toEqual({ kind: 'integer', value: -12 });
  });

  it('normalises negative zero', () => {
    const value = decodeDatevNumber('000-', 'currency');
    expect(value).toEqual({ kind: 'currency', minor: 0 });
    expect(value.kind === 'currency' && Object.is(value.minor, -0)).toBe(false);
  });

  it('takes integers as printed', () => {
    expect(decodeDatevNumber('30', 'integer')).toEqual({ kind: 'integer', value: 30 });
    expect(decodeDatevNumber('1.234', 'integer')).toEqual({ kind: 'integer', value: 1234 });
  });

  it('trims surrounding whitespace', () => {
    expect(decodeDatevNumber('  3.00000 ', 'currency')).toEqual({ kind: 'currency', minor: 300000 });
  });

  it('returns EMPTY for empty and whitespace-only text', () => {
    expect(decodeDatevNumber('', 'currency')).toBe(EMPTY);
    expect(decodeDatevNumber('   ', 'integer')).toBe(EMPTY);
  });

  it('keeps zero distinct from EMPTY', () => {
    expect(decodeDatevNumber('000', 'currency')).toEqual({ kind: 'currency', minor: 0 });
    expect(decodeDatevNumber('000', 'currency')).not.toBe(EMPTY);
  });

  it.each(['1.234,56-', '12,50', 'abc', '-', '-100', '1..2', '.100', '100.', '1 000'])(
    'rejects %p',
    (raw) => {
      expect(() => decodeDatevNumber(raw, 'currency')).toThrow(DecodeError);
    }
  );

  it('carries the raw text and kind on DecodeError', () => {
    try {
      decodeDatevNumber('1.234,56-', 'currency');
      throw new Error('expected DecodeError');
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      if (err instanceof DecodeError) {
        expect(err.raw).toBe('1.234,56-');
        expect(err.kind).toBe('currency');
        expect(err.code).toBe('decode_error');
        expect(err.message).toBe('Cannot decode currency value "1.234,56-": comma is not a DATEV separator');
      }
    }
  });

  it('explains a leading sign', () => {
    expect(() => decodeDatevNumber('-100', 'integer')).toThrow('sign must trail the digits');
    expect(() => decodeDatevNumber('-', 'integer')).toThrow('sign without digits');
  });

  it('rejects digit strings beyond the safe integer range', () => {
    expect(() => decodeDatevNumber('90071992547409930', 'currency')).toThrow(DecodeError);
  });
});

describe('encodeDatevNumber', () => {
  it('groups thousands and appends the cents', () => {
    expect(encodeDatevNumber(243000, 'currency')).toBe('2.43000');
    expect(encodeDatevNumber(123456789, 'currency')).toBe('1.234.56789');
    expect(encodeDatevNumber(0, 'currency')).toBe('000');
    expect(encodeDatevNumber(7, 'currency')).toBe('007');
  });

  it('writes negatives with a trailing minus', () => {
    expect(encodeDatevNumber(-150000, 'currency')).toBe('1.50000-');
    expect(encodeDatevNumber(-3, 'integer')).toBe('3-');
  });

  it('round-trips through the decoder', () => {
    for (const minor of [0, 1, 99, 100000000, -250075]) {
      expect(decodeDatevNumber(encodeDatevNumber(minor, 'currency'), 'currency')).toEqual({
        kind: 'currency',
        minor,
      });
    }
  });

  it('refuses fractional values', () => {
    expect(() => encodeDatevNumber(1.5, 'currency')).toThrow(RangeError);
  });
});

describe('decimal helpers', () => {
  it('formats minor units as decimal strings', () => {
    expect(formatMinor(243000)).toBe('2430.00');
    expect(formatMinor(5)).toBe('0.05');
    expect(formatMinor(-150075)).toBe('-1500.75');
  });

  it('parses decimal strings into minor units', () => {
    expect(parseDecimalToMinor('2430.00')).toBe(243000);
    expect(parseDecimalToMinor('-5.5')).toBe(-550);
    expect(parseDecimalToMinor('12')).toBe(1200);
    expect(parseDecimalToMinor('-0.00')).toBe(0);
  });

  it('rejects malformed decimals', () => {
    expect(() => parseDecimalToMinor('1,50')).toThrow(RangeError);
  });
});

describe('isEmpty', () => {
  it('treats EMPTY and a missing value as empty, zero as a value', () => {
    expect(isEmpty(EMPTY)).toBe(true);
    expect(isEmpty(undefined)).toBe(true);
    expect(isEmpty(decodeDatevNumber('', 'currency'))).toBe(true);
    expect(isEmpty(decodeDatevNumber('000', 'currency'))).toBe(false);
    expect(isEmpty({ kind: 'text', value: '' })).toBe(false);
  });
});
