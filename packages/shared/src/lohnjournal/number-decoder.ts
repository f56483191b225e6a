/**
 * DATEV Number Encoding
 *
 * DATEV prints amounts as digit groups separated by '.', where the final two
 * digits are cents and a trailing '-' marks a negative value:
 *   "2.43000"  -> 2430.00
 *   "18041"    -> 180.41
 *   "1.50000-" -> -1500.00
 * Day counts use the same grammar without the cent split.
 */

import { DecodeError } from './errors';
import { EMPTY, type FieldValue, type NumericFieldKind } from './types';

const DATEV_NUMBER_PATTERN = /^(\d+(?:\.\d+)*)(-?)$/;

function describeInvalid(text: string): string {
  if (text.includes(',')) return 'comma is not a DATEV separator';
  if (text === '-') return 'sign without digits';
  if (text.startsWith('-')) return 'sign must trail the digits';
  return 'expected digits separated by "." with an optional trailing "-"';
}

/**
 * Decode a DATEV-encoded number.
 * Empty or whitespace-only text yields EMPTY, never zero.
 *
 * @throws DecodeError when the text is not valid DATEV encoding
 */
export function decodeDatevNumber(raw: string, kind: NumericFieldKind): FieldValue {
  const text = raw.trim();
  if (text === '') return EMPTY;

  const match = DATEV_NUMBER_PATTERN.exec(text);
  if (!match) {
    throw new DecodeError(raw, kind, describeInvalid(text));
  }

  const digits = match[1].replace(/\./g, '');
  const magnitude = Number(digits);
  if (!Number.isSafeInteger(magnitude)) {
    throw new DecodeError(raw, kind, 'value exceeds safe integer range');
  }

  // `|| 0` folds -0 into 0
  const value = (match[2] === '-' ? -magnitude : magnitude) || 0;

  return kind === 'currency' ? { kind: 'currency', minor: value } : { kind: 'integer', value };
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

/**
 * Render a value in DATEV encoding (inverse of decodeDatevNumber).
 * Currency values are given in minor units.
 */
export function encodeDatevNumber(value: number, kind: NumericFieldKind): string {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode non-integer ${kind} value ${value}`);
  }

  const sign = value < 0 ? '-' : '';
  const magnitude = Math.abs(value);

  if (kind === 'integer') {
    return `${groupThousands(String(magnitude))}${sign}`;
  }

  const major = Math.trunc(magnitude / 100);
  const cents = String(magnitude % 100).padStart(2, '0');
  return `${groupThousands(String(major))}${cents}${sign}`;
}

/**
 * Format minor units as a plain decimal string ("2430.00"), as stored in NUMERIC columns.
 */
export function formatMinor(minor: number): string {
  const sign = minor < 0 ? '-' : '';
  const magnitude = Math.abs(minor);
  const cents = String(magnitude % 100).padStart(2, '0');
  return `${sign}${Math.trunc(magnitude / 100)}.${cents}`;
}

/**
 * Parse a plain decimal string ("2430.00", "-5.5", "12") into minor units without float arithmetic.
 */
export function parseDecimalToMinor(text: string): number {
  const match = /^(-?)(\d+)(?:\.(\d{1,2}))?$/.exec(text.trim());
  if (!match) {
    throw new RangeError(`Not a decimal amount: "${text}"`);
  }
  const minor = Number(match[2]) * 100 + Number((match[3] ?? '').padEnd(2, '0'));
  return (match[1] === '-' ? -minor : minor) || 0;
}

/**
 * Convert minor units to major units for display (2430.5 for 243050).
 */
export function minorToMajor(minor: number): number {
  return minor / 100;
}
