/**
 * Month Resolver
 *
 * Reads the reporting period ("Lohnjournal Januar 2025") from page header text.
 */

import { HeaderParseError } from './errors';
import type { ReportingPeriod } from './types';

export const GERMAN_MONTHS = [
  'Januar',
  'Februar',
  'März',
  'April',
  'Mai',
  'Juni',
  'Juli',
  'August',
  'September',
  'Oktober',
  'November',
  'Dezember',
] as const;

const MONTH_ALIASES: Record<string, number> = {
  januar: 1,
  jänner: 1,
  februar: 2,
  märz: 3,
  maerz: 3,
  marz: 3,
  april: 4,
  mai: 5,
  juni: 6,
  juli: 7,
  august: 8,
  september: 9,
  oktober: 10,
  november: 11,
  dezember: 12,
};

const MONTH_ALTERNATION = Object.keys(MONTH_ALIASES).join('|');
const PERIOD_PATTERN = new RegExp(`(?<![\\p{L}])(${MONTH_ALTERNATION})\\s+(\\d{4})(?!\\d)`, 'giu');
const TITLED_PERIOD_PATTERN = new RegExp(`Lohnjournal\\s+(${MONTH_ALTERNATION})\\s+(\\d{4})(?!\\d)`, 'iu');
const FILENAME_PATTERN = new RegExp(`(${MONTH_ALTERNATION})[_\\s-]+(\\d{4})(?!\\d)`, 'iu');

function toPeriod(monthText: string, yearText: string): ReportingPeriod | null {
  const monthNumber = MONTH_ALIASES[monthText.toLowerCase()];
  if (monthNumber === undefined) return null;
  return {
    month: GERMAN_MONTHS[monthNumber - 1],
    year: Number(yearText),
    monthNumber,
  };
}

export class MonthResolver {
  /**
   * Resolve the reporting period from header text.
   * A "Lohnjournal <Monat> <Jahr>" title wins over other month mentions.
   *
   * @throws HeaderParseError when no period is present
   */
  resolve(headerText: string): ReportingPeriod {
    const normalized = headerText.normalize('NFC');

    const titled = TITLED_PERIOD_PATTERN.exec(normalized);
    if (titled) {
      const period = toPeriod(titled[1], titled[2]);
      if (period) return period;
    }

    for (const match of normalized.matchAll(PERIOD_PATTERN)) {
      const period = toPeriod(match[1], match[2]);
      if (period) return period;
    }

    throw new HeaderParseError(headerText);
  }

  /**
   * Period hint from a file name such as "Januar_2025.pdf", or null.
   * Only used to order a batch of documents, never to tag rows.
   */
  resolveFromFilename(filename: string): ReportingPeriod | null {
    const match = FILENAME_PATTERN.exec(filename.normalize('NFC'));
    return match ? toPeriod(match[1], match[2]) : null;
  }
}

/**
 * Sort key for chronological ordering (202501 for Januar 2025).
 */
export function periodSortKey(period: Pick<ReportingPeriod, 'year' | 'monthNumber'>): number {
  return period.year * 100 + period.monthNumber;
}

/**
 * Display form "Januar 2025".
 */
export function formatPeriod(period: Pick<ReportingPeriod, 'month' | 'year'>): string {
  return `${period.month} ${period.year}`;
}
