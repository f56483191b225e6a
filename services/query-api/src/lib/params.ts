import { MonthResolver } from '@lohnjournal/shared';

const resolver = new MonthResolver();

/**
 * Period from route parameters: year as four digits, month as 1-12 or a
 * German month name ("3", "03", "März", "maerz").
 */
export function parseMonthParam(year: string, month: string): { year: number; monthNumber: number } | null {
  if (!/^\d{4}$/.test(year)) return null;

  if (/^\d{1,2}$/.test(month)) {
    const monthNumber = Number(month);
    return monthNumber >= 1 && monthNumber <= 12 ? { year: Number(year), monthNumber } : null;
  }

  const period = resolver.resolveFromFilename(`${month}_${year}`);
  return period ? { year: period.year, monthNumber: period.monthNumber } : null;
}
