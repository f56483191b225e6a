/**
 * Spreadsheet Export
 *
 * Workbook with a "Zusammenfassung" sheet (per-employee totals over all
 * periods) followed by one sheet per period.
 */

import { Workbook, type Worksheet } from 'exceljs';
import {
  EMPTY,
  formatPeriod,
  isEmpty,
  minorToMajor,
  type EmployeeRow,
  type FieldDefinition,
  type FieldValue,
  type PeriodSummary,
  type TableSchema,
} from '@lohnjournal/shared';

export const SUMMARY_SHEET = 'Zusammenfassung';
const MAX_SHEET_NAME = 31;
const CURRENCY_FORMAT = '#,##0.00';

export interface PeriodData {
  period: Pick<PeriodSummary, 'month' | 'year'>;
  rows: readonly EmployeeRow[];
}

export interface EmployeeSummary {
  identifier: string;
  /** Longest name seen across periods */
  name: string;
  monthsCount: number;
  /** Sum per numeric field over non-empty values; EMPTY when no period had a value */
  totals: Record<string, FieldValue>;
}

function numericFields(schema: TableSchema): FieldDefinition[] {
  return schema.fields.filter((field) => field.kind !== 'text');
}

/**
 * Field holding the employee name: the first text field besides the identifier
 */
export function nameFieldOf(schema: TableSchema): string | undefined {
  return schema.fields.find((field) => field.kind === 'text' && field.name !== schema.identifierField)?.name;
}

function addValues(total: FieldValue, value: FieldValue | undefined): FieldValue {
  if (isEmpty(value)) return total;
  if (value.kind === 'currency') {
    return { kind: 'currency', minor: (total.kind === 'currency' ? total.minor : 0) + value.minor };
  }
  if (value.kind === 'integer') {
    return { kind: 'integer', value: (total.kind === 'integer' ? total.value : 0) + value.value };
  }
  return total;
}

/**
 * Aggregate rows per employee, ordered by identifier. EMPTY values are not
 * counted as zero.
 */
export function summarizeEmployees(periods: readonly PeriodData[], schema: TableSchema): EmployeeSummary[] {
  const nameField = nameFieldOf(schema);
  const numeric = numericFields(schema);
  const employees = new Map<string, EmployeeSummary>();

  for (const { rows } of periods) {
    for (const row of rows) {
      const identifierValue = row.fields[schema.identifierField];
      if (!identifierValue || identifierValue.kind !== 'text') continue;

      let summary = employees.get(identifierValue.value);
      if (!summary) {
        const totals: Record<string, FieldValue> = {};
        for (const field of numeric) totals[field.name] = EMPTY;
        summary = { identifier: identifierValue.value, name: '', monthsCount: 0, totals };
        employees.set(identifierValue.value, summary);
      }

      const name = nameField ? row.fields[nameField] : undefined;
      if (name && name.kind === 'text' && name.value.length > summary.name.length) {
        summary.name = name.value;
      }

      summary.monthsCount++;
      for (const field of numeric) {
        summary.totals[field.name] = addValues(summary.totals[field.name], row.fields[field.name]);
      }
    }
  }

  return [...employees.values()].sort((a, b) => a.identifier.localeCompare(b.identifier));
}

/**
 * Sheet name "<Monat>_<Jahr>", cut to Excel's limit
 */
export function periodSheetName(period: Pick<PeriodSummary, 'month' | 'year'>): string {
  return `${period.month}_${period.year}`.slice(0, MAX_SHEET_NAME);
}

function cellValue(value: FieldValue | undefined): string | number | null {
  if (isEmpty(value)) return null;
  switch (value.kind) {
    case 'text':
      return value.value;
    case 'integer':
      return value.value;
    case 'currency':
      return minorToMajor(value.minor);
  }
}

function formatCurrencyColumns(sheet: Worksheet, fields: readonly FieldDefinition[], firstColumn: number): void {
  fields.forEach((field, i) => {
    if (field.kind === 'currency') {
      sheet.getColumn(firstColumn + i).numFmt = CURRENCY_FORMAT;
    }
  });
}

function addSummarySheet(workbook: Workbook, periods: readonly PeriodData[], schema: TableSchema): void {
  const sheet = workbook.addWorksheet(SUMMARY_SHEET);
  const numeric = numericFields(schema);
  const labels = new Map(schema.fields.map((field) => [field.name, field.label]));
  const nameField = nameFieldOf(schema);

  const first = periods[0];
  const last = periods[periods.length - 1];
  const range = first && last ? `${formatPeriod(first.period)} - ${formatPeriod(last.period)}` : 'N/A';

  sheet.addRow(['ZUSAMMENFASSUNG']);
  sheet.addRow(['Zeitraum:', range]);
  sheet.addRow(['Anzahl Monate:', periods.length]);
  sheet.addRow([]);
  sheet.addRow([]);
  sheet.addRow([]);

  const header = sheet.addRow([
    labels.get(schema.identifierField) ?? schema.identifierField,
    nameField ? (labels.get(nameField) ?? nameField) : 'Name',
    'Anzahl Monate',
    ...numeric.map((field) => field.label),
  ]);
  header.font = { bold: true };
  sheet.getRow(1).font = { bold: true };

  for (const summary of summarizeEmployees(periods, schema)) {
    sheet.addRow([
      summary.identifier,
      summary.name,
      summary.monthsCount,
      ...numeric.map((field) => cellValue(summary.totals[field.name])),
    ]);
  }

  formatCurrencyColumns(sheet, numeric, 4);
}

function addPeriodSheet(workbook: Workbook, data: PeriodData, schema: TableSchema): void {
  const sheet = workbook.addWorksheet(periodSheetName(data.period));

  const header = sheet.addRow(schema.fields.map((field) => field.label));
  header.font = { bold: true };

  for (const row of data.rows) {
    sheet.addRow(schema.fields.map((field) => cellValue(row.fields[field.name])));
  }

  formatCurrencyColumns(sheet, schema.fields, 1);
}

/**
 * Build the export workbook. Periods are expected oldest first.
 */
export function buildWorkbook(periods: readonly PeriodData[], schema: TableSchema): Workbook {
  const workbook = new Workbook();
  workbook.created = new Date();

  addSummarySheet(workbook, periods, schema);
  for (const data of periods) {
    addPeriodSheet(workbook, data, schema);
  }

  return workbook;
}
