/**
 * Lohnjournal Error Taxonomy
 *
 * DecodeError      - a numeric text is not valid DATEV encoding (row granularity)
 * RowRejected      - an employee block cannot become a complete record (row granularity)
 * HeaderParseError - a page's reporting period is unknown (page granularity)
 * LayoutConfigError - a layout profile is invalid (fatal at load)
 */

import type { NumericFieldKind } from './types';

export type LohnjournalErrorCode =
  | 'decode_error'
  | 'row_rejected'
  | 'header_parse_error'
  | 'layout_config_error';

export abstract class LohnjournalError extends Error {
  abstract readonly code: LohnjournalErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Log and job-payload representation */
  abstract toJSON(): Record<string, unknown>;
}

export class DecodeError extends LohnjournalError {
  readonly code = 'decode_error';

  constructor(
    readonly raw: string,
    readonly kind: NumericFieldKind,
    detail: string
  ) {
    super(`Cannot decode ${kind} value "${raw}": ${detail}`);
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, raw: this.raw, kind: this.kind };
  }
}

export type RowRejectionReason =
  | 'decode_error'
  | 'conflicting_values'
  | 'missing_identifier'
  /** Continuation lines at the top of a page with no block to continue */
  | 'orphan_continuation';

export interface RowRejectedDetails {
  pageNumber: number;
  rowIndex: number;
  reason: RowRejectionReason;
  field?: string;
  raw?: string;
  /** Identifier text, when one was found */
  identifier?: string;
}

export class RowRejected extends LohnjournalError {
  readonly code = 'row_rejected';
  readonly pageNumber: number;
  readonly rowIndex: number;
  readonly reason: RowRejectionReason;
  readonly field?: string;
  readonly raw?: string;
  readonly identifier?: string;

  constructor(details: RowRejectedDetails, cause?: unknown) {
    const where = `page ${details.pageNumber}, row ${details.rowIndex}`;
    const what = details.field ? ` (field ${details.field}: "${details.raw ?? ''}")` : '';
    super(`Row rejected on ${where}: ${details.reason}${what}`, { cause });
    this.pageNumber = details.pageNumber;
    this.rowIndex = details.rowIndex;
    this.reason = details.reason;
    this.field = details.field;
    this.raw = details.raw;
    this.identifier = details.identifier;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      page_number: this.pageNumber,
      row_index: this.rowIndex,
      reason: this.reason,
      field: this.field ?? null,
      raw: this.raw ?? null,
      identifier: this.identifier ?? null,
    };
  }
}

export class HeaderParseError extends LohnjournalError {
  readonly code = 'header_parse_error';

  constructor(
    readonly headerText: string,
    readonly pageNumber: number | null = null,
    /** Number of employee blocks withheld because the period is unknown */
    readonly rejectedRowCount = 0
  ) {
    const where = pageNumber === null ? '' : ` on page ${pageNumber}`;
    super(`No reporting period found${where}`);
  }

  /** Same error, located on a page */
  atPage(pageNumber: number, rejectedRowCount: number): HeaderParseError {
    return new HeaderParseError(this.headerText, pageNumber, rejectedRowCount);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      page_number: this.pageNumber,
      rejected_row_count: this.rejectedRowCount,
      header_text: this.headerText.slice(0, 300),
    };
  }
}

export class LayoutConfigError extends LohnjournalError {
  readonly code = 'layout_config_error';

  constructor(
    readonly layoutVersion: string,
    readonly problems: string[]
  ) {
    super(`Invalid layout "${layoutVersion}": ${problems.join('; ')}`);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      layout_version: this.layoutVersion,
      problems: this.problems,
    };
  }
}
