/**
 * Lohnjournal Core Types
 *
 * Data model for coordinate-based extraction of DATEV Lohnjournal pages.
 * Everything here is plain data so rows can travel through BullMQ jobs as JSON.
 */

// ============================================================================
// Page Input
// ============================================================================

/**
 * One piece of text on a page. `y0` is measured from the top edge,
 * so ascending `y0` is reading order.
 */
export interface PositionedFragment {
  readonly text: string;
  readonly x0: number;
  readonly x1: number;
  readonly y0: number;
}

export interface PageContent {
  /** 1-based page number within the document */
  pageNumber: number;
  fragments: readonly PositionedFragment[];
}

// ============================================================================
// Field Schema
// ============================================================================

export type FieldKind = 'text' | 'integer' | 'currency';

export type NumericFieldKind = Exclude<FieldKind, 'text'>;

export interface FieldDefinition {
  /** Record key and database column */
  name: string;
  /** Column header in exports */
  label: string;
  kind: FieldKind;
  /** Suffixes stripped from text values after assembly (e.g. the "NB" flag after names) */
  trimSuffixes?: string[];
}

/**
 * A field's horizontal band `[x_min, x_max)` on one line kind.
 */
export interface FieldSpec extends FieldDefinition {
  x_min: number;
  x_max: number;
  /** Texts not matching this pattern are not accepted by the field */
  pattern?: RegExp;
}

// ============================================================================
// Values
// ============================================================================

export type FieldValue =
  | { readonly kind: 'empty' }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'currency'; readonly minor: number };

/**
 * Explicit "no value" marker. Distinct from a zero amount.
 */
export const EMPTY: FieldValue = Object.freeze({ kind: 'empty' });

export function isEmpty(
  value: FieldValue | undefined
): value is Extract<FieldValue, { kind: 'empty' }> | undefined {
  return value === undefined || value.kind === 'empty';
}

// ============================================================================
// Records
// ============================================================================

export interface ReportingPeriod {
  /** German month name, canonical spelling (e.g. "März") */
  month: string;
  year: number;
  /** 1-12 */
  monthNumber: number;
}

export interface EmployeeRow {
  readonly pageNumber: number;
  /** 0-based position of the employee block on its page */
  readonly rowIndex: number;
  readonly month: string;
  readonly year: number;
  readonly monthNumber: number;
  readonly fields: Readonly<Record<string, FieldValue>>;
  /** Marker codes of the continuation lines that made up the block */
  readonly subRowCodes: readonly string[];
  /** Text of each line of the block, for manual inspection */
  readonly rawLines: readonly string[];
}

export interface DocumentMetadata {
  berater: string | null;
  mandant: string | null;
  datum: string | null;
  period: string | null;
}
