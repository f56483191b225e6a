/**
 * Test Helpers
 *
 * Fragment builders, small layout profiles and an in-process database stand-in.
 */

import type {
  Database,
  LayoutDefinition,
  PositionedFragment,
  SqlExecutor,
  SqlResult,
} from '@lohnjournal/shared';

/**
 * Fragment of a given width starting at x0
 */
export function fragment(text: string, x0: number, y0: number, width = 20): PositionedFragment {
  return { text, x0, x1: x0 + width, y0 };
}

/**
 * Single-line layout: personnel number, Lohnsteuer and Kirchensteuer columns.
 */
export function simpleLayoutDefinition(): LayoutDefinition {
  return {
    version: 'test-simple',
    identifier: { field: 'pers_nr', pattern: '^\\d{5}$' },
    rowTolerance: 2,
    bodyTop: 50,
    fields: [
      { name: 'pers_nr', label: 'Pers.-Nr.', kind: 'text' },
      { name: 'lohnsteuer', label: 'Lohnsteuer', kind: 'currency' },
      { name: 'kirchensteuer', label: 'Kirchensteuer', kind: 'currency' },
    ],
    lines: [
      {
        kind: 'main',
        bands: [
          { field: 'pers_nr', x_min: 0, x_max: 60 },
          { field: 'lohnsteuer', x_min: 100, x_max: 200 },
          { field: 'kirchensteuer', x_min: 200, x_max: 300 },
        ],
      },
    ],
  };
}

/**
 * Two-line layout: main line with number and name, tax line marked "1"
 * with day count and Lohnsteuer.
 */
export function blockLayoutDefinition(): LayoutDefinition {
  return {
    version: 'test-block',
    identifier: { field: 'pers_nr', pattern: '^\\d{5}$' },
    rowTolerance: 2,
    bodyTop: 50,
    pageMarkers: ['Lohnjournal'],
    ignoredTokens: ['Z'],
    fields: [
      { name: 'pers_nr', label: 'Pers.-Nr.', kind: 'text' },
      { name: 'name', label: 'Name', kind: 'text', trimSuffixes: ['NB'] },
      { name: 'gesamtbrutto', label: 'Gesamtbrutto', kind: 'currency' },
      { name: 'st_tage', label: 'St-Tage', kind: 'integer' },
      { name: 'lohnsteuer', label: 'Lohnsteuer', kind: 'currency' },
    ],
    lines: [
      {
        kind: 'main',
        bands: [
          { field: 'pers_nr', x_min: 0, x_max: 50 },
          { field: 'name', x_min: 50, x_max: 200, pattern: '[^\\d.,-]' },
          { field: 'gesamtbrutto', x_min: 200, x_max: 300 },
        ],
      },
      {
        kind: 'tax',
        markerCodes: ['1', '2'],
        markerMaxX: 40,
        ignoreBelowX: 40,
        bands: [
          { field: 'st_tage', x_min: 40, x_max: 100 },
          { field: 'lohnsteuer', x_min: 200, x_max: 300 },
        ],
      },
    ],
  };
}

/**
 * Header fragments carrying a title line above the body
 */
export function header(title: string, y0 = 10): PositionedFragment[] {
  return title.split(' ').map((word, i) => fragment(word, 10 + i * 80, y0, 60));
}

export interface RecordedStatement {
  text: string;
  values: unknown[];
}

/**
 * Database stand-in that records statements and answers queries through a responder.
 */
export class FakeDatabase implements Database {
  readonly statements: RecordedStatement[] = [];
  closed = false;

  constructor(
    private readonly respond: (text: string, values: unknown[]) => Array<Record<string, unknown>> = () => []
  ) {}

  async query(text: string, values: unknown[] = []): Promise<SqlResult> {
    this.statements.push({ text, values });
    const rows = this.respond(text, values);
    return { rows, rowCount: rows.length };
  }

  async transaction<T>(operation: string, work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.statements.push({ text: 'BEGIN', values: [operation] });
    try {
      const result = await work(this);
      this.statements.push({ text: 'COMMIT', values: [] });
      return result;
    } catch (error) {
      this.statements.push({ text: 'ROLLBACK', values: [] });
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  texts(): string[] {
    return this.statements.map((statement) => statement.text);
  }
}
