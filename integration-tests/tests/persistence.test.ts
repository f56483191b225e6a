/**
 * Period tables and result persistence
 */

import {
  createLayout,
  RecordExtractor,
  periodTableName,
  periodTableStatements,
  upsertRowStatement,
  rowFromRecord,
  toColumnValue,
  fromColumnValue,
  EMPTY,
  type DocumentInfo,
  type EmployeeRow,
  type TableSchema,
} from '@lohnjournal/shared';
import { buildExtractionResult } from '../../services/worker-extractor/src/lib/result';
import { groupRowsByPeriod, persistExtractionResult } from '../../services/worker-persistence/src/lib/db';
import { FakeDatabase, fragment, header, simpleLayoutDefinition } from './helpers';

const profile = createLayout(simpleLayoutDefinition());
const schema: TableSchema = { fields: profile.fields, identifierField: profile.identifierField };
const documentId = `sha256:${'b'.repeat(64)}`;

const document: DocumentInfo = {
  document_id: documentId,
  source_filename: 'Januar_2025.pdf',
  raw_uri: 'file:///data/pdfs/Januar_2025.pdf',
};

function extractRows(title: string): EmployeeRow[] {
  const extraction = new RecordExtractor(profile).extract({
    pageNumber: 1,
    fragments: [
      ...header(title),
      fragment('12345', 10, 100, 40),
      fragment('2.43000', 120, 100, 40),
      fragment('', 220, 100, 40),
      fragment('23456', 10, 120, 40),
      fragment('000', 220, 120, 40),
    ],
  });
  return extraction.rows;
}

describe('periodTableName', () => {
  it('transliterates umlauts', () => {
    expect(periodTableName({ month: 'März', year: 2025 })).toBe('lohnjournal_maerz_2025');
    expect(periodTableName({ month: 'Januar', year: 2025 })).toBe('lohnjournal_januar_2025');
  });

  it('replaces characters outside the identifier alphabet', () => {
    expect(periodTableName({ month: 'Juni/Juli', year: 2025 })).toBe('lohnjournal_juni_juli_2025');
  });
});

describe('periodTableStatements', () => {
  const statements = periodTableStatements('lohnjournal_januar_2025', schema);

  it('creates one column per field keyed by identifier, year and month', () => {
    const [create] = statements;

    expect(create.startsWith('CREATE TABLE IF NOT EXISTS "lohnjournal_januar_2025" (')).toBe(true);
    expect(create).toContain('"pers_nr" TEXT NOT NULL,');
    expect(create).toContain('"lohnsteuer" NUMERIC(14,2),');
    expect(create).toContain("sub_row_codes TEXT[] NOT NULL DEFAULT '{}',");
    expect(create).toContain('PRIMARY KEY ("pers_nr", year, month)');
  });

  it('adds missing columns for tables created by an older layout', () => {
    expect(statements.slice(1)).toEqual([
      'ALTER TABLE "lohnjournal_januar_2025" ADD COLUMN IF NOT EXISTS "lohnsteuer" NUMERIC(14,2)',
      'ALTER TABLE "lohnjournal_januar_2025" ADD COLUMN IF NOT EXISTS "kirchensteuer" NUMERIC(14,2)',
    ]);
  });

  it('refuses field names that clash with bookkeeping columns', () => {
    const clashing: TableSchema = {
      identifierField: 'pers_nr',
      fields: [...schema.fields, { name: 'month', label: 'Monat', kind: 'text' }],
    };

    expect(() => periodTableStatements('t', clashing)).toThrow('Field names clash with period table columns: month');
  });
});

describe('column values', () => {
  it('stores EMPTY as NULL and currency as a decimal string', () => {
    expect(toColumnValue(EMPTY)).toBeNull();
    expect(toColumnValue({ kind: 'currency', minor: 243000 })).toBe('2430.00');
    expect(toColumnValue({ kind: 'currency', minor: 0 })).toBe('0.00');
    expect(toColumnValue({ kind: 'integer', value: 30 })).toBe(30);
    expect(toColumnValue({ kind: 'text', value: 'Muster' })).toBe('Muster');
  });

  it('reads NULL back as EMPTY and NUMERIC strings as minor units', () => {
    expect(fromColumnValue(null, 'currency')).toBe(EMPTY);
    expect(fromColumnValue('-5.50', 'currency')).toEqual({ kind: 'currency', minor: -550 });
    expect(fromColumnValue(30, 'integer')).toEqual({ kind: 'integer', value: 30 });
    expect(() => fromColumnValue('abc', 'integer')).toThrow('Invalid integer column value: abc');
  });
});

describe('upsertRowStatement', () => {
  it('updates every non-key column on conflict', () => {
    const [row] = extractRows('Lohnjournal Januar 2025');
    const statement = upsertRowStatement('lohnjournal_januar_2025', schema, row, documentId);

    expect(statement.text).toBe(
      [
        'INSERT INTO "lohnjournal_januar_2025" ("pers_nr", "lohnsteuer", "kirchensteuer", "month", "year", "month_number", "page_number", "row_index", "sub_row_codes", "raw_lines", "document_id")',
        'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)',
        'ON CONFLICT ("pers_nr", "year", "month") DO UPDATE SET',
        '  "lohnsteuer" = EXCLUDED."lohnsteuer",',
        '  "kirchensteuer" = EXCLUDED."kirchensteuer",',
        '  "month_number" = EXCLUDED."month_number",',
        '  "page_number" = EXCLUDED."page_number",',
        '  "row_index" = EXCLUDED."row_index",',
        '  "sub_row_codes" = EXCLUDED."sub_row_codes",',
        '  "raw_lines" = EXCLUDED."raw_lines",',
        '  "document_id" = EXCLUDED."document_id",',
        '  updated_at = NOW()',
      ].join('\n')
    );
    expect(statement.values).toEqual([
      '12345',
      '2430.00',
      null,
      'Januar',
      2025,
      1,
      1,
      0,
      [],
      ['12345 2.43000'],
      documentId,
    ]);
  });
});

describe('rowFromRecord', () => {
  it('rebuilds a stored row', () => {
    const row = rowFromRecord(
      {
        pers_nr: '23456',
        lohnsteuer: null,
        kirchensteuer: '0.00',
        month: 'Januar',
        year: 2025,
        month_number: 1,
        page_number: 1,
        row_index: 1,
        sub_row_codes: [],
        raw_lines: ['23456 000'],
        document_id: documentId,
        updated_at: new Date('2025-02-03T10:00:00Z'),
      },
      schema
    );

    expect(row).toEqual({
      pageNumber: 1,
      rowIndex: 1,
      month: 'Januar',
      year: 2025,
      monthNumber: 1,
      fields: {
        pers_nr: { kind: 'text', value: '23456' },
        lohnsteuer: EMPTY,
        kirchensteuer: { kind: 'currency', minor: 0 },
      },
      subRowCodes: [],
      rawLines: ['23456 000'],
      documentId,
      updatedAt: '2025-02-03T10:00:00.000Z',
    });
  });
});

describe('groupRowsByPeriod', () => {
  it('batches rows per period, oldest first', () => {
    const batches = groupRowsByPeriod([
      ...extractRows('Lohnjournal Februar 2025'),
      ...extractRows('Lohnjournal Januar 2025'),
    ]);

    expect(batches.map((batch) => [batch.tableName, batch.rows.length])).toEqual([
      ['lohnjournal_januar_2025', 2],
      ['lohnjournal_februar_2025', 2],
    ]);
  });
});

describe('persistExtractionResult', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function sampleResult() {
    const extraction = new RecordExtractor(profile).extractDocument([
      {
        pageNumber: 1,
        fragments: [
          ...header('Lohnjournal Januar 2025'),
          fragment('12345', 10, 100, 40),
          fragment('2.43000', 120, 100, 40),
          fragment('23456', 10, 120, 40),
        ],
      },
    ]);
    return buildExtractionResult(extraction, document, 'corr-1');
  }

  it('writes document, period table and period registry in one transaction', async () => {
    const db = new FakeDatabase();

    const summary = await persistExtractionResult(sampleResult(), schema, 'corr-1', db);

    expect(summary).toEqual({
      documentId,
      periods: [{ tableName: 'lohnjournal_januar_2025', rowCount: 2 }],
      rowCount: 2,
    });

    const texts = db.texts();
    expect(texts).toHaveLength(10);
    expect(texts[0]).toBe('BEGIN');
    expect(texts[1]).toContain('INSERT INTO lohnjournal_documents');
    expect(texts[2]).toBe('SELECT pg_advisory_xact_lock(hashtext($1))');
    expect(texts[3]).toContain('CREATE TABLE IF NOT EXISTS "lohnjournal_januar_2025"');
    expect(texts[6]).toContain('INSERT INTO "lohnjournal_januar_2025"');
    expect(texts[7]).toContain('INSERT INTO "lohnjournal_januar_2025"');
    expect(texts[8]).toContain('INSERT INTO lohnjournal_periods');
    expect(texts[8]).toContain('(SELECT COUNT(*) FROM "lohnjournal_januar_2025")');
    expect(texts[9]).toBe('COMMIT');

    expect(db.statements[0].values).toEqual(['persist_extraction']);
    expect(db.statements[1].values).toEqual([
      documentId,
      'Januar_2025.pdf',
      'file:///data/pdfs/Januar_2025.pdf',
      'test-simple',
      null,
      null,
      null,
      'Januar 2025',
      2,
      0,
      0,
      [],
      '{"rejections":[],"header_errors":[]}',
      'corr-1',
    ]);
    expect(db.statements[2].values).toEqual(['lohnjournal_januar_2025']);
    expect(db.statements[8].values).toEqual(['lohnjournal_januar_2025', 'Januar', 2025, 1, 'test-simple', documentId]);
  });

  it('records the document even when no rows were extracted', async () => {
    const db = new FakeDatabase();
    const result = { ...sampleResult(), rows: [] };

    const summary = await persistExtractionResult(result, schema, 'corr-1', db);

    expect(summary.periods).toEqual([]);
    expect(db.texts().map((text) => text.split('\n')[0].trim())).toEqual([
      'BEGIN',
      'INSERT INTO lohnjournal_documents (',
      'COMMIT',
    ]);
  });

  it('rolls back when a row cannot be written', async () => {
    const db = new FakeDatabase((text) => {
      if (text.startsWith('INSERT INTO "lohnjournal_januar_2025"')) {
        throw new Error('connection reset');
      }
      return [];
    });

    await expect(persistExtractionResult(sampleResult(), schema, 'corr-1', db)).rejects.toThrow('connection reset');
    expect(db.texts()[db.texts().length - 1]).toBe('ROLLBACK');
    expect(db.texts()).not.toContain('COMMIT');
  });
});
