/**
 * Extraction with the shipped DATEV LOA313 layout
 */

import { loadLayout, RecordExtractor, EMPTY, type EmployeeRow, type PageContent } from '@lohnjournal/shared';
import { fragment, header } from './helpers';

function filledFields(row: EmployeeRow): string[] {
  return Object.entries(row.fields)
    .filter(([, value]) => value !== EMPTY)
    .map(([name]) => name)
    .sort();
}

describe('datev-loa313 layout', () => {
  const extractor = new RecordExtractor(loadLayout('datev-loa313'));

  const page: PageContent = {
    pageNumber: 1,
    fragments: [
      ...header('Lohnjournal Januar 2025'),
      ...header('Form.-Nr.LOA313 Berater: 4711', 30),

      // main line
      fragment('12345', 10, 120, 30),
      fragment('1', 65, 120, 8),
      fragment('0,5', 115, 120, 15),
      fragment('Muster', 145, 120, 40),
      fragment('Max', 190, 120, 20),
      fragment('NB', 215, 120, 12),
      fragment('Z', 240, 120, 6),
      fragment('4.12500', 460, 120, 45),
      fragment('4.12500', 520, 120, 45),
      fragment('4.50000', 765, 120, 50),
      // tax line
      fragment('1', 100, 132, 6),
      fragment('30', 135, 132, 15),
      fragment('4.50000', 170, 132, 50),
      fragment('52.541', 250, 132, 45),
      fragment('E', 300, 132, 6),
      fragment('4.203', 320, 132, 40),
      fragment('2.89011', 765, 132, 50),
      // employer line
      fragment('01111', 20, 144, 30),
      fragment('30', 135, 144, 15),
      fragment('34.650', 460, 144, 45),
      fragment('2.89011', 765, 144, 50),

      // minijob block
      fragment('23456', 10, 170, 30),
      fragment('Beispiel', 145, 170, 40),
      fragment('Eva', 190, 170, 20),
      fragment('52000', 765, 170, 50),
      fragment('26500', 20, 182, 30),
      fragment('31', 135, 182, 15),
      fragment('1.040', 260, 182, 30),
      fragment('6.760', 460, 182, 30),
      fragment('52000', 765, 182, 50),
    ],
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads main, tax and employer lines into one record', () => {
    const result = extractor.extractDocument([page]);

    expect(result.rejections).toEqual([]);
    expect(result.rows).toHaveLength(2);

    const [row] = result.rows;
    expect(row.fields).toMatchObject({
      pers_nr: { kind: 'text', value: '12345' },
      steuerklasse: { kind: 'text', value: '1' },
      ki_freibetrag: { kind: 'text', value: '0,5' },
      name: { kind: 'text', value: 'Muster Max' },
      kv_brutto: { kind: 'currency', minor: 412500 },
      rv_brutto: { kind: 'currency', minor: 412500 },
      gesamtbrutto: { kind: 'currency', minor: 450000 },
      st_tage: { kind: 'integer', value: 30 },
      steuerbrutto: { kind: 'currency', minor: 450000 },
      lohnsteuer: { kind: 'currency', minor: 52541 },
      kirchensteuer: { kind: 'currency', minor: 4203 },
      netto_bezuege: { kind: 'currency', minor: 289011 },
      sv_tage: { kind: 'integer', value: 30 },
      kv_beitrag_ag: { kind: 'currency', minor: 34650 },
      auszahlungsbetrag: { kind: 'currency', minor: 289011 },
    });
    expect(filledFields(row)).toHaveLength(15);
    expect(row.fields.solidaritaetszuschlag).toBe(EMPTY);
    expect(row.subRowCodes).toEqual(['1', '01111']);
    expect(row.rawLines).toEqual([
      '12345 1 0,5 Muster Max NB Z 4.12500 4.12500 4.50000',
      '1 30 4.50000 52.541 E 4.203 2.89011',
      '01111 30 34.650 2.89011',
    ]);
  });

  it('reads a minijob line', () => {
    const [, row] = extractor.extractDocument([page]).rows;

    expect(filledFields(row)).toEqual([
      'auszahlungsbetrag',
      'gesamtbrutto',
      'kv_beitrag_ag',
      'name',
      'pausch_lohnsteuer',
      'pers_nr',
      'sv_tage',
    ]);
    expect(row.fields).toMatchObject({
      name: { kind: 'text', value: 'Beispiel Eva' },
      gesamtbrutto: { kind: 'currency', minor: 52000 },
      sv_tage: { kind: 'integer', value: 31 },
      pausch_lohnsteuer: { kind: 'currency', minor: 1040 },
      kv_beitrag_ag: { kind: 'currency', minor: 6760 },
      auszahlungsbetrag: { kind: 'currency', minor: 52000 },
    });
    expect(row.subRowCodes).toEqual(['26500']);
  });

  it('reads the period and the Berater number from the header', () => {
    const result = extractor.extractDocument([page]);

    expect(result.metadata).toEqual({ berater: '4711', mandant: null, datum: null, period: 'Januar 2025' });
    expect(result.rows.map((row) => [row.month, row.year])).toEqual([
      ['Januar', 2025],
      ['Januar', 2025],
    ]);
  });
});
