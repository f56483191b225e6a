/**
 * Row assembly
 */

import { createLayout, RowAssembler, lineText } from '@lohnjournal/shared';
import { fragment, header, simpleLayoutDefinition, blockLayoutDefinition } from './helpers';

describe('RowAssembler', () => {
  describe('single-line layout', () => {
    const assembler = new RowAssembler(createLayout(simpleLayoutDefinition()));

    it('groups one block per personnel number and drops noise lines', () => {
      const result = assembler.assemble([
        ...header('Lohnjournal Januar 2025'),
        fragment('12345', 10, 100, 40),
        fragment('2.43000', 120, 100, 40),
        fragment('23456', 10, 120, 40),
        fragment('Summe', 10, 140, 40),
        fragment('9.99999', 120, 140, 40),
        fragment('34567', 10, 160, 40),
        fragment('18041', 220, 160, 40),
      ]);

      expect(result.groups).toHaveLength(3);
      expect(result.groups.map((group) => group.index)).toEqual([0, 1, 2]);
      expect(result.groups.map((group) => lineText(group.fragments))).toEqual([
        '12345 2.43000',
        '23456',
        '34567 18041',
      ]);
      expect(result.discarded).toEqual([
        { y0: 10, text: 'Lohnjournal Januar 2025', reason: 'above_body' },
        { y0: 140, text: 'Summe 9.99999', reason: 'no_identifier' },
      ]);
    });

    it('merges fragments within the row tolerance', () => {
      const groups = assembler.group([
        fragment('2.43000', 120, 101.5, 40),
        fragment('12345', 10, 100, 40),
      ]);

      expect(groups).toHaveLength(1);
      expect(groups[0].fragments.map((f) => f.text)).toEqual(['12345', '2.43000']);
    });

    it('anchors the tolerance at the first fragment of a line', () => {
      const lines = assembler.clusterLines([
        fragment('a', 10, 100),
        fragment('b', 40, 102),
        fragment('c', 70, 103.5),
      ]);

      expect(lines.map((line) => line.fragments.map((f) => f.text))).toEqual([['a', 'b'], ['c']]);
      expect(lines.map((line) => line.y0)).toEqual([100, 103.5]);
    });

    it('does not take a number outside the identifier band as a personnel number', () => {
      const result = assembler.assemble([fragment('12345', 120, 100, 40)]);

      expect(result.groups).toEqual([]);
      expect(result.discarded).toEqual([{ y0: 100, text: '12345', reason: 'no_identifier' }]);
    });

    it('returns nothing for an empty page', () => {
      expect(assembler.assemble([])).toEqual({ groups: [], leading: [], discarded: [] });
    });
  });

  describe('block layout', () => {
    const assembler = new RowAssembler(createLayout(blockLayoutDefinition()));

    it('attaches continuation lines to the open block', () => {
      const groups = assembler.group([
        fragment('12345', 5, 100, 30),
        fragment('Muster', 60, 100, 40),
        fragment('1', 10, 110, 5),
        fragment('30', 50, 110, 20),
        fragment('2.43000', 220, 110, 40),
        fragment('23456', 5, 130, 30),
        fragment('2', 10, 140, 5),
      ]);

      expect(groups).toHaveLength(2);
      expect(groups[0].lines.map((line) => line.kind)).toEqual(['main', 'tax']);
      expect(groups[0].lines[1].marker?.text).toBe('1');
      expect(groups[1].lines.map((line) => line.kind)).toEqual(['main', 'tax']);
      expect(groups[1].lines[1].marker?.text).toBe('2');
    });

    it('returns continuation lines before the first block apart', () => {
      const marker = fragment('1', 10, 90, 5);
      const lohnsteuer = fragment('2.43000', 220, 90, 40);
      const result = assembler.assemble([marker, lohnsteuer, fragment('12345', 5, 100, 30)]);

      expect(result.groups).toHaveLength(1);
      expect(result.groups[0].lines.map((line) => line.kind)).toEqual(['main']);
      expect(result.leading).toEqual([{ kind: 'tax', y0: 90, fragments: [marker, lohnsteuer], marker }]);
      expect(result.discarded).toEqual([]);
    });

    it('requires the marker to sit left of markerMaxX', () => {
      const result = assembler.assemble([fragment('12345', 5, 100, 30), fragment('1', 60, 110, 5)]);

      expect(result.groups[0].lines).toHaveLength(1);
      expect(result.discarded).toEqual([{ y0: 110, text: '1', reason: 'no_identifier' }]);
    });
  });
});
