/**
 * Row Assembler
 *
 * Clusters a page's fragments into physical lines by vertical position, then
 * folds lines into employee blocks: a line carrying a personnel number opens a
 * block, continuation lines (tax, employer, minijob codes) join the open block,
 * everything else is page noise. Continuation lines above the first block of a
 * page belong to the last block of the previous page and are returned apart.
 */

import type { LayoutProfile, LineLayout } from './layout';
import type { PositionedFragment } from './types';

export interface AssembledLine {
  kind: string;
  /** y0 of the first fragment of the line */
  y0: number;
  /** Ordered left to right */
  fragments: readonly PositionedFragment[];
  /** Code that identified a continuation line */
  marker: PositionedFragment | null;
}

export interface RowGroup {
  /** 0-based position of the block on its page */
  index: number;
  lines: readonly AssembledLine[];
  /** All fragments of the block in reading order */
  fragments: readonly PositionedFragment[];
}

export type DiscardReason = 'above_body' | 'no_identifier';

export interface DiscardedLine {
  y0: number;
  text: string;
  reason: DiscardReason;
}

export interface AssemblyResult {
  groups: RowGroup[];
  /** Continuation lines before the page's first block */
  leading: AssembledLine[];
  discarded: DiscardedLine[];
}

interface PhysicalLine {
  y0: number;
  fragments: PositionedFragment[];
}

export function lineText(fragments: readonly PositionedFragment[]): string {
  return fragments
    .map((fragment) => fragment.text.trim())
    .filter((text) => text !== '')
    .join(' ');
}

export class RowAssembler {
  constructor(private readonly profile: LayoutProfile) {}

  /**
   * Group fragments into employee blocks, top to bottom.
   */
  group(fragments: readonly PositionedFragment[]): RowGroup[] {
    return this.assemble(fragments).groups;
  }

  /**
   * Like group(), also reporting the lines that were discarded.
   */
  assemble(fragments: readonly PositionedFragment[]): AssemblyResult {
    const discarded: DiscardedLine[] = [];
    const leading: AssembledLine[] = [];
    const blocks: AssembledLine[][] = [];

    for (const line of this.clusterLines(fragments)) {
      const text = lineText(line.fragments);

      if (this.profile.bodyTop !== null && line.y0 < this.profile.bodyTop) {
        discarded.push({ y0: line.y0, text, reason: 'above_body' });
        continue;
      }

      const continuation = this.matchContinuation(line);
      if (continuation) {
        const assembled: AssembledLine = {
          kind: continuation.layout.kind,
          y0: line.y0,
          fragments: line.fragments,
          marker: continuation.marker,
        };
        const open = blocks[blocks.length - 1];
        if (open) {
          open.push(assembled);
        } else {
          leading.push(assembled);
        }
        continue;
      }

      if (this.hasIdentifier(line)) {
        blocks.push([{ kind: this.profile.mainLine.kind, y0: line.y0, fragments: line.fragments, marker: null }]);
        continue;
      }

      discarded.push({ y0: line.y0, text, reason: 'no_identifier' });
    }

    const groups = blocks.map((lines, index) => ({
      index,
      lines,
      fragments: lines.flatMap((line) => line.fragments),
    }));

    return { groups, leading, discarded };
  }

  /**
   * Cluster fragments into lines. A fragment joins the current line while its
   * y0 is within rowTolerance of the line's first fragment.
   */
  clusterLines(fragments: readonly PositionedFragment[]): PhysicalLine[] {
    const sorted = fragments
      .filter((fragment) => Number.isFinite(fragment.y0))
      .slice()
      .sort((a, b) => a.y0 - b.y0 || a.x0 - b.x0);

    const lines: PhysicalLine[] = [];
    let current: PhysicalLine | null = null;

    for (const fragment of sorted) {
      if (current && fragment.y0 - current.y0 <= this.profile.rowTolerance) {
        current.fragments.push(fragment);
      } else {
        current = { y0: fragment.y0, fragments: [fragment] };
        lines.push(current);
      }
    }

    for (const line of lines) {
      line.fragments.sort((a, b) => a.x0 - b.x0);
    }

    return lines;
  }

  private matchContinuation(line: PhysicalLine): { layout: LineLayout; marker: PositionedFragment } | null {
    const marker = line.fragments.find((fragment) => fragment.text.trim() !== '');
    if (!marker) return null;

    const code = marker.text.trim();
    const layout = this.profile.continuationLines.find(
      (candidate) => candidate.markerCodes.has(code) && marker.x0 < candidate.markerMaxX
    );
    return layout ? { layout, marker } : null;
  }

  private hasIdentifier(line: PhysicalLine): boolean {
    const { fieldLayout } = this.profile.mainLine;
    return line.fragments.some(
      (fragment) =>
        fieldLayout.assign(fragment)?.name === this.profile.identifierField &&
        this.profile.identifierPattern.test(fragment.text.trim())
    );
  }
}
