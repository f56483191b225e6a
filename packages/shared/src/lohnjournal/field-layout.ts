/**
 * Field Layout
 *
 * Band table for one line kind. A fragment belongs to the field whose
 * `[x_min, x_max)` band contains its horizontal midpoint.
 *
 * Lookup is a sorted-interval search: binary search for the last band starting
 * at or before the midpoint, then a backward scan bounded by the widest band.
 */

import { logger } from '../logger';
import type { FieldSpec, PositionedFragment } from './types';

export interface BandOverlap {
  first: string;
  second: string;
  from: number;
  to: number;
}

function width(spec: FieldSpec): number {
  return spec.x_max - spec.x_min;
}

/** Narrowest first, then leftmost, then by name */
function compareSpecificity(a: FieldSpec, b: FieldSpec): number {
  return width(a) - width(b) || a.x_min - b.x_min || a.name.localeCompare(b.name);
}

export function fragmentMidpoint(fragment: PositionedFragment): number {
  return (fragment.x0 + fragment.x1) / 2;
}

export class FieldLayout {
  readonly lineKind: string;
  readonly overlaps: readonly BandOverlap[];
  private readonly bands: readonly FieldSpec[];
  private readonly maxWidth: number;

  constructor(lineKind: string, specs: readonly FieldSpec[]) {
    this.lineKind = lineKind;
    this.bands = [...specs].sort((a, b) => a.x_min - b.x_min || a.x_max - b.x_max);
    this.maxWidth = this.bands.reduce((max, spec) => Math.max(max, width(spec)), 0);
    this.overlaps = findOverlaps(this.bands);

    for (const overlap of this.overlaps) {
      logger.warn('Overlapping field bands, narrowest band wins', {
        line_kind: lineKind,
        ...overlap,
      });
    }
  }

  get specs(): readonly FieldSpec[] {
    return this.bands;
  }

  /**
   * Resolve the field for a fragment, or null for page furniture.
   */
  assign(fragment: PositionedFragment): FieldSpec | null {
    const mid = fragmentMidpoint(fragment);
    if (!Number.isFinite(mid)) return null;

    // Last band with x_min <= mid
    let lo = 0;
    let hi = this.bands.length - 1;
    let last = -1;
    while (lo <= hi) {
      const pivot = (lo + hi) >> 1;
      if (this.bands[pivot].x_min <= mid) {
        last = pivot;
        lo = pivot + 1;
      } else {
        hi = pivot - 1;
      }
    }

    let best: FieldSpec | null = null;
    for (let i = last; i >= 0; i--) {
      const spec = this.bands[i];
      if (mid - spec.x_min >= this.maxWidth) break;
      if (mid < spec.x_max && (best === null || compareSpecificity(spec, best) < 0)) {
        best = spec;
      }
    }

    return best;
  }
}

function findOverlaps(sorted: readonly FieldSpec[]): BandOverlap[] {
  const overlaps: BandOverlap[] = [];
  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length && sorted[j].x_min < sorted[i].x_max; j++) {
      overlaps.push({
        first: sorted[i].name,
        second: sorted[j].name,
        from: sorted[j].x_min,
        to: Math.min(sorted[i].x_max, sorted[j].x_max),
      });
    }
  }
  return overlaps;
}
