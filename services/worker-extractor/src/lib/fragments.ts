/**
 * Text items -> positioned fragments
 *
 * pdfjs reports text runs with a transform whose origin is the baseline at the
 * bottom-left of the page. The extraction core wants word fragments with a
 * top-down y0, so runs are split at whitespace and flipped.
 */

import type { PageContent, PositionedFragment } from '@lohnjournal/shared';

export interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
}

/**
 * pdfjs mixes text items with marked-content markers in getTextContent().items
 */
export function isTextItem(item: unknown): item is PdfTextItem {
  if (item === null || typeof item !== 'object') return false;
  if (!('str' in item) || !('transform' in item) || !('width' in item) || !('height' in item)) return false;
  return (
    typeof item.str === 'string' &&
    Array.isArray(item.transform) &&
    item.transform.length >= 6 &&
    item.transform.every((n: unknown) => typeof n === 'number') &&
    typeof item.width === 'number' &&
    typeof item.height === 'number'
  );
}

/**
 * Split one text run into word fragments. Word positions inside a run are
 * interpolated from the run width, assuming evenly spaced characters.
 */
function splitRun(item: PdfTextItem, pageHeight: number): PositionedFragment[] {
  const [, , , scaleY, originX, baselineY] = item.transform;
  const height = item.height > 0 ? item.height : Math.abs(scaleY);
  const y0 = pageHeight - baselineY - height;
  const charWidth = item.str.length > 0 ? item.width / item.str.length : 0;

  const fragments: PositionedFragment[] = [];
  for (const match of item.str.matchAll(/\S+/g)) {
    const index = match.index ?? 0;
    const x0 = originX + index * charWidth;
    fragments.push({ text: match[0], x0, x1: x0 + match[0].length * charWidth, y0 });
  }
  return fragments;
}

export function toFragments(items: readonly unknown[], pageHeight: number): PositionedFragment[] {
  return items.filter(isTextItem).flatMap((item) => splitRun(item, pageHeight));
}

export function toPageContent(pageNumber: number, items: readonly unknown[], pageHeight: number): PageContent {
  return { pageNumber, fragments: toFragments(items, pageHeight) };
}
