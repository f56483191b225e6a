/**
 * Record Extractor
 *
 * Turns Lohnjournal pages into employee rows. Each page is handled in two
 * phases: resolve the reporting period from the header, then assemble and
 * decode the employee blocks. A page without a period yields no rows; a block
 * that cannot be decoded completely yields a RowRejected instead of a record.
 * Across a document, the last block of a page stays open until the next page
 * shows whether its continuation lines carry over.
 */

import { logger } from '../logger';
import { DecodeError, HeaderParseError, RowRejected } from './errors';
import { decodeDatevNumber } from './number-decoder';
import { MonthResolver, formatPeriod } from './month-resolver';
import { RowAssembler, lineText, type AssembledLine, type RowGroup } from './row-assembler';
import { getLineLayout, type LayoutProfile } from './layout';
import {
  EMPTY,
  isEmpty,
  type DocumentMetadata,
  type EmployeeRow,
  type FieldDefinition,
  type FieldValue,
  type PageContent,
  type PositionedFragment,
  type ReportingPeriod,
} from './types';

export interface RecordExtractorOptions {
  /** Throw the first rejection or header error instead of collecting it */
  strict?: boolean;
  monthResolver?: MonthResolver;
}

export interface PageExtraction {
  pageNumber: number;
  period: ReportingPeriod | null;
  rows: EmployeeRow[];
  rejections: RowRejected[];
  headerError: HeaderParseError | null;
}

export interface DocumentExtraction {
  layoutVersion: string;
  metadata: DocumentMetadata;
  rows: EmployeeRow[];
  rejections: RowRejected[];
  headerErrors: HeaderParseError[];
  /** Pages that do not carry the layout's page markers */
  skippedPages: number[];
  /** Pages that went through extraction */
  processedPages: number[];
}

interface PageBlocks {
  groups: RowGroup[];
  leading: AssembledLine[];
  period: ReportingPeriod | null;
  headerError: HeaderParseError | null;
}

interface OpenBlock {
  group: RowGroup;
  pageNumber: number;
  period: ReportingPeriod;
}

interface Outcomes {
  rows: EmployeeRow[];
  rejections: RowRejected[];
}

const METADATA_PATTERNS = {
  berater: /Berater:\s*(\d+)/,
  mandant: /Mandant:\s*(\d+)/,
  datum: /Datum:\s*([\d.]+)/,
} as const;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export class RecordExtractor {
  readonly profile: LayoutProfile;
  private readonly assembler: RowAssembler;
  private readonly monthResolver: MonthResolver;
  private readonly strict: boolean;
  private readonly fieldsByName: Map<string, FieldDefinition>;

  constructor(profile: LayoutProfile, options: RecordExtractorOptions = {}) {
    this.profile = profile;
    this.assembler = new RowAssembler(profile);
    this.monthResolver = options.monthResolver ?? new MonthResolver();
    this.strict = options.strict ?? false;
    this.fieldsByName = new Map(profile.fields.map((field) => [field.name, field]));
  }

  /**
   * Extract the employee rows of one page. Continuation lines above the
   * page's first block have nothing to continue and are rejected.
   *
   * @throws RowRejected | HeaderParseError in strict mode only
   */
  extract(page: PageContent): PageExtraction {
    const blocks = this.readPage(page);
    const outcomes: Outcomes = { rows: [], rejections: [] };

    if (blocks.leading.length > 0) {
      this.collect(orphanRejection(page.pageNumber, blocks.leading), outcomes);
    }
    const { period } = blocks;
    if (period) {
      for (const group of blocks.groups) {
        this.collect(this.buildRow(group, page.pageNumber, period), outcomes);
      }
    }

    return { pageNumber: page.pageNumber, period, ...outcomes, headerError: blocks.headerError };
  }

  /**
   * Extract all pages in document order. Pages without the layout's page
   * markers (cover sheets, totals pages of other reports) are skipped. A block
   * cut by a page break is completed with the continuation lines that open the
   * next page and keeps the page number it started on.
   */
  extractDocument(pages: Iterable<PageContent>): DocumentExtraction {
    const result: DocumentExtraction = {
      layoutVersion: this.profile.version,
      metadata: { berater: null, mandant: null, datum: null, period: null },
      rows: [],
      rejections: [],
      headerErrors: [],
      skippedPages: [],
      processedPages: [],
    };
    let metadataRead = false;
    let open: OpenBlock | null = null;

    for (const page of pages) {
      const text = lineText(page.fragments);
      if (!this.profile.pageMarkers.every((marker) => text.includes(marker))) {
        result.skippedPages.push(page.pageNumber);
        continue;
      }

      const blocks = this.readPage(page);
      result.processedPages.push(page.pageNumber);

      if (blocks.leading.length > 0) {
        if (open) {
          const pending: OpenBlock = open;
          open = { ...pending, group: appendLines(pending.group, blocks.leading) };
        } else {
          this.collect(orphanRejection(page.pageNumber, blocks.leading), result);
        }
      }

      if (blocks.groups.length > 0) {
        if (open) {
          this.collect(this.buildRow(open.group, open.pageNumber, open.period), result);
          open = null;
        }

        const { period } = blocks;
        if (period) {
          const last = blocks.groups[blocks.groups.length - 1];
          for (const group of blocks.groups.slice(0, -1)) {
            this.collect(this.buildRow(group, page.pageNumber, period), result);
          }
          open = { group: last, pageNumber: page.pageNumber, period };
        }
      }

      if (blocks.headerError) result.headerErrors.push(blocks.headerError);

      if (!metadataRead) {
        result.metadata = this.readMetadata(page.fragments, blocks.period);
        metadataRead = true;
      }
    }

    if (open) {
      this.collect(this.buildRow(open.group, open.pageNumber, open.period), result);
    }

    return result;
  }

  /**
   * Header region text: lines above the body, or the whole page without a body boundary.
   */
  headerText(fragments: readonly PositionedFragment[]): string {
    const bodyTop = this.profile.bodyTop;
    const header = bodyTop === null ? fragments : fragments.filter((fragment) => fragment.y0 < bodyTop);
    return this.assembler
      .clusterLines(header)
      .map((line) => lineText(line.fragments))
      .join('\n');
  }

  private readPage(page: PageContent): PageBlocks {
    const { groups, leading, discarded } = this.assembler.assemble(page.fragments);

    if (discarded.length > 0) {
      logger.debug('Discarded page lines', {
        page_number: page.pageNumber,
        lines: discarded.map((line) => `${line.reason}: ${line.text}`),
      });
    }

    try {
      const period = this.monthResolver.resolve(this.headerText(page.fragments));
      return { groups, leading, period, headerError: null };
    } catch (err) {
      if (!(err instanceof HeaderParseError)) throw err;
      const headerError = err.atPage(page.pageNumber, groups.length);
      if (this.strict) throw headerError;
      return { groups, leading, period: null, headerError };
    }
  }

  private collect(outcome: EmployeeRow | RowRejected, target: Outcomes): void {
    if (outcome instanceof RowRejected) {
      if (this.strict) throw outcome;
      target.rejections.push(outcome);
    } else {
      target.rows.push(outcome);
    }
  }

  private readMetadata(
    fragments: readonly PositionedFragment[],
    period: ReportingPeriod | null
  ): DocumentMetadata {
    const text = this.headerText(fragments);
    const read = (pattern: RegExp) => pattern.exec(text)?.[1] ?? null;
    return {
      berater: read(METADATA_PATTERNS.berater),
      mandant: read(METADATA_PATTERNS.mandant),
      datum: read(METADATA_PATTERNS.datum),
      period: period ? formatPeriod(period) : null,
    };
  }

  private buildRow(group: RowGroup, pageNumber: number, period: ReportingPeriod): EmployeeRow | RowRejected {
    const fields: Record<string, FieldValue> = {};
    for (const field of this.profile.fields) {
      fields[field.name] = EMPTY;
    }

    const textParts = new Map<string, string[]>();
    const subRowCodes: string[] = [];
    const rawLines: string[] = [];

    const reject = (reason: RowRejected['reason'], extra: { field?: string; raw?: string } = {}, cause?: unknown) =>
      new RowRejected(
        {
          pageNumber,
          rowIndex: group.index,
          reason,
          ...extra,
          identifier: textParts.get(this.profile.identifierField)?.join(' '),
        },
        cause
      );

    for (const line of group.lines) {
      rawLines.push(lineText(line.fragments));
      if (line.marker) subRowCodes.push(line.marker.text.trim());

      const lineLayout = getLineLayout(this.profile, line.kind);
      if (!lineLayout) continue;

      for (const fragment of line.fragments) {
        const text = fragment.text.trim();
        if (fragment === line.marker) continue;
        if (fragment.x0 < lineLayout.ignoreBelowX) continue;
        if (this.profile.ignoredTokens.has(text)) continue;

        const spec = lineLayout.fieldLayout.assign(fragment);
        if (!spec) continue;
        if (spec.pattern && text !== '' && !spec.pattern.test(text)) continue;

        if (spec.kind === 'text') {
          if (text === '') continue;
          const parts = textParts.get(spec.name) ?? [];
          parts.push(text);
          textParts.set(spec.name, parts);
          continue;
        }

        let value: FieldValue;
        try {
          value = decodeDatevNumber(text, spec.kind);
        } catch (err) {
          if (err instanceof DecodeError) {
            return reject('decode_error', { field: spec.name, raw: fragment.text }, err);
          }
          throw err;
        }

        if (isEmpty(value)) continue;
        if (!isEmpty(fields[spec.name])) {
          return reject('conflicting_values', { field: spec.name, raw: fragment.text });
        }
        fields[spec.name] = value;
      }
    }

    for (const [name, parts] of textParts) {
      const suffixes = this.fieldsByName.get(name)?.trimSuffixes ?? [];
      const value = stripSuffixes(parts.join(' '), suffixes);
      fields[name] = value === '' ? EMPTY : { kind: 'text', value };
    }

    const identifier = fields[this.profile.identifierField];
    if (identifier.kind !== 'text' || !this.profile.identifierPattern.test(identifier.value)) {
      return reject('missing_identifier', {
        field: this.profile.identifierField,
        raw: identifier.kind === 'text' ? identifier.value : '',
      });
    }

    return deepFreeze({
      pageNumber,
      rowIndex: group.index,
      month: period.month,
      year: period.year,
      monthNumber: period.monthNumber,
      fields,
      subRowCodes,
      rawLines,
    });
  }
}

function appendLines(group: RowGroup, lines: readonly AssembledLine[]): RowGroup {
  return {
    index: group.index,
    lines: [...group.lines, ...lines],
    fragments: [...group.fragments, ...lines.flatMap((line) => line.fragments)],
  };
}

function orphanRejection(pageNumber: number, lines: readonly AssembledLine[]): RowRejected {
  return new RowRejected({
    pageNumber,
    rowIndex: 0,
    reason: 'orphan_continuation',
    raw: lines.map((line) => lineText(line.fragments)).join(' | '),
  });
}

function stripSuffixes(value: string, suffixes: readonly string[]): string {
  let result = value.trim();
  for (const suffix of suffixes) {
    if (result === suffix) {
      result = '';
    } else if (result.endsWith(` ${suffix}`)) {
      result = result.slice(0, -suffix.length).trim();
    }
  }
  return result;
}
