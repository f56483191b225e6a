/**
 * Extraction result assembly and reporting
 */

import {
  logger,
  pagesCounter,
  rowsExtractedCounter,
  rowsRejectedCounter,
  type DocumentExtraction,
  type DocumentInfo,
  type ExtractionResult,
  type HeaderErrorRecord,
  type HeaderParseError,
  type RowRejected,
  type RowRejectionRecord,
} from '@lohnjournal/shared';

export function toRejectionRecord(rejection: RowRejected): RowRejectionRecord {
  return {
    code: rejection.code,
    message: rejection.message,
    page_number: rejection.pageNumber,
    row_index: rejection.rowIndex,
    reason: rejection.reason,
    field: rejection.field ?? null,
    raw: rejection.raw ?? null,
    identifier: rejection.identifier ?? null,
  };
}

export function toHeaderErrorRecord(error: HeaderParseError): HeaderErrorRecord {
  return {
    code: error.code,
    message: error.message,
    page_number: error.pageNumber,
    rejected_row_count: error.rejectedRowCount,
    header_text: error.headerText.slice(0, 300),
  };
}

export function buildExtractionResult(
  extraction: DocumentExtraction,
  document: DocumentInfo,
  correlationId: string,
  createdAt: Date = new Date()
): ExtractionResult {
  return {
    schema_version: '1.0',
    correlation_id: correlationId,
    document,
    layout_version: extraction.layoutVersion,
    metadata: extraction.metadata,
    rows: extraction.rows,
    rejections: extraction.rejections.map(toRejectionRecord),
    header_errors: extraction.headerErrors.map(toHeaderErrorRecord),
    skipped_pages: extraction.skippedPages,
    created_at: createdAt.toISOString(),
  };
}

export interface MismatchCheck {
  blocks: number;
  rejected: number;
  mismatch: boolean;
}

/**
 * A high share of rejected employee blocks usually means the PDF was printed
 * with a layout revision the profile does not describe.
 */
export function checkLayoutMismatch(extraction: DocumentExtraction, ratio: number): MismatchCheck {
  const rejected = extraction.rejections.length;
  const blocks = extraction.rows.length + rejected;
  return { blocks, rejected, mismatch: blocks > 0 && rejected / blocks > ratio };
}

/**
 * Log every rejection and header error, and record extraction metrics.
 */
export function reportExtraction(extraction: DocumentExtraction, mismatchRatio: number): MismatchCheck {
  const layoutVersion = extraction.layoutVersion;

  for (const rejection of extraction.rejections) {
    logger.warn('Employee row rejected', toRejectionRecord(rejection));
    rowsRejectedCounter.inc({ layout_version: layoutVersion, reason: rejection.reason });
  }
  for (const headerError of extraction.headerErrors) {
    logger.warn('Page without reporting period', toHeaderErrorRecord(headerError));
  }

  rowsExtractedCounter.inc({ layout_version: layoutVersion }, extraction.rows.length);
  pagesCounter.inc({ outcome: 'skipped' }, extraction.skippedPages.length);
  pagesCounter.inc({ outcome: 'header_error' }, extraction.headerErrors.length);
  pagesCounter.inc(
    { outcome: 'extracted' },
    extraction.processedPages.length - extraction.headerErrors.length
  );

  const check = checkLayoutMismatch(extraction, mismatchRatio);
  if (check.mismatch) {
    logger.warn('Most employee blocks were rejected; the PDF layout may not match the profile', {
      layout_version: layoutVersion,
      rejected: check.rejected,
      blocks: check.blocks,
    });
  }
  return check;
}
