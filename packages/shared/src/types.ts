/**
 * Shared TypeScript Types
 *
 * Types for the Lohnjournal import pipeline, matching JSON schemas in docs/contracts/
 */

import type { DocumentMetadata, EmployeeRow } from './lohnjournal/types';

// ============================================================================
// Documents
// ============================================================================

export interface DocumentInfo {
  /** sha256:<hex> of the PDF bytes */
  document_id: string;
  source_filename: string;
  raw_uri: string;
  discovered_at?: string;
}

// ============================================================================
// Extraction Result (extraction_result.schema.json)
// ============================================================================

export type RowRejectionRecord = {
  code: string;
  message: string;
  page_number: number;
  row_index: number;
  reason: string;
  field: string | null;
  raw: string | null;
  identifier: string | null;
};

export type HeaderErrorRecord = {
  code: string;
  message: string;
  page_number: number | null;
  rejected_row_count: number;
  header_text: string;
};

export interface ExtractionResult {
  schema_version: '1.0';
  correlation_id: string;
  document: DocumentInfo;
  layout_version: string;
  metadata: DocumentMetadata;
  rows: EmployeeRow[];
  rejections: RowRejectionRecord[];
  header_errors: HeaderErrorRecord[];
  skipped_pages: number[];
  created_at: string;
}

// ============================================================================
// Persisted Periods
// ============================================================================

export interface PeriodSummary {
  table_name: string;
  month: string;
  year: number;
  month_number: number;
  row_count: number;
  document_id: string | null;
  updated_at: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface ImportRequest {
  /** Folder with Lohnjournal PDFs; defaults to the configured folder */
  folder?: string;
  /** Candidate PDF passwords tried in order */
  passwords?: string[];
  max_documents?: number;
}

export interface ImportResponse {
  correlation_id: string;
  enqueued: number;
  skipped: string[];
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
