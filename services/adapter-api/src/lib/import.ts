/**
 * Folder Import
 *
 * Scans an import folder for Lohnjournal PDFs, assigns content-addressed
 * document ids and enqueues document.available jobs in chronological order
 * (by the period in the file name; the period printed on the pages stays
 * authoritative for the rows).
 */

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import {
  logger,
  MonthResolver,
  periodSortKey,
  type DocumentAvailableJob,
  type ImportRequest,
  type ImportResponse,
  type ReportingPeriod,
} from '@lohnjournal/shared';

export interface ImportOptions {
  folder: string;
  passwords: string[];
  maxDocuments: number;
}

export interface ImportCandidate {
  filename: string;
  filePath: string;
  period: ReportingPeriod | null;
}

/** The part of a BullMQ queue the import needs */
export interface DocumentQueue {
  add(name: string, data: DocumentAvailableJob, opts?: { jobId?: string }): Promise<unknown>;
}

export class ImportRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportRequestError';
  }
}

/**
 * Validate a POST /imports body.
 */
export function parseImportRequest(body: unknown): ImportRequest {
  if (body === undefined || body === null) return {};
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new ImportRequestError('Request body must be a JSON object');
  }

  const request: ImportRequest = {};
  if ('folder' in body && body.folder !== undefined) {
    if (typeof body.folder !== 'string' || body.folder.trim() === '') {
      throw new ImportRequestError('folder must be a non-empty string');
    }
    request.folder = body.folder;
  }
  if ('passwords' in body && body.passwords !== undefined) {
    const passwords: unknown = body.passwords;
    if (!Array.isArray(passwords) || !passwords.every((item): item is string => typeof item === 'string')) {
      throw new ImportRequestError('passwords must be an array of strings');
    }
    request.passwords = passwords;
  }
  if ('max_documents' in body && body.max_documents !== undefined) {
    const max: unknown = body.max_documents;
    if (typeof max !== 'number' || !Number.isInteger(max) || max < 1) {
      throw new ImportRequestError('max_documents must be a positive integer');
    }
    request.max_documents = max;
  }
  return request;
}

/**
 * Resolve a requested folder against the import root; folders outside it are refused.
 */
export function resolveImportFolder(requested: string | undefined, root: string): string {
  const base = path.resolve(root);
  const folder = requested ? path.resolve(base, requested) : base;
  const relative = path.relative(base, folder);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ImportRequestError(`Folder is outside the import root: ${requested}`);
  }
  if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new ImportRequestError(`Folder not found: ${requested ?? folder}`);
  }
  return folder;
}

/**
 * PDFs in a folder, oldest period first; files without a period in their name come last.
 */
export function listImportCandidates(folder: string, resolver: MonthResolver = new MonthResolver()): ImportCandidate[] {
  const candidates = fs
    .readdirSync(folder)
    .filter((filename) => filename.toLowerCase().endsWith('.pdf'))
    .map((filename) => ({
      filename,
      filePath: path.join(folder, filename),
      period: resolver.resolveFromFilename(filename),
    }));

  return candidates.sort((a, b) => {
    const keyA = a.period ? periodSortKey(a.period) : Number.MAX_SAFE_INTEGER;
    const keyB = b.period ? periodSortKey(b.period) : Number.MAX_SAFE_INTEGER;
    return keyA - keyB || a.filename.localeCompare(b.filename);
  });
}

/**
 * Content-addressed document id: sha256:<hex>
 */
export function documentIdFor(bytes: Buffer): string {
  return `sha256:${crypto.createHash('sha256').update(bytes).digest('hex')}`;
}

/**
 * Enqueue every PDF of the folder. Unreadable and duplicate files are reported
 * in `skipped`, as are files beyond maxDocuments.
 */
export async function importFolder(
  options: ImportOptions,
  correlationId: string,
  queue: DocumentQueue
): Promise<ImportResponse> {
  const candidates = listImportCandidates(options.folder);
  const selected = candidates.slice(0, options.maxDocuments);
  const skipped = candidates.slice(options.maxDocuments).map((candidate) => candidate.filename);
  const seen = new Set<string>();
  let enqueued = 0;

  logger.info('Found documents', {
    folder: options.folder,
    count: candidates.length,
    selected: selected.length,
  });

  for (const candidate of selected) {
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(candidate.filePath);
    } catch (error) {
      logger.error('Failed to read document', error, { filename: candidate.filename });
      skipped.push(candidate.filename);
      continue;
    }

    const documentId = documentIdFor(bytes);
    if (seen.has(documentId)) {
      logger.warn('Duplicate document content', { filename: candidate.filename, document_id: documentId });
      skipped.push(candidate.filename);
      continue;
    }
    seen.add(documentId);

    const jobPayload: DocumentAvailableJob = {
      event_type: 'document.available',
      correlation_id: correlationId,
      document_id: documentId,
      raw_uri: `file://${candidate.filePath}`,
      source_filename: candidate.filename,
      discovered_at: new Date().toISOString(),
      ...(options.passwords.length > 0 ? { passwords: options.passwords } : {}),
    };

    await queue.add('document.available', jobPayload, {
      jobId: `import_${correlationId}_${documentId.replace(':', '_')}`,
    });
    enqueued++;

    logger.info('Enqueued document.available job', {
      document_id: documentId,
      source_filename: candidate.filename,
      period_hint: candidate.period ? `${candidate.period.month} ${candidate.period.year}` : null,
    });
  }

  return { correlation_id: correlationId, enqueued, skipped };
}
