/**
 * PDF Reading
 *
 * Opens (and decrypts) Lohnjournal PDFs with pdfjs-dist and returns the
 * positioned text of every page.
 */

import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist';
import { logger, LohnjournalError, type PageContent } from '@lohnjournal/shared';
import { toPageContent } from './fragments';

// Node has no web workers; pdfjs falls back to loading the worker module in-process
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PdfPagesResult {
  pages: PageContent[];
  totalPages: number;
  /** Whether one of the candidate passwords was needed */
  encrypted: boolean;
}

/**
 * None of the candidate passwords opens the document.
 */
export class PdfPasswordError extends Error {
  constructor(
    readonly filePath: string,
    readonly attempts: number
  ) {
    super(`No candidate password opens ${filePath} (${attempts} tried)`);
    this.name = 'PdfPasswordError';
  }
}

// pdfjs exceptions for files it cannot parse
const PDF_PARSE_EXCEPTIONS = new Set([
  'InvalidPDFException',
  'MissingPDFException',
  'FormatError',
  'UnknownErrorException',
  'UnexpectedResponseException',
]);

/**
 * Failures of the document itself that a retry cannot fix: wrong passwords,
 * files pdfjs cannot parse, file system errors and rejected extractions.
 */
export function isDocumentFailure(err: unknown): boolean {
  if (err instanceof PdfPasswordError || err instanceof LohnjournalError) return true;
  if (!(err instanceof Error)) return false;
  if (PDF_PARSE_EXCEPTIONS.has(err.name)) return true;
  // ENOENT, EACCES, EISDIR from fs
  return 'syscall' in err && 'code' in err && typeof err.code === 'string';
}

function isPasswordException(err: unknown): boolean {
  return err instanceof Error && err.name === 'PasswordException';
}

/**
 * Candidate passwords in the order they are tried: job, configuration, none.
 */
export function passwordCandidates(jobPasswords: readonly string[], configured: readonly string[]): string[] {
  return [...new Set([...jobPasswords, ...configured, ''])];
}

async function openDocument(data: Uint8Array, filePath: string, candidates: readonly string[]) {
  for (const password of candidates) {
    // pdfjs may transfer the buffer to its worker, so every attempt gets a copy
    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(data),
      password,
      isEvalSupported: false,
      useSystemFonts: false,
      // pdfjs warnings bypass the structured logger
      verbosity: 0,
    });

    try {
      const pdf = await loadingTask.promise;
      return { pdf, encrypted: password !== '' };
    } catch (err) {
      await loadingTask.destroy();
      if (isPasswordException(err)) {
        logger.debug('Password candidate rejected', { filePath, candidate: candidates.indexOf(password) });
        continue;
      }
      throw err;
    }
  }

  throw new PdfPasswordError(filePath, candidates.length);
}

/**
 * Read all pages of a PDF as positioned fragments.
 *
 * @throws PdfPasswordError when the document cannot be decrypted
 */
export async function readPdfPages(filePath: string, passwords: readonly string[]): Promise<PdfPagesResult> {
  logger.info('Reading PDF', { filePath });

  const data = new Uint8Array(fs.readFileSync(filePath));
  const { pdf, encrypted } = await openDocument(data, filePath, passwords.length > 0 ? passwords : ['']);

  try {
    const pages: PageContent[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();

      pages.push(toPageContent(pageNum, textContent.items, viewport.height));
      page.cleanup();
    }

    logger.info('PDF reading complete', {
      filePath,
      totalPages: pdf.numPages,
      fragments: pages.reduce((sum, page) => sum + page.fragments.length, 0),
      encrypted,
    });

    return { pages, totalPages: pdf.numPages, encrypted };
  } finally {
    await pdf.destroy();
  }
}
