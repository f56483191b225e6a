/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for layout profiles and extraction results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { LayoutDefinition } from './lohnjournal/layout';
import type { ExtractionResult } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }

  const content: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (content === null || typeof content !== 'object') {
    throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return content;
}

// Compiled lazily on first use
let layoutValidator: ValidateFunction<LayoutDefinition> | null = null;
let extractionResultValidator: ValidateFunction<ExtractionResult> | null = null;

function getLayoutValidator(): ValidateFunction<LayoutDefinition> {
  if (!layoutValidator) {
    layoutValidator = ajv.compile<LayoutDefinition>(loadSchema('layout.schema.json'));
  }
  return layoutValidator;
}

function getExtractionResultValidator(): ValidateFunction<ExtractionResult> {
  if (!extractionResultValidator) {
    extractionResultValidator = ajv.compile<ExtractionResult>(loadSchema('extraction_result.schema.json'));
  }
  return extractionResultValidator;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown, label: string): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a layout profile against layout.schema.json
 */
export function validateLayoutDefinition(data: unknown): ValidationResult<LayoutDefinition> {
  return runValidator(getLayoutValidator(), data, 'Layout');
}

/**
 * Validate an ExtractionResult against extraction_result.schema.json
 */
export function validateExtraction(data: unknown): ValidationResult<ExtractionResult> {
  return runValidator(getExtractionResultValidator(), data, 'ExtractionResult');
}
