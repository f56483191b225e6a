/**
 * Layout Profiles
 *
 * A layout profile describes one revision of the Lohnjournal print layout:
 * the declared fields, the band table of each line kind, and the clustering
 * tolerances. Profiles are data (layouts/*.json); a new DATEV layout revision
 * needs a new profile, not new code.
 */

import fs from 'fs';
import path from 'path';
import { validateLayoutDefinition } from '../schemas';
import { FieldLayout } from './field-layout';
import { LayoutConfigError } from './errors';
import type { FieldDefinition, FieldKind, FieldSpec } from './types';

// ============================================================================
// JSON Shape
// ============================================================================

export interface BandDefinition {
  field: string;
  x_min: number;
  x_max: number;
  pattern?: string;
}

export interface LineDefinition {
  kind: string;
  /** Leftmost codes that identify a continuation line; absent on the main line */
  markerCodes?: string[];
  /** The marker must start left of this x */
  markerMaxX?: number;
  /** Fragments starting left of this x are not assigned to fields */
  ignoreBelowX?: number;
  bands: BandDefinition[];
}

export interface LayoutDefinition {
  version: string;
  description?: string;
  identifier: {
    field: string;
    pattern: string;
  };
  rowTolerance: number;
  bodyTop?: number;
  pageMarkers?: string[];
  ignoredTokens?: string[];
  fields: Array<{
    name: string;
    label: string;
    kind: FieldKind;
    trimSuffixes?: string[];
  }>;
  lines: LineDefinition[];
}

// ============================================================================
// Compiled Profile
// ============================================================================

export interface LineLayout {
  kind: string;
  markerCodes: ReadonlySet<string>;
  markerMaxX: number;
  ignoreBelowX: number;
  fieldLayout: FieldLayout;
}

export interface LayoutProfile {
  version: string;
  description: string;
  identifierField: string;
  identifierPattern: RegExp;
  rowTolerance: number;
  bodyTop: number | null;
  pageMarkers: readonly string[];
  ignoredTokens: ReadonlySet<string>;
  fields: readonly FieldDefinition[];
  mainLine: LineLayout;
  continuationLines: readonly LineLayout[];
}

export const DEFAULT_LAYOUT_VERSION = 'datev-loa313';

function compilePattern(source: string, where: string, problems: string[]): RegExp | undefined {
  try {
    return new RegExp(source);
  } catch (err) {
    problems.push(`${where}: invalid pattern ${source} (${err instanceof Error ? err.message : String(err)})`);
    return undefined;
  }
}

function compileLine(
  line: LineDefinition,
  fieldsByName: Map<string, FieldDefinition>,
  problems: string[]
): LineLayout {
  const specs: FieldSpec[] = [];

  for (const band of line.bands) {
    const where = `line ${line.kind}, band ${band.field}`;
    const field = fieldsByName.get(band.field);
    if (!field) {
      problems.push(`${where}: field is not declared`);
      continue;
    }
    if (!(band.x_min < band.x_max)) {
      problems.push(`${where}: x_min ${band.x_min} must be below x_max ${band.x_max}`);
      continue;
    }
    const pattern = band.pattern === undefined ? undefined : compilePattern(band.pattern, where, problems);
    specs.push({ ...field, x_min: band.x_min, x_max: band.x_max, ...(pattern ? { pattern } : {}) });
  }

  return {
    kind: line.kind,
    markerCodes: new Set(line.markerCodes ?? []),
    markerMaxX: line.markerMaxX ?? Number.POSITIVE_INFINITY,
    ignoreBelowX: line.ignoreBelowX ?? Number.NEGATIVE_INFINITY,
    fieldLayout: new FieldLayout(line.kind, specs),
  };
}

/**
 * Compile a layout definition into a profile.
 *
 * @throws LayoutConfigError when the definition is structurally invalid
 */
export function createLayout(definition: LayoutDefinition): LayoutProfile {
  const problems: string[] = [];
  const fieldsByName = new Map<string, FieldDefinition>();

  for (const field of definition.fields) {
    if (fieldsByName.has(field.name)) {
      problems.push(`field ${field.name} is declared twice`);
    }
    fieldsByName.set(field.name, {
      name: field.name,
      label: field.label,
      kind: field.kind,
      ...(field.trimSuffixes ? { trimSuffixes: field.trimSuffixes } : {}),
    });
  }

  const identifier = fieldsByName.get(definition.identifier.field);
  if (!identifier) {
    problems.push(`identifier field ${definition.identifier.field} is not declared`);
  } else if (identifier.kind !== 'text') {
    problems.push(`identifier field ${identifier.name} must be of kind text`);
  }
  const identifierPattern = compilePattern(definition.identifier.pattern, 'identifier', problems);

  const mainDefinitions = definition.lines.filter((line) => !line.markerCodes || line.markerCodes.length === 0);
  if (mainDefinitions.length !== 1) {
    problems.push(`expected exactly one line without marker codes, found ${mainDefinitions.length}`);
  }

  const seenCodes = new Map<string, string>();
  for (const line of definition.lines) {
    for (const code of line.markerCodes ?? []) {
      const owner = seenCodes.get(code);
      if (owner !== undefined) {
        problems.push(`marker code ${code} is used by lines ${owner} and ${line.kind}`);
      }
      seenCodes.set(code, line.kind);
    }
  }

  const lines = definition.lines.map((line) => compileLine(line, fieldsByName, problems));
  const mainLine = lines.find((line) => line.markerCodes.size === 0);

  if (mainLine && !mainLine.fieldLayout.specs.some((spec) => spec.name === definition.identifier.field)) {
    problems.push(`identifier field ${definition.identifier.field} has no band on line ${mainLine.kind}`);
  }
  if (!(definition.rowTolerance >= 0)) {
    problems.push(`rowTolerance must not be negative`);
  }

  if (problems.length > 0 || !mainLine || !identifierPattern) {
    throw new LayoutConfigError(definition.version, problems);
  }

  return {
    version: definition.version,
    description: definition.description ?? '',
    identifierField: definition.identifier.field,
    identifierPattern,
    rowTolerance: definition.rowTolerance,
    bodyTop: definition.bodyTop ?? null,
    pageMarkers: definition.pageMarkers ?? [],
    ignoredTokens: new Set(definition.ignoredTokens ?? []),
    fields: Array.from(fieldsByName.values()),
    mainLine,
    continuationLines: lines.filter((line) => line !== mainLine),
  };
}

/**
 * Validate untrusted JSON against the layout schema, then compile it.
 */
export function parseLayout(data: unknown, source = 'layout'): LayoutProfile {
  const validation = validateLayoutDefinition(data);
  if (!validation.valid) {
    throw new LayoutConfigError(source, validation.errors);
  }
  return createLayout(validation.value);
}

/**
 * Directories searched for layouts/<version>.json
 */
function layoutDirectories(): string[] {
  return [
    path.join(__dirname, '../../layouts'),
    path.join(__dirname, '../../../layouts'),
    path.join(process.cwd(), 'packages/shared/layouts'),
  ];
}

/**
 * Load a layout profile by version from the layouts directory.
 * A value containing a path separator or ending in .json is read as a file path.
 */
export function loadLayout(versionOrPath: string = DEFAULT_LAYOUT_VERSION): LayoutProfile {
  const isPath = versionOrPath.endsWith('.json') || versionOrPath.includes(path.sep);
  const candidates = isPath
    ? [path.resolve(versionOrPath)]
    : layoutDirectories().map((dir) => path.join(dir, `${versionOrPath}.json`));

  const file = candidates.find((candidate) => fs.existsSync(candidate));
  if (!file) {
    throw new LayoutConfigError(versionOrPath, [`layout file not found (looked in ${candidates.join(', ')})`]);
  }

  const data: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return parseLayout(data, versionOrPath);
}

/**
 * Copy of a profile with a different row tolerance.
 */
export function withRowTolerance(profile: LayoutProfile, rowTolerance: number): LayoutProfile {
  if (!(rowTolerance >= 0)) {
    throw new LayoutConfigError(profile.version, [`rowTolerance must not be negative`]);
  }
  return { ...profile, rowTolerance };
}

/**
 * Line layout by kind, main line included.
 */
export function getLineLayout(profile: LayoutProfile, kind: string): LineLayout | undefined {
  if (profile.mainLine.kind === kind) return profile.mainLine;
  return profile.continuationLines.find((line) => line.kind === kind);
}
