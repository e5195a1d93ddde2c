/**
 * Metadata extraction: display name, description, order and numeric id.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import yaml from 'js-yaml';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { InvalidMetadataError } from '../errors.js';
import { collectSchemaErrors } from '../schema.js';
import { DEFAULT_NUMERIC_ID, DEFAULT_UNIT_ORDER } from '../unit.js';
import { errorMessage, isRecord, toError } from '../utils/index.js';
import { stripSuffix, type ScanOptions } from './scanner.js';
import type { UnitMetadata } from './types.js';

export const UnitDeclarationsSchema = Type.Object({
  name: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  order: Type.Optional(Type.Number()),
});

export type UnitDeclarations = Static<typeof UnitDeclarationsSchema>;

const DECLARED_FIELDS = ['name', 'description', 'order'] as const;

/** Copy the declared metadata fields off a unit object, skipping absent ones. */
export function pickDeclarations(source: object): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const field of DECLARED_FIELDS) {
    const value: unknown = Reflect.get(source, field);
    if (value !== undefined) picked[field] = value;
  }
  return picked;
}

function checkDeclarations(
  declared: Record<string, unknown>,
  candidate: string,
  origin: string,
): UnitDeclarations {
  if (!Value.Check(UnitDeclarationsSchema, declared)) {
    const errors = collectSchemaErrors(UnitDeclarationsSchema, declared);
    throw new InvalidMetadataError(candidate, `${origin}: ${errors.join('; ')}`);
  }
  return declared;
}

/**
 * Read a companion `<stem>_meta.yaml`. An empty file declares nothing.
 */
export function loadMetadataFile(metaPath: string, candidate: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(metaPath, 'utf-8'));
  } catch (e) {
    throw new InvalidMetadataError(candidate, `cannot read ${basename(metaPath)}: ${errorMessage(e)}`, {
      cause: toError(e),
    });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new InvalidMetadataError(candidate, `${basename(metaPath)} must be a YAML mapping`);
  }
  return parsed;
}

/** `code_label_printer.js` → `Code Label Printer`. Letters after digits start a new word. */
export function defaultDisplayName(candidate: string, suffix: string): string {
  return stripSuffix(candidate, suffix)
    .replace(/_/g, ' ')
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * First run of digits after the prefix: `code10.js` → 10, `code_app_5.js` → 5.
 * Candidates without digits get DEFAULT_NUMERIC_ID so they sort after numbered ones.
 */
export function parseNumericId(candidate: string, options: ScanOptions): number {
  let stem = stripSuffix(candidate, options.suffix);
  if (stem.startsWith(options.prefix)) stem = stem.slice(options.prefix.length);
  const match = /\d+/.exec(stem);
  return match ? Number.parseInt(match[0], 10) : DEFAULT_NUMERIC_ID;
}

/**
 * Build the metadata record for a resolved unit. Values from the companion YAML
 * file take precedence over values declared in code.
 */
export function extractMetadata(
  unit: object,
  candidate: string,
  options: ScanOptions,
  fileMeta: Record<string, unknown> = {},
): UnitMetadata {
  const fromCode = checkDeclarations(pickDeclarations(unit), candidate, 'declared in code');
  const fromFile = checkDeclarations(pickDeclarations(fileMeta), candidate, 'declared in metadata file');

  const name = fromFile.name || fromCode.name;
  return {
    displayName: name ? name : defaultDisplayName(candidate, options.suffix),
    description: fromFile.description ?? fromCode.description ?? '',
    order: fromFile.order ?? fromCode.order ?? DEFAULT_UNIT_ORDER,
    numericId: parseNumericId(candidate, options),
  };
}
