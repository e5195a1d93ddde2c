/**
 * Entry point resolution for discovered unit files.
 */

import { pathToFileURL } from 'node:url';
import { UnitLoadError } from '../errors.js';
import { errorMessage, isRecord, toError } from '../utils/index.js';
import type { Candidate } from './types.js';

const UNIT_FIELDS = ['run', 'name', 'description', 'order'];

function isUnitObject(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && UNIT_FIELDS.some((field) => field in value);
}

/**
 * Import a candidate and return the object its contract is read from: the
 * default export when it is a unit definition object, otherwise the module
 * namespace with its named exports.
 *
 * Anything the import throws (syntax errors, missing dependencies, a throwing
 * top-level statement) surfaces as UnitLoadError.
 */
export async function resolveUnit(candidate: Candidate): Promise<Record<string, unknown>> {
  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(candidate.filePath).href);
  } catch (e) {
    throw new UnitLoadError(candidate.name, errorMessage(e), { cause: toError(e) });
  }

  if (!isRecord(loaded)) {
    throw new UnitLoadError(candidate.name, 'import did not produce a module namespace');
  }

  const defaultExport = loaded['default'];
  if (isUnitObject(defaultExport)) {
    return defaultExport;
  }
  return loaded;
}
