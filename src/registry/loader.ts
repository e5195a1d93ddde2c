/**
 * Turns candidates into units. Every per-candidate failure is converted into a
 * LoadError here; only a scan failure leaves this module as an exception.
 */

import {
  EntryPointMissingError,
  EntryPointNotCallableError,
  InvalidMetadataError,
  ToolhostError,
  UnitLoadError,
} from '../errors.js';
import { errorMessage, errorTrace } from '../utils/index.js';
import { resolveUnit } from './entry-point.js';
import { extractMetadata, loadMetadataFile } from './metadata.js';
import { scanUnits, type ScanOptions } from './scanner.js';
import type { Candidate, LoadError, LoadErrorKind, LoadOutcome, UnitSource } from './types.js';
import { validateUnit } from './validation.js';

export function loadErrorKind(error: unknown): LoadErrorKind {
  if (error instanceof EntryPointMissingError) return 'missing_entry_point';
  if (error instanceof EntryPointNotCallableError) return 'not_callable';
  if (error instanceof InvalidMetadataError) return 'invalid_metadata';
  return 'load_exception';
}

function loadExceptionTrace(error: unknown): string | undefined {
  const origin = error instanceof ToolhostError ? error.cause : error;
  return origin instanceof Error ? errorTrace(origin) : undefined;
}

export function toLoadError(candidate: string, error: unknown): LoadError {
  const kind = loadErrorKind(error);
  const message = error instanceof ToolhostError
    ? error.message
    : `Failed to load '${candidate}': ${errorMessage(error)}`;
  const trace = kind === 'load_exception' ? loadExceptionTrace(error) : undefined;
  return Object.freeze(trace === undefined ? { candidate, kind, message } : { candidate, kind, message, trace });
}

/**
 * Validate an already-resolved unit object and attach its metadata. Shared by
 * the directory source and by sources that hold unit objects in memory.
 */
export function buildUnit(
  unit: object,
  candidate: Candidate,
  options: ScanOptions,
  fileMeta: Record<string, unknown> = {},
): LoadOutcome {
  const check = validateUnit(unit, candidate.name);
  if (!check.valid) {
    return { ok: false, error: toLoadError(candidate.name, check.error) };
  }

  try {
    const metadata = extractMetadata(unit, candidate.name, options, fileMeta);
    return {
      ok: true,
      unit: Object.freeze({
        ...metadata,
        candidate: candidate.name,
        filePath: candidate.filePath,
        run: check.run,
      }),
    };
  } catch (e) {
    return { ok: false, error: toLoadError(candidate.name, e) };
  }
}

export async function loadCandidate(candidate: Candidate, options: ScanOptions): Promise<LoadOutcome> {
  let unit: Record<string, unknown>;
  try {
    unit = await resolveUnit(candidate);
  } catch (e) {
    return { ok: false, error: toLoadError(candidate.name, e) };
  }

  let fileMeta: Record<string, unknown> = {};
  if (candidate.metaPath !== null) {
    try {
      fileMeta = loadMetadataFile(candidate.metaPath, candidate.name);
    } catch (e) {
      return { ok: false, error: toLoadError(candidate.name, e) };
    }
  }

  return buildUnit(unit, candidate, options, fileMeta);
}

/** Units found as `<prefix>*<suffix>` files directly under one directory. */
export class DirectoryUnitSource implements UnitSource {
  readonly root: string;
  private _options: ScanOptions;

  constructor(root: string, options: ScanOptions) {
    this.root = root;
    this._options = { prefix: options.prefix, suffix: options.suffix };
  }

  listCandidates(): Candidate[] {
    return scanUnits(this.root, this._options);
  }

  load(candidate: Candidate): Promise<LoadOutcome> {
    return loadCandidate(candidate, this._options);
  }
}

/**
 * Units registered in code rather than found on disk. Registration order is the
 * scan order, so a later registration under the same display name wins.
 */
export class InMemoryUnitSource implements UnitSource {
  private _entries: Array<{ candidate: Candidate; unit: object }> = [];
  private _options: ScanOptions;

  constructor(options: ScanOptions) {
    this._options = { prefix: options.prefix, suffix: options.suffix };
  }

  register(name: string, unit: object): this {
    this._entries.push({ candidate: { name, filePath: name, metaPath: null }, unit });
    return this;
  }

  listCandidates(): Candidate[] {
    return this._entries.map((entry) => entry.candidate);
  }

  async load(candidate: Candidate): Promise<LoadOutcome> {
    const entry = this._entries.find((e) => e.candidate === candidate);
    if (entry === undefined) {
      return { ok: false, error: toLoadError(candidate.name, new UnitLoadError(candidate.name, 'not registered')) };
    }
    return buildUnit(entry.unit, candidate, this._options);
  }
}
