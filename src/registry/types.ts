/**
 * Registry types: Candidate, UnitMetadata, LoadedUnit, LoadError.
 */

import type { UnitRun } from '../unit.js';

export interface Candidate {
  /** Directory entry name, e.g. `code10.js`. */
  name: string;
  filePath: string;
  /** Companion `<stem>_meta.yaml`, when one sits next to the candidate. */
  metaPath: string | null;
}

export interface UnitMetadata {
  displayName: string;
  description: string;
  order: number;
  numericId: number;
}

export interface LoadedUnit extends UnitMetadata {
  readonly candidate: string;
  readonly filePath: string;
  readonly run: UnitRun;
}

export type LoadErrorKind = 'load_exception' | 'missing_entry_point' | 'not_callable' | 'invalid_metadata';

export interface LoadError {
  readonly candidate: string;
  readonly kind: LoadErrorKind;
  readonly message: string;
  /** Stack of the underlying failure, kept for load exceptions that carry one. */
  readonly trace?: string;
}

export type LoadOutcome =
  | { ok: true; unit: LoadedUnit }
  | { ok: false; error: LoadError };

/** Where candidates come from and how each one is turned into a unit object. */
export interface UnitSource {
  listCandidates(): Candidate[] | Promise<Candidate[]>;
  load(candidate: Candidate): Promise<LoadOutcome>;
}
