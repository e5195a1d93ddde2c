/**
 * Entry-point validation for resolved unit objects.
 *
 * A missing `run` and a `run` that is not a function are reported as separate
 * errors so that the operator can tell a typo in the export name apart from an
 * export of the wrong kind.
 */

import { EntryPointMissingError, EntryPointNotCallableError } from '../errors.js';
import type { UnitRun } from '../unit.js';
import { describeType } from '../utils/index.js';

export const ENTRY_POINT = 'run';

export type EntryPointCheck =
  | { valid: true; run: UnitRun }
  | { valid: false; error: EntryPointMissingError | EntryPointNotCallableError };

export function validateUnit(unit: object, candidate: string): EntryPointCheck {
  const run: unknown = Reflect.get(unit, ENTRY_POINT);
  if (run === undefined) {
    return { valid: false, error: new EntryPointMissingError(candidate) };
  }
  if (typeof run !== 'function') {
    return { valid: false, error: new EntryPointNotCallableError(candidate, describeType(run)) };
  }
  // keep `this` bound to the unit object for class-style units
  return { valid: true, run: () => Reflect.apply(run, unit, []) };
}
