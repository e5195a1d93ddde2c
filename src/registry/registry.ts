/**
 * The unit registry: display name → unit in display order, plus load errors.
 */

import { UnitNotFoundError } from '../errors.js';
import { ContextLogger, silentLogger } from '../observability/context-logger.js';
import { toLoadError } from './loader.js';
import { DEFAULT_ORDERING_POLICY, sortUnits, type OrderingPolicy } from './ordering.js';
import type { LoadError, LoadedUnit, LoadOutcome, UnitSource } from './types.js';

export type ReplaceCallback = (replaced: LoadedUnit, by: LoadedUnit) => void;

/**
 * Read-only once constructed. Units are inserted in scan order; when two share a
 * display name the later one replaces the earlier (last-write-wins) and no load
 * error is recorded for the replaced one. Ordering is applied after insertion.
 */
export class UnitRegistry {
  readonly policy: OrderingPolicy;
  private readonly _units: ReadonlyMap<string, LoadedUnit>;
  private readonly _errors: readonly LoadError[];

  constructor(options?: {
    units?: Iterable<LoadedUnit>;
    errors?: Iterable<LoadError>;
    policy?: OrderingPolicy;
    onReplace?: ReplaceCallback;
  }) {
    this.policy = options?.policy ?? DEFAULT_ORDERING_POLICY;

    const byName = new Map<string, LoadedUnit>();
    for (const unit of options?.units ?? []) {
      const previous = byName.get(unit.displayName);
      if (previous !== undefined) options?.onReplace?.(previous, unit);
      byName.set(unit.displayName, unit);
    }

    const ordered = new Map<string, LoadedUnit>();
    for (const unit of sortUnits(byName.values(), this.policy)) {
      ordered.set(unit.displayName, unit);
    }
    this._units = ordered;
    this._errors = Object.freeze([...(options?.errors ?? [])]);
  }

  get(displayName: string): LoadedUnit | null {
    return this._units.get(displayName) ?? null;
  }

  require(displayName: string): LoadedUnit {
    const unit = this._units.get(displayName);
    if (unit === undefined) {
      throw new UnitNotFoundError(displayName);
    }
    return unit;
  }

  has(displayName: string): boolean {
    return this._units.has(displayName);
  }

  get size(): number {
    return this._units.size;
  }

  get isEmpty(): boolean {
    return this._units.size === 0;
  }

  /** Display names in display order. */
  get names(): string[] {
    return [...this._units.keys()];
  }

  list(): LoadedUnit[] {
    return [...this._units.values()];
  }

  entries(): IterableIterator<[string, LoadedUnit]> {
    return this._units.entries();
  }

  get errors(): readonly LoadError[] {
    return this._errors;
  }
}

/**
 * Run one discovery pass over a source. Listing failures propagate; every
 * per-candidate failure ends up in `errors` and discovery moves on.
 */
export async function buildRegistry(
  source: UnitSource,
  options?: { policy?: OrderingPolicy; logger?: ContextLogger },
): Promise<UnitRegistry> {
  const logger = options?.logger ?? silentLogger();
  const candidates = await source.listCandidates();

  const units: LoadedUnit[] = [];
  const errors: LoadError[] = [];
  for (const candidate of candidates) {
    let outcome: LoadOutcome;
    try {
      outcome = await source.load(candidate);
    } catch (e) {
      outcome = { ok: false, error: toLoadError(candidate.name, e) };
    }

    if (outcome.ok) {
      units.push(outcome.unit);
    } else {
      errors.push(outcome.error);
      const { candidate: name, kind, message, trace } = outcome.error;
      logger.warn('Unit failed to load', trace === undefined
        ? { candidate: name, kind, reason: message }
        : { candidate: name, kind, reason: message, trace });
    }
  }

  const registry = new UnitRegistry({
    units,
    errors,
    policy: options?.policy,
    onReplace: (replaced, by) => {
      logger.debug('Display name collision, later candidate replaces earlier', {
        display_name: by.displayName,
        replaced: replaced.candidate,
        by: by.candidate,
      });
    },
  });

  logger.info('Unit discovery complete', {
    candidates: candidates.length,
    loaded: registry.size,
    errors: errors.length,
    policy: registry.policy,
  });
  return registry;
}
