/**
 * Lazily built, build-once holder for the unit registry.
 *
 * A registry, once built, is kept for the lifetime of the cache; there is no
 * invalidation. Concurrent first callers share one in-flight build.
 */

import type { UnitRegistry } from './registry.js';

export type RegistryBuilder = () => Promise<UnitRegistry>;

export class RegistryCache {
  private _build: RegistryBuilder;
  private _registry: UnitRegistry | null = null;
  private _pending: Promise<UnitRegistry> | null = null;
  private _buildCount = 0;

  constructor(build: RegistryBuilder) {
    this._build = build;
  }

  /**
   * The registry, building it on first call. A failed build is handed to every
   * caller that was waiting on it and is not kept, so a later call tries again.
   */
  get(): Promise<UnitRegistry> {
    if (this._registry !== null) {
      return Promise.resolve(this._registry);
    }
    if (this._pending === null) {
      this._buildCount++;
      const pending = this._run();
      this._pending = pending;
      const settle = (): void => {
        if (this._pending === pending) this._pending = null;
      };
      void pending.then(settle, settle);
    }
    return this._pending;
  }

  /** The registry if it has been built, without triggering a build. */
  peek(): UnitRegistry | null {
    return this._registry;
  }

  get isReady(): boolean {
    return this._registry !== null;
  }

  /** Number of builds started, successful or not. */
  get buildCount(): number {
    return this._buildCount;
  }

  private async _run(): Promise<UnitRegistry> {
    const registry = await this._build();
    this._registry = registry;
    return registry;
  }
}
