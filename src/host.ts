/**
 * ToolHost: owns the registry cache and dispatcher for the process lifetime.
 */

import { Config, type HostSettings } from './config.js';
import { Dispatcher, type DispatchResult } from './dispatcher.js';
import { InvalidInputError } from './errors.js';
import { ContextLogger } from './observability/context-logger.js';
import { RegistryCache } from './registry/cache.js';
import { DirectoryUnitSource } from './registry/loader.js';
import { buildRegistry, type UnitRegistry } from './registry/registry.js';
import type { LoadedUnit, UnitSource } from './registry/types.js';
import { formatLoadError, noUnitsGuidance } from './report.js';

export interface ToolHostOptions {
  config?: Config | null;
  /** YAML file read when no `config` is given. */
  configPath?: string | null;
  /** Overrides applied on top of the configuration. */
  settings?: Partial<HostSettings>;
  logger?: ContextLogger;
  /** Replaces the directory scan, e.g. with an InMemoryUnitSource. */
  source?: UnitSource;
}

export interface UnitSummary {
  displayName: string;
  description: string;
  order: number;
  numericId: number;
  file: string;
}

function summarize(unit: LoadedUnit): UnitSummary {
  return {
    displayName: unit.displayName,
    description: unit.description,
    order: unit.order,
    numericId: unit.numericId,
    file: unit.candidate,
  };
}

function resolveConfig(options: ToolHostOptions): Config {
  if (options.config && options.configPath) {
    throw new InvalidInputError('Cannot specify both config and configPath');
  }
  if (options.config) return options.config;
  if (options.configPath) return Config.load(options.configPath);
  return new Config();
}

function applyOverrides(base: HostSettings, overrides: Partial<HostSettings> = {}): HostSettings {
  return {
    root: overrides.root ?? base.root,
    prefix: overrides.prefix ?? base.prefix,
    suffix: overrides.suffix ?? base.suffix,
    ordering: overrides.ordering ?? base.ordering,
    logLevel: overrides.logLevel ?? base.logLevel,
    logFormat: overrides.logFormat ?? base.logFormat,
  };
}

export class ToolHost {
  readonly settings: HostSettings;
  readonly logger: ContextLogger;
  private _cache: RegistryCache;
  private _dispatcher: Dispatcher;

  constructor(options: ToolHostOptions = {}) {
    this.settings = applyOverrides(resolveConfig(options).hostSettings(), options.settings);
    this.logger = options.logger ?? new ContextLogger({
      name: 'toolhost',
      level: this.settings.logLevel,
      format: this.settings.logFormat,
    });

    const scanOptions = { prefix: this.settings.prefix, suffix: this.settings.suffix };
    const source = options.source ?? new DirectoryUnitSource(this.settings.root, scanOptions);
    const registryLogger = this.logger.child({}, 'toolhost.registry');
    this._cache = new RegistryCache(() =>
      buildRegistry(source, { policy: this.settings.ordering, logger: registryLogger }),
    );
    this._dispatcher = new Dispatcher({
      logger: this.logger.child({}, 'toolhost.dispatcher'),
      guidance: noUnitsGuidance(scanOptions),
    });
  }

  /** Built on first use and kept for the lifetime of the host. Scan failures reject. */
  registry(): Promise<UnitRegistry> {
    return this._cache.get();
  }

  get discoveryCount(): number {
    return this._cache.buildCount;
  }

  async listUnits(): Promise<UnitSummary[]> {
    const registry = await this.registry();
    return registry.list().map(summarize);
  }

  /** Summary of one unit, or null when no loaded unit has that display name. */
  async describeUnit(displayName: string): Promise<UnitSummary | null> {
    const registry = await this.registry();
    const unit = registry.get(displayName);
    return unit === null ? null : summarize(unit);
  }

  /** Load errors with a prefix per kind, in scan order. */
  async loadErrors(): Promise<string[]> {
    const registry = await this.registry();
    return registry.errors.map(formatLoadError);
  }

  async dispatch(selection: string | null): Promise<DispatchResult> {
    const registry = await this.registry();
    return this._dispatcher.dispatch(registry, selection);
  }
}
