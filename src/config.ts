/**
 * Configuration accessor with dot-path key support, plus host settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError, ConfigNotFoundError } from './errors.js';
import { collectSchemaErrors } from './schema.js';
import { isRecord, toError } from './utils/index.js';

export const DEFAULT_UNITS_ROOT = './units';
export const DEFAULT_UNIT_PREFIX = 'code';
export const DEFAULT_UNIT_SUFFIX = '.js';

export const OrderingPolicySchema = Type.Union([Type.Literal('numeric-id'), Type.Literal('priority')]);

export const HostSettingsSchema = Type.Object({
  root: Type.String({ minLength: 1 }),
  prefix: Type.String({ minLength: 1 }),
  suffix: Type.String({ minLength: 1 }),
  ordering: OrderingPolicySchema,
  logLevel: Type.Union([
    Type.Literal('trace'),
    Type.Literal('debug'),
    Type.Literal('info'),
    Type.Literal('warn'),
    Type.Literal('error'),
    Type.Literal('fatal'),
  ]),
  logFormat: Type.Union([Type.Literal('json'), Type.Literal('text')]),
});

export type HostSettings = Static<typeof HostSettingsSchema>;

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /** Read a YAML configuration file. An empty file yields an empty config. */
  static load(configPath: string): Config {
    if (!existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    const content = readFileSync(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file: ${configPath}`, { cause: toError(e) });
    }

    if (parsed === null || parsed === undefined) return new Config();
    if (!isRecord(parsed)) {
      throw new ConfigError(`Configuration file must be a YAML mapping: ${configPath}`);
    }
    return new Config(parsed);
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  /**
   * Resolve the `units.*` and `logging.*` sections into validated host settings.
   * Throws ConfigError naming every offending key.
   */
  hostSettings(): HostSettings {
    const candidate = {
      root: this.get('units.root', DEFAULT_UNITS_ROOT),
      prefix: this.get('units.prefix', DEFAULT_UNIT_PREFIX),
      suffix: this.get('units.suffix', DEFAULT_UNIT_SUFFIX),
      ordering: this.get('units.ordering', 'numeric-id'),
      logLevel: this.get('logging.level', 'info'),
      logFormat: this.get('logging.format', 'json'),
    };

    if (!Value.Check(HostSettingsSchema, candidate)) {
      const errors = collectSchemaErrors(HostSettingsSchema, candidate);
      throw new ConfigError(`Invalid host settings: ${errors.join('; ')}`);
    }
    return candidate;
  }
}
