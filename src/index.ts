/**
 * toolhost - discover, order and dispatch independently authored tool units.
 */

// Core
export { ToolHost } from './host.js';
export type { ToolHostOptions, UnitSummary } from './host.js';
export { Dispatcher, describeFailure } from './dispatcher.js';
export type { DispatchResult, DispatchFailureReport, DispatcherOptions } from './dispatcher.js';

// Unit contract
export { defineUnit, DEFAULT_UNIT_ORDER, DEFAULT_NUMERIC_ID } from './unit.js';
export type { UnitDefinition, UnitRun } from './unit.js';

// Config
export {
  Config,
  HostSettingsSchema,
  OrderingPolicySchema,
  DEFAULT_UNITS_ROOT,
  DEFAULT_UNIT_PREFIX,
  DEFAULT_UNIT_SUFFIX,
} from './config.js';
export type { HostSettings } from './config.js';

// Errors
export {
  ErrorCodes,
  ToolhostError,
  ConfigNotFoundError,
  ConfigError,
  ScanError,
  UnitLoadError,
  EntryPointMissingError,
  EntryPointNotCallableError,
  InvalidMetadataError,
  UnitNotFoundError,
  InvalidInputError,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Registry
export * from './registry/index.js';

// Operator output
export { formatLoadError, formatFailureReport, noUnitsGuidance, LOAD_ERROR_PREFIXES, REMEDIATION_HINT } from './report.js';

// Observability
export { ContextLogger, silentLogger } from './observability/context-logger.js';
export type { LogLevel, LogFormat, WritableOutput, LoggerBindings, ContextLoggerOptions } from './observability/context-logger.js';

export const VERSION = '0.1.0';
