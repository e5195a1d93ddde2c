/**
 * Error hierarchy for toolhost.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  SCAN_FAILED: 'SCAN_FAILED',
  UNIT_LOAD_ERROR: 'UNIT_LOAD_ERROR',
  ENTRY_POINT_MISSING: 'ENTRY_POINT_MISSING',
  ENTRY_POINT_NOT_CALLABLE: 'ENTRY_POINT_NOT_CALLABLE',
  INVALID_METADATA: 'INVALID_METADATA',
  UNIT_NOT_FOUND: 'UNIT_NOT_FOUND',
  INVALID_INPUT: 'INVALID_INPUT',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ToolhostError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ToolhostError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = options?.suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends ToolhostError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_NOT_FOUND, `Configuration file not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends ToolhostError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_INVALID, message, {}, options);
    this.name = 'ConfigError';
  }
}

/**
 * The units directory could not be listed. Fatal to discovery: it means the
 * host itself is misconfigured, so it is never turned into a LoadError.
 */
export class ScanError extends ToolhostError {
  constructor(root: string, options?: ErrorOptions) {
    super(
      ErrorCodes.SCAN_FAILED,
      `Cannot list units directory: ${root}${options?.cause ? ` (${options.cause.message})` : ''}`,
      { root },
      options,
    );
    this.name = 'ScanError';
  }

  get root(): string {
    return String(this.details['root']);
  }
}

export class UnitLoadError extends ToolhostError {
  constructor(candidate: string, reason: string, options?: ErrorOptions) {
    super(ErrorCodes.UNIT_LOAD_ERROR, `Failed to load '${candidate}': ${reason}`, { candidate, reason }, options);
    this.name = 'UnitLoadError';
  }
}

export class EntryPointMissingError extends ToolhostError {
  constructor(candidate: string, options?: ErrorOptions) {
    super(
      ErrorCodes.ENTRY_POINT_MISSING,
      `Unit '${candidate}' missing required 'run()' function`,
      { candidate },
      options,
    );
    this.name = 'EntryPointMissingError';
  }
}

export class EntryPointNotCallableError extends ToolhostError {
  constructor(candidate: string, actualType: string, options?: ErrorOptions) {
    super(
      ErrorCodes.ENTRY_POINT_NOT_CALLABLE,
      `Unit '${candidate}' has 'run' but it is not callable (got ${actualType})`,
      { candidate, actualType },
      options,
    );
    this.name = 'EntryPointNotCallableError';
  }
}

export class InvalidMetadataError extends ToolhostError {
  constructor(candidate: string, reason: string, options?: ErrorOptions) {
    super(ErrorCodes.INVALID_METADATA, `Unit '${candidate}' declares invalid metadata: ${reason}`, { candidate, reason }, options);
    this.name = 'InvalidMetadataError';
  }
}

export class UnitNotFoundError extends ToolhostError {
  constructor(displayName: string, options?: ErrorOptions) {
    super(ErrorCodes.UNIT_NOT_FOUND, `Unit not found: ${displayName}`, { displayName }, options);
    this.name = 'UnitNotFoundError';
  }
}

export class InvalidInputError extends ToolhostError {
  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super(ErrorCodes.INVALID_INPUT, message, {}, options);
    this.name = 'InvalidInputError';
  }
}
