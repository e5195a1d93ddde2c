/**
 * Dispatcher: invokes the selected unit's `run` once per request cycle.
 *
 * Failures raised by `run` stop here. They come back as a structured report and
 * the unit stays selectable for the next cycle. No timeout or cancellation is
 * applied; a unit that never settles keeps its cycle waiting.
 */

import { v4 as uuidv4 } from 'uuid';
import { ContextLogger, silentLogger } from './observability/context-logger.js';
import type { UnitRegistry } from './registry/registry.js';
import { REMEDIATION_HINT } from './report.js';
import { describeType, errorTrace, safeString } from './utils/index.js';

export interface DispatchFailureReport {
  unit: string;
  candidate: string;
  /** Class name of the thrown error, or the type of a thrown non-Error value. */
  errorKind: string;
  message: string;
  trace: string;
  hint: string;
  traceId: string;
}

export type DispatchResult =
  | { status: 'empty'; guidance: string }
  | { status: 'not_found'; selection: string; available: string[] }
  | { status: 'ok'; unit: string; traceId: string; durationMs: number }
  | { status: 'failed'; report: DispatchFailureReport; durationMs: number };

export interface DispatcherOptions {
  logger?: ContextLogger;
  /** Shown instead of dispatching when the registry holds no unit. */
  guidance?: string;
  hint?: string;
  traceIdFactory?: () => string;
}

export function describeFailure(thrown: unknown): { errorKind: string; message: string; trace: string } {
  if (thrown instanceof Error) {
    return {
      errorKind: describeType(thrown),
      message: thrown.message,
      trace: errorTrace(thrown),
    };
  }
  const text = safeString(thrown);
  return { errorKind: describeType(thrown), message: text, trace: text };
}

export class Dispatcher {
  private _logger: ContextLogger;
  private _guidance: string;
  private _hint: string;
  private _traceIdFactory: () => string;

  constructor(options?: DispatcherOptions) {
    this._logger = options?.logger ?? silentLogger();
    this._guidance = options?.guidance ?? 'No tool units available.';
    this._hint = options?.hint ?? REMEDIATION_HINT;
    this._traceIdFactory = options?.traceIdFactory ?? (() => uuidv4());
  }

  /**
   * Run the unit named by `selection`. A null selection picks the first unit in
   * display order. Never rejects because of anything the unit does.
   */
  async dispatch(registry: UnitRegistry, selection: string | null): Promise<DispatchResult> {
    if (registry.isEmpty) {
      return { status: 'empty', guidance: this._guidance };
    }

    const displayName = selection ?? registry.names[0];
    const unit = registry.get(displayName);
    if (unit === null) {
      this._logger.warn('Selection does not name a loaded unit', { selection: displayName });
      return { status: 'not_found', selection: displayName, available: registry.names };
    }

    const traceId = this._traceIdFactory();
    const logger = this._logger.child({ traceId, unit: unit.displayName });
    logger.debug('Unit run started', { candidate: unit.candidate });

    const start = performance.now();
    try {
      await unit.run();
    } catch (e) {
      const durationMs = performance.now() - start;
      const failure = describeFailure(e);
      logger.error('Unit run failed', {
        candidate: unit.candidate,
        error_kind: failure.errorKind,
        error_message: failure.message,
        duration_ms: durationMs,
      });
      return {
        status: 'failed',
        durationMs,
        report: {
          unit: unit.displayName,
          candidate: unit.candidate,
          ...failure,
          hint: this._hint,
          traceId,
        },
      };
    }

    const durationMs = performance.now() - start;
    logger.debug('Unit run completed', { candidate: unit.candidate, duration_ms: durationMs });
    return { status: 'ok', unit: unit.displayName, traceId, durationMs };
  }
}
