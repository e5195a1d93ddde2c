/**
 * Structured logging for the host: JSON or text lines to a pluggable sink.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerBindings {
  traceId?: string | null;
  unit?: string | null;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export class ContextLogger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _traceId: string | null = null;
  private _unit: string | null = null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'toolhost';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    this._redactSensitive = options?.redactSensitive ?? true;
    // stderr keeps stdout free for whatever the units print
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  get level(): LogLevel {
    return this._level;
  }

  /** Derive a logger that stamps every entry with the given trace id and unit. */
  child(bindings: LoggerBindings, name?: string): ContextLogger {
    const logger = new ContextLogger({
      name: name ?? this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
    logger._traceId = bindings.traceId !== undefined ? bindings.traceId : this._traceId;
    logger._unit = bindings.unit !== undefined ? bindings.unit : this._unit;
    return logger;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isLevelEnabled(levelName)) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        trace_id: this._traceId,
        unit: this._unit,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const lvl = levelName.toUpperCase();
    const trace = this._traceId ?? 'none';
    const unit = this._unit ?? 'none';
    let extrasStr = '';
    if (redactedExtra) {
      extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${String(v)}`).join(' ');
    }
    this._output.write(`${ts} [${lvl}] [trace=${trace}] [unit=${unit}] ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

/** A logger that discards everything; the default for library callers that pass none. */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ level: 'fatal', output: { write: () => undefined } });
}
