export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Human-readable type of a value, as shown in load and dispatch reports. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
  }
  return typeof value;
}

export function toError(value: unknown): Error | undefined {
  return value instanceof Error ? value : undefined;
}

const UNPRINTABLE = '<unprintable value>';

/**
 * String form of any value. Never throws, including for objects without a
 * prototype or whose `toString` throws.
 */
export function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    try {
      return Object.prototype.toString.call(value);
    } catch {
      return UNPRINTABLE;
    }
  }
}

/** Message of an Error, or the string form of any other thrown value. */
export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : safeString(value);
}

/** Stack of an Error, or its string form when the runtime gave it none. */
export function errorTrace(value: Error): string {
  return value.stack ?? safeString(value);
}
