/**
 * Runtime readers for untyped payloads (vector index payloads, JSON bodies).
 *
 * Each function checks the runtime type of an unknown value and returns a
 * typed result, falling back when a fallback is given or throwing a
 * TypeError otherwise.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function safeString(value: unknown, fallback?: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected string, got ${typeof value}`);
}

/** Non-empty string, or undefined. */
export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function safeNumber(value: unknown, fallback?: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected number, got ${typeof value}`);
}

/** Accepts booleans and the strings "true"/"false". */
export function safeBoolean(value: unknown, fallback = false): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

/** ISO date string or epoch milliseconds; anything unparseable is undefined. */
export function optionalDate(value: unknown): Date | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Safely extract a string that must be one of the allowed values.
 * Returns the value if it matches, the fallback if provided, or throws.
 */
export function safeStringUnion<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback?: T,
): T {
  if (typeof value === 'string') {
    const matched = allowed.find((item) => item === value);
    if (matched !== undefined) {
      return matched;
    }
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(
    `Expected one of [${allowed.join(', ')}], got ${typeof value === 'string' ? `"${value}"` : typeof value}`,
  );
}
