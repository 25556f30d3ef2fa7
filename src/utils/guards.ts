/**
 * Narrowing helpers for values read from YAML, JSON, or thrown by
 * arbitrary operations.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a property from an unknown value without assuming its shape
 */
export function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}

export function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  const message = readProperty(value, 'message');
  return new Error(typeof message === 'string' ? message : stringify(value));
}

function stringify(value: unknown): string {
  try {
    return String(value);
  } catch {
    // null-prototype objects and throwing toString()
    return Object.prototype.toString.call(value);
  }
}
