/**
 * Type guards for walking JSON of unknown shape without `as` casts.
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

/** The array itself, or an empty array for anything else. */
export function arrayOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** `value[key]` when `value` is an object, otherwise undefined. */
export function getProperty(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

export function stringOrNull(value: unknown): string | null {
  return isString(value) ? value : null;
}
