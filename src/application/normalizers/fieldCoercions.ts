/**
 * Field Value Coercions
 * Layer: Application
 *
 * Affinity tags every field value with a type. Most pass through untouched;
 * the tags listed in FIELD_COERCIONS get reshaped. Adding a tag means adding
 * a key to CoercedFieldType and the compiler insists on its coercion.
 *
 * A coercion never throws: anything it cannot interpret comes back as given.
 */
import type { LocationRaw, NormalizedLocation } from '@domain/entities/FieldRecord';
import { isObject, stringOrNull } from '@shared/typeGuards';

export type CoercedFieldType = 'number' | 'location';

type Coercion = (data: unknown) => unknown;

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Numbers and numeric strings become numbers; "42" → 42, "42.5" → 42.5.
 * Non-numeric input ("abc", objects, booleans) is returned unchanged, and so
 * is an integer string beyond Number.MAX_SAFE_INTEGER, which a number could
 * not hold exactly.
 */
export function coerceNumber(data: unknown): unknown {
  if (typeof data === 'number') return data;
  if (typeof data !== 'string') return data;

  const trimmed = data.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return data;

  const parsed = Number(trimmed);
  if (INTEGER_PATTERN.test(trimmed) && !Number.isSafeInteger(parsed)) return data;
  return Number.isFinite(parsed) ? parsed : data;
}

/** Restructure a location payload into `{ raw, location_str }`. */
export function coerceLocation(data: unknown): unknown {
  if (!isObject(data)) return data;

  const raw: LocationRaw = {
    streetAddress: stringOrNull(data.streetAddress),
    city: stringOrNull(data.city),
    state: stringOrNull(data.state),
    country: stringOrNull(data.country),
    continent: stringOrNull(data.continent),
  };

  const location: NormalizedLocation = {
    raw,
    location_str: formatLocation(raw),
  };
  return location;
}

/** "City, State, Country", skipping empty parts; "" when all are empty. */
export function formatLocation(raw: LocationRaw): string {
  return [raw.city, raw.state, raw.country].filter((part) => part).join(', ');
}

export const FIELD_COERCIONS: { readonly [K in CoercedFieldType]: Coercion } = {
  number: coerceNumber,
  location: coerceLocation,
};

export function isCoercedFieldType(type: string): type is CoercedFieldType {
  return Object.prototype.hasOwnProperty.call(FIELD_COERCIONS, type);
}

export function coerceFieldData(type: string, data: unknown): unknown {
  return isCoercedFieldType(type) ? FIELD_COERCIONS[type](data) : data;
}
