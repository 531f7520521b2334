/**
 * Field Record & Normalized Field Entities
 * Layer: Domain
 *
 * A FieldRecord is one attribute of an Affinity entity as the v2 API returns
 * it from `/lists/{listId}/list-entries/{entryId}/fields`:
 *
 *   { id: 'dealroom-location', name: 'Location', enrichmentSource: 'dealroom',
 *     value: { type: 'location', data: { city: 'Paris', ... } } }
 *
 * The normalizer turns each one into a NormalizedField, keyed by id in a
 * NormalizedFieldSet. A NormalizedField never holds null data: such records,
 * including ones that arrive without a `value` envelope, are dropped during
 * normalization.
 */
export interface FieldValue {
  type: string;
  data: unknown;
}

export interface FieldRecord {
  id: string;
  name: string | null;
  enrichmentSource: string | null;
  value: FieldValue;
}

export interface NormalizedField {
  id: string;
  name: string | null;
  source: string | null;
  type: string;
  data: unknown;
}

export type NormalizedFieldSet = Record<string, NormalizedField>;

export interface LocationRaw {
  streetAddress: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  continent: string | null;
}

/** `data` of a normalized `location` field. */
export interface NormalizedLocation {
  raw: LocationRaw;
  location_str: string;
}

/**
 * Outcome of a single-field write; failures keep the response for diagnostics.
 * `status` is null when no response arrived (timeout, transport failure) and
 * `body` then carries the error message.
 */
export type FieldUpdateResult =
  | { success: true }
  | { success: false; status: number | null; body: string };
