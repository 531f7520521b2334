/**
 * Notion Property Codec
 * Layer: Application
 *
 * Notion wraps every property value in a per-type envelope, and the envelope
 * it returns on read differs from the one it accepts on write:
 *
 *   read   { type: 'title', title: [{ plain_text: 'Acme', ... }] }
 *   write  { title: [{ text: { content: 'Acme' } }] }
 *
 * PROPERTY_EXTRACTORS reduces a read envelope to a plain value;
 * PROPERTY_FORMATTERS builds a write envelope from one. Both are tables keyed
 * by a closed union of type tags, so a new tag is a new entry, not a new
 * branch at every call site.
 */
import { arrayOf, getProperty, isNumber, isObject, isString, stringOrNull } from '@shared/typeGuards';

export const READABLE_PROPERTY_TYPES = [
  'title',
  'rich_text',
  'number',
  'select',
  'multi_select',
  'date',
  'checkbox',
  'url',
  'email',
  'phone_number',
  'people',
  'files',
  'formula',
  'relation',
  'rollup',
] as const;

export const WRITABLE_PROPERTY_TYPES = [
  'title',
  'rich_text',
  'number',
  'select',
  'multi_select',
  'checkbox',
  'date',
  'url',
  'email',
  'phone_number',
] as const;

export type ReadablePropertyType = (typeof READABLE_PROPERTY_TYPES)[number];
export type WritablePropertyType = (typeof WRITABLE_PROPERTY_TYPES)[number];

export type PropertyPayload = Record<string, unknown>;

type Extractor = (payload: unknown) => unknown;
type Formatter = (value: unknown) => PropertyPayload;

const plainText = (item: unknown): string => stringOrNull(getProperty(item, 'plain_text')) ?? '';
const names = (payload: unknown): string[] =>
  arrayOf(payload)
    .map((item) => getProperty(item, 'name'))
    .filter(isString);

export const PROPERTY_EXTRACTORS: { readonly [K in ReadablePropertyType]: Extractor } = {
  title: (payload) => {
    const parts = arrayOf(payload);
    return parts.length > 0 ? plainText(parts[0]) : '';
  },
  rich_text: (payload) => arrayOf(payload).map(plainText).join(' '),
  number: (payload) => (isNumber(payload) ? payload : null),
  select: (payload) => stringOrNull(getProperty(payload, 'name')),
  multi_select: names,
  date: (payload) => stringOrNull(getProperty(payload, 'start')),
  checkbox: (payload) => payload === true,
  url: stringOrNull,
  email: stringOrNull,
  phone_number: stringOrNull,
  people: names,
  files: names,
  formula: (payload) => {
    const text = getProperty(payload, 'string');
    if (isString(text) && text !== '') return text;
    return getProperty(payload, 'number') ?? null;
  },
  relation: (payload) => arrayOf(payload).length,
  rollup: (payload) => {
    const value = getProperty(payload, 'number');
    if (isNumber(value) && value !== 0) return value;
    return arrayOf(getProperty(payload, 'array'));
  },
};

const textEnvelope = (key: string) => (value: unknown): PropertyPayload => ({
  [key]: [{ text: { content: String(value) } }],
});

export const PROPERTY_FORMATTERS: { readonly [K in WritablePropertyType]: Formatter } = {
  title: textEnvelope('title'),
  rich_text: textEnvelope('rich_text'),
  number: (value) => ({ number: value }),
  select: (value) => ({ select: { name: String(value) } }),
  multi_select: (value) => ({
    multi_select: (Array.isArray(value) ? value : [value]).map((item) => ({ name: String(item) })),
  }),
  checkbox: (value) => ({ checkbox: Boolean(value) }),
  date: (value) => ({ date: { start: String(value) } }),
  url: (value) => ({ url: String(value) }),
  email: (value) => ({ email: String(value) }),
  phone_number: (value) => ({ phone_number: String(value) }),
};

function isReadableType(type: string): type is ReadablePropertyType {
  return Object.prototype.hasOwnProperty.call(PROPERTY_EXTRACTORS, type);
}

function isWritableType(type: string): type is WritablePropertyType {
  return Object.prototype.hasOwnProperty.call(PROPERTY_FORMATTERS, type);
}

/**
 * Plain value of a property as returned on a page. Unknown types fall back
 * to the text form of their payload.
 */
export function extractPropertyValue(property: unknown): unknown {
  const type = getProperty(property, 'type');
  if (!isString(type)) return null;

  const payload = getProperty(property, type);
  if (isReadableType(type)) {
    return PROPERTY_EXTRACTORS[type](payload);
  }
  if (isObject(payload) || Array.isArray(payload)) {
    return JSON.stringify(payload);
  }
  return payload === null || payload === undefined ? '' : String(payload);
}

/** Write envelope for a value, or null when there is nothing to write. Unknown types are written as rich text. */
export function formatPropertyValue(type: string, value: unknown): PropertyPayload | null {
  if (value === null || value === undefined) return null;
  const formatter = isWritableType(type) ? PROPERTY_FORMATTERS[type] : PROPERTY_FORMATTERS.rich_text;
  return formatter(value);
}
