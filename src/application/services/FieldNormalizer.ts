/**
 * Field Normalizer
 * Layer: Application
 *
 * Turns the field list of an Affinity list entry into:
 *
 *   1. a NormalizedFieldSet: field id → { id, name, source, type, data },
 *      with data coerced per type tag (see fieldCoercions.ts) and fields
 *      whose data is null left out entirely;
 *   2. a CompanySummary: a fixed-shape digest built by looking up the
 *      configured well-known field ids in that set.
 *
 * Neither step throws. An uninterpretable value is passed through, an empty
 * one is dropped, and every summary entry has a default.
 */
import { coerceFieldData } from '@application/normalizers/fieldCoercions';
import { TOKENS } from '@core/types';
import type { CompanySummary, SummaryFieldIds } from '@domain/entities/CompanySummary';
import type {
  FieldRecord,
  LocationRaw,
  NormalizedField,
  NormalizedFieldSet,
} from '@domain/entities/FieldRecord';
import { getProperty, isObject, isString, stringOrNull } from '@shared/typeGuards';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

const fieldRecordSchema = z.object({
  id: z.string(),
  name: z.string().nullable().optional(),
  enrichmentSource: z.string().nullable().optional(),
  value: z
    .object({
      type: z.string().nullable().optional(),
      data: z.unknown(),
    })
    .nullable()
    .optional(),
});

/**
 * Validate one raw API item as a FieldRecord; null only when it has no
 * string id. A missing `value` envelope reads as absent data.
 */
export function parseFieldRecord(item: unknown): FieldRecord | null {
  const parsed = fieldRecordSchema.safeParse(item);
  if (!parsed.success) return null;

  const { id, name, enrichmentSource, value } = parsed.data;
  return {
    id,
    name: name ?? null,
    enrichmentSource: enrichmentSource ?? null,
    value: { type: value?.type ?? '', data: value?.data ?? null },
  };
}

@injectable()
export class FieldNormalizer {
  constructor(@inject(TOKENS.SummaryFieldIds) private fieldIds: SummaryFieldIds) {}

  normalizeField(record: FieldRecord): NormalizedField | null {
    const { data, type } = record.value;
    if (data === null || data === undefined) return null;

    return {
      id: record.id,
      name: record.name,
      source: record.enrichmentSource,
      type,
      data: coerceFieldData(type, data),
    };
  }

  normalize(records: FieldRecord[]): NormalizedFieldSet {
    const byId = new Map<string, NormalizedField>();
    for (const record of records) {
      const field = this.normalizeField(record);
      if (field) byId.set(field.id, field);
    }
    return Object.fromEntries(byId);
  }

  summarize(fields: NormalizedFieldSet, ids: SummaryFieldIds = this.fieldIds): CompanySummary {
    const dataOf = (id: string): unknown => (Object.hasOwn(fields, id) ? fields[id].data : null);
    const listOf = (id: string): unknown[] => toList(dataOf(id));

    const location = dataOf(ids.location);
    const locationStr = getProperty(location, 'location_str');

    return {
      companyUrls: {
        dealroom: dataOf(ids.dealroomUrl),
        linkedin: dataOf(ids.linkedinUrl),
      },
      description: dataOf(ids.description),
      industries: listOf(ids.industries),
      technologies: listOf(ids.technologies),
      businessModels: listOf(ids.businessModels),
      clientFocus: listOf(ids.clientFocus),
      ownershipTypes: listOf(ids.ownershipTypes),
      employeesRange: dataOf(ids.employeesRange),
      yearFounded: dataOf(ids.yearFounded),
      funding: {
        lastEur: dataOf(ids.lastFundingAmount),
        totalEur: dataOf(ids.totalFundingAmount),
      },
      location: toLocationRaw(getProperty(location, 'raw')),
      locationStr: isString(locationStr) ? locationStr : null,
    };
  }
}

function toList(value: unknown): unknown[] {
  if (value === null || value === undefined || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

function toLocationRaw(value: unknown): LocationRaw | null {
  if (!isObject(value)) return null;
  return {
    streetAddress: stringOrNull(value.streetAddress),
    city: stringOrNull(value.city),
    state: stringOrNull(value.state),
    country: stringOrNull(value.country),
    continent: stringOrNull(value.continent),
  };
}
