/**
 * Notion Input Conversion
 * Layer: Application
 *
 * Converts the text a user typed for a property into the typed value the
 * property codec formats, checking it against the property's type and, for
 * select / multi_select, its allowed options. An empty entry means "leave
 * unset" (null), except for checkboxes where it means false.
 */
import { NOTION_READ_ONLY_TYPES } from '@shared/constants';

export type ConversionResult = { ok: true; value: unknown } | { ok: false; error: string };

const TRUE_WORDS = ['true', 't', 'yes', 'y', '1', 'on'];
const FALSE_WORDS = ['false', 'f', 'no', 'n', '0', 'off', ''];

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const ok = (value: unknown): ConversionResult => ({ ok: true, value });
const fail = (error: string): ConversionResult => ({ ok: false, error });

export function isReadOnlyType(type: string): boolean {
  return NOTION_READ_ONLY_TYPES.some((readOnly) => readOnly === type);
}

export function convertPropertyInput(
  raw: string,
  type: string,
  options: string[] | null = null,
): ConversionResult {
  const value = raw.trim();

  if (isReadOnlyType(type)) {
    return fail(`${type} is read-only and cannot be edited`);
  }
  if (value === '' && type !== 'checkbox') {
    return ok(null);
  }

  switch (type) {
    case 'title':
    case 'rich_text':
    case 'phone_number':
      return ok(value);

    case 'number':
      if (INTEGER_PATTERN.test(value)) return ok(Number.parseInt(value, 10));
      if (DECIMAL_PATTERN.test(value)) return ok(Number.parseFloat(value));
      return fail('Must be a number');

    case 'checkbox': {
      const word = value.toLowerCase();
      if (TRUE_WORDS.includes(word)) return ok(true);
      if (FALSE_WORDS.includes(word)) return ok(false);
      return fail('Enter yes/no, true/false, or 1/0');
    }

    case 'select':
      if (!options || options.length === 0 || options.includes(value)) return ok(value);
      return fail(`Must be one of: ${options.join(', ')}`);

    case 'multi_select': {
      const selected = value.split(',').map((item) => item.trim());
      if (options && options.length > 0) {
        const invalid = selected.filter((item) => !options.includes(item));
        if (invalid.length > 0) {
          return fail(`Invalid options: ${invalid.join(', ')}. Available: ${options.join(', ')}`);
        }
      }
      return ok(selected);
    }

    case 'date':
      if (!DATE_PATTERN.test(value)) return fail('Use YYYY-MM-DD format (e.g., 2024-03-20)');
      return isCalendarDate(value) ? ok(value) : fail('Invalid date format');

    case 'url':
      return /^https?:\/\//.test(value) ? ok(value) : fail('Must start with http:// or https://');

    case 'email':
      return value.includes('@') && value.includes('.')
        ? ok(value)
        : fail('Must be a valid email address');

    default:
      return ok(value);
  }
}

/** True when YYYY-MM-DD names a real day (rejects 2024-02-30). */
function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}
