import { ValidationError } from '@shared/errors/AppError';

const ID_PATTERN = /^[0-9a-f]{32}$/i;

/**
 * Database id from a Notion view URL. The 32 hex characters after `v=` are
 * regrouped 8-4-4-4-12:
 *
 *   1429989fe8ac4effbc8f57f56486db54 → 1429989f-e8ac-4eff-bc8f-57f56486db54
 */
export function extractIdFromUrl(url: string): string {
  const cleaned = url.trim().replace(/[-{}]/g, '');
  const marker = cleaned.lastIndexOf('v=');
  if (marker === -1) {
    throw new ValidationError("URL does not contain 'v='");
  }

  const id = cleaned.slice(marker + 2, marker + 34);
  if (!ID_PATTERN.test(id)) {
    throw new ValidationError('URL does not carry a 32-character id after v=');
  }
  return `${id.slice(0, 8)}-${id.slice(8, 12)}-${id.slice(12, 16)}-${id.slice(16, 20)}-${id.slice(20)}`;
}
