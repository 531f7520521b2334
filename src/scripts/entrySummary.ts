/**
 * Entry Summary CLI Script
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run entry-summary -- --list 51750 --entry 14355566 [--json]
 *
 * Collects every field of one Affinity list entry, normalizes them and prints
 * the company summary. `--json` prints the normalized field set and summary
 * as JSON instead, for piping into other tools.
 */
import type { AffinityService } from '@application/services/AffinityService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { CompanySummary } from '@domain/entities/CompanySummary';

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '—';
  if (Array.isArray(value)) return value.length > 0 ? value.map(formatValue).join(', ') : '—';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function printSummary(summary: CompanySummary, fieldCount: number): void {
  // eslint-disable-next-line no-console
  const log = console.log;
  const rows: [string, unknown][] = [
    ['Description', summary.description],
    ['Industries', summary.industries],
    ['Technologies', summary.technologies],
    ['Business models', summary.businessModels],
    ['Client focus', summary.clientFocus],
    ['Ownership', summary.ownershipTypes],
    ['Employees', summary.employeesRange],
    ['Founded', summary.yearFounded],
    ['Last funding (EUR)', summary.funding.lastEur],
    ['Total funding (EUR)', summary.funding.totalEur],
    ['Location', summary.locationStr],
    ['Dealroom', summary.companyUrls.dealroom],
    ['LinkedIn', summary.companyUrls.linkedin],
  ];

  log('');
  log(`  ${fieldCount} populated fields`);
  log('');
  for (const [label, value] of rows) {
    log(`  ${label.padEnd(20)} ${formatValue(value)}`);
  }
  log('');
}

async function main(): Promise<void> {
  const listId = getArg('--list');
  const entryId = getArg('--entry');

  if (!listId || !entryId) {
    // eslint-disable-next-line no-console
    console.error('Usage: npm run entry-summary -- --list <listId> --entry <entryId> [--json]');
    process.exit(1);
  }

  const service = container.resolve<AffinityService>(TOKENS.AffinityService);
  const { normalizedFields, summary } = await service.getListEntryFields(listId, entryId);

  if (hasFlag('--json')) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ normalizedFields, summary }, null, 2));
    return;
  }
  printSummary(summary, Object.keys(normalizedFields).length);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Entry summary failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
