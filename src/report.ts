import { writeFile } from 'node:fs/promises';
import { CSV_HEADER } from './constants.js';
import type { AuditResult, CsvScope, ResolutionResult, SkippedRecord } from './types.js';

/** Pick the result list a CSV export covers */
export function selectScope(result: AuditResult, scope: CsvScope): ResolutionResult[] {
  switch (scope) {
    case 'all':
      return result.all;
    case 'resolved':
      return result.resolved;
    case 'unresolved':
      return result.unresolved;
  }
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render results as CSV (`source,final_domain,status,all_ips`), one row per
 * result, sorted by source.
 */
export function toCsv(results: readonly ResolutionResult[]): string {
  const rows = [...results]
    .sort((a, b) => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0))
    .map((r) => [r.source, r.finalDomain, r.status, r.allIps]);

  return [[...CSV_HEADER], ...rows]
    .map((fields) => fields.map(escapeCsvField).join(','))
    .join('\r\n')
    .concat('\r\n');
}

export async function writeCsv(path: string, results: readonly ResolutionResult[]): Promise<void> {
  await writeFile(path, toCsv(results), 'utf8');
}

export function formatResultLine(result: ResolutionResult): string {
  if (result.ipAddresses.length > 0) {
    return `  + ${result.source} -> ${result.finalDomain} (${result.allIps}) [${result.status}]`;
  }
  return `  - ${result.source} does not resolve to an IP [${result.status}]`;
}

export function formatSkipLine(skipped: SkippedRecord): string {
  return `  ~ Ignored: ${skipped.source} (or its CNAME target) matches an ignore pattern`;
}

/** Closing summary: every unresolved record, or a single all-clear line */
export function formatSummary(result: AuditResult): string {
  if (result.unresolved.length === 0) {
    return 'All applicable records resolved to IPs.';
  }

  const lines = result.unresolved.map(
    (r) => `  - ${r.source} -> ${r.finalDomain} (${r.status})`
  );
  return ['Unresolved records:', ...lines].join('\n');
}
