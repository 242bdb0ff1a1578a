import { normalizeName } from './domain.js';
import type { ZoneRecord } from './types.js';

/** Read-only lookup of zone records by normalized name */
export interface RecordIndex {
  lookup(name: string): ZoneRecord | undefined;
  has(name: string): boolean;
  readonly size: number;
}

/**
 * Index records by normalized name. When a name appears more than once, the
 * first record wins and later ones are ignored.
 *
 * Lookups normalize their argument, so raw names may be passed.
 */
export function buildRecordIndex(records: readonly ZoneRecord[]): RecordIndex {
  const byName = new Map<string, ZoneRecord>();

  for (const record of records) {
    const key = normalizeName(record.name);
    if (!byName.has(key)) {
      byName.set(key, record);
    }
  }

  return {
    lookup: (name) => byName.get(normalizeName(name)),
    has: (name) => byName.has(normalizeName(name)),
    get size() {
      return byName.size;
    },
  };
}
