import { sameZoneName } from './domain.js';
import { ZoneNotFoundError } from './errors.js';
import type { HostedZone, ZoneRecord } from './types.js';

/** Minimal read-only interface for a DNS zone provider adapter */
export interface ZoneProvider {
  /** List every hosted zone visible to the credentials */
  listZones(): Promise<HostedZone[]>;
  /** List every record of a zone, across all pages */
  listRecords(zoneId: string): Promise<ZoneRecord[]>;
}

/**
 * Find the zone with the given name and privacy flag.
 *
 * Throws `ZoneNotFoundError` when none matches.
 */
export async function findZone(
  provider: ZoneProvider,
  name: string,
  options: { isPrivate?: boolean } = {}
): Promise<HostedZone> {
  const isPrivate = options.isPrivate ?? false;
  const zones = await provider.listZones();
  const match = zones.find((z) => sameZoneName(z.name, name) && z.isPrivate === isPrivate);

  if (!match) {
    throw new ZoneNotFoundError(name, isPrivate);
  }
  return match;
}
