import { normalizeName } from './domain.js';
import { silentLogger, type Logger } from './logger.js';
import type { RecordIndex } from './record-index.js';
import type { ResolutionOracle } from './resolver.js';
import type { ChainOutcome } from './types.js';

/**
 * Walk a name through the zone's records until it reaches something that can
 * be checked live, an unsupported record, or a name already visited.
 *
 * - No local record → live lookup: `resolved-externally` or
 *   `no-local-record-no-external-match`
 * - A record → live lookup: `externally-resolvable-a` or
 *   `a-record-does-not-resolve`
 * - CNAME → continue at its target (`malformed-record` if it has none)
 * - Any other type → `unsupported-record-type`, even mid-chain
 * - Repeated name → `chain-loop-detected` at the repeated name
 *
 * Each step adds a new name to the visited set, so the walk ends after at
 * most `index.size + 1` steps.
 */
export async function resolveChain(
  start: string,
  index: RecordIndex,
  oracle: ResolutionOracle,
  logger: Logger = silentLogger
): Promise<ChainOutcome> {
  const visited = new Set<string>();
  let current = normalizeName(start);

  while (!visited.has(current)) {
    visited.add(current);

    const record = index.lookup(current);
    if (!record) {
      const ips = await oracle.resolveA(current);
      return ips
        ? { status: 'resolved-externally', finalName: current, ipAddresses: ips }
        : { status: 'no-local-record-no-external-match', finalName: current, ipAddresses: [] };
    }

    const type = record.type.toUpperCase();

    if (type === 'A') {
      const ips = await oracle.resolveA(current);
      return ips
        ? { status: 'externally-resolvable-a', finalName: current, ipAddresses: ips }
        : { status: 'a-record-does-not-resolve', finalName: current, ipAddresses: [] };
    }

    if (type === 'CNAME') {
      const target = record.values[0];
      if (!target) {
        logger.warn({ name: current }, 'CNAME record has no target');
        return { status: 'malformed-record', finalName: current, ipAddresses: [] };
      }
      logger.debug({ from: current, to: normalizeName(target) }, 'following CNAME');
      current = normalizeName(target);
      continue;
    }

    return {
      status: 'unsupported-record-type',
      finalName: current,
      recordType: type,
      ipAddresses: [],
    };
  }

  logger.debug({ name: current, visited: [...visited] }, 'CNAME loop detected');
  return { status: 'chain-loop-detected', finalName: current, ipAddresses: [] };
}
