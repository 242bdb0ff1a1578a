import dns from 'node:dns';
import { DEFAULT_TIMEOUT_MS, DEFAULT_TRIES } from './constants.js';
import { normalizeName } from './domain.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Live A-record lookup. `null` means the name did not resolve, whatever the
 * cause (NXDOMAIN, no data, timeout, refused, malformed name).
 */
export interface ResolutionOracle {
  resolveA(name: string): Promise<string[] | null>;
}

export interface DnsOracleOptions {
  /** Nameserver to query instead of the system default, e.g. `8.8.8.8` or `8.8.8.8:53` */
  server?: string;
  /** Per-query timeout in milliseconds */
  timeoutMs?: number;
  tries?: number;
  /** Memoize answers per name for the lifetime of the oracle (default: true) */
  cache?: boolean;
  logger?: Logger;
}

/**
 * Create a resolution oracle backed by Node.js `dns.promises.Resolver`.
 *
 * Answers are sorted and de-duplicated. Every lookup error collapses to
 * `null`; the error code is logged at debug level.
 */
export function createDnsOracle(options: DnsOracleOptions = {}): ResolutionOracle {
  const logger = options.logger ?? silentLogger;
  const resolver = new dns.promises.Resolver({
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    tries: options.tries ?? DEFAULT_TRIES,
  });

  if (options.server) {
    resolver.setServers([options.server]);
  }

  const cache = options.cache === false ? undefined : new Map<string, Promise<string[] | null>>();

  async function lookup(name: string): Promise<string[] | null> {
    try {
      const addresses = await resolver.resolve4(name);
      if (addresses.length === 0) {
        return null;
      }
      return [...new Set(addresses)].sort();
    } catch (err) {
      logger.debug({ name, code: errorCode(err) }, 'A lookup failed');
      return null;
    }
  }

  return {
    resolveA(name: string): Promise<string[] | null> {
      const key = normalizeName(name);
      if (!cache) return lookup(key);

      let pending = cache.get(key);
      if (!pending) {
        pending = lookup(key);
        cache.set(key, pending);
      }
      return pending;
    },
  };
}

function errorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return err instanceof Error ? err.message : String(err);
}
