import { classifyRecord, compileIgnorePatterns } from './classify.js';
import { silentLogger, type Logger } from './logger.js';
import { findZone, type ZoneProvider } from './provider.js';
import { buildRecordIndex } from './record-index.js';
import { createDnsOracle, type ResolutionOracle } from './resolver.js';
import type {
  AuditResult,
  AuditStrategy,
  ResolutionResult,
  SkippedRecord,
  ZoneAuditResult,
  ZoneRecord,
} from './types.js';

export interface AuditOptions {
  /** Live resolution; defaults to a `dns.promises` oracle built from `resolver` and `timeoutMs` */
  oracle?: ResolutionOracle;
  /** Nameserver to query instead of the system default */
  resolver?: string;
  timeoutMs?: number;
  /** Records whose name or CNAME target matches any pattern are skipped */
  ignorePatterns?: readonly (string | RegExp)[];
  /** Stop after this many classified records; skipped records don't count */
  limit?: number;
  /** Skip records whose name was already classified (default: true) */
  dedupe?: boolean;
  strategy?: AuditStrategy;
  /** Checked before each record */
  signal?: AbortSignal;
  logger?: Logger;
  onResult?: (result: ResolutionResult) => void;
  onSkip?: (skipped: SkippedRecord) => void;
}

/**
 * Classify every A and CNAME record of a zone against live DNS.
 *
 * Records are processed one at a time in input order, and results keep that
 * order. Resolution failures are outcomes, not errors: this only rejects on an
 * invalid `limit` or an aborted `signal`.
 */
export async function auditRecords(
  records: readonly ZoneRecord[],
  options: AuditOptions = {}
): Promise<AuditResult> {
  const { limit } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }

  const logger = options.logger ?? silentLogger;
  const oracle =
    options.oracle ??
    createDnsOracle({ server: options.resolver, timeoutMs: options.timeoutMs, logger });
  const index = buildRecordIndex(records);
  const ignorePatterns = compileIgnorePatterns(options.ignorePatterns ?? []);
  const seen = options.dedupe === false ? undefined : new Set<string>();

  const all: ResolutionResult[] = [];
  const resolved: ResolutionResult[] = [];
  const unresolved: ResolutionResult[] = [];
  const skipped: SkippedRecord[] = [];

  logger.info({ records: records.length, indexed: index.size, limit }, 'audit started');

  for (const record of records) {
    options.signal?.throwIfAborted();

    if (limit !== undefined && all.length >= limit) {
      break;
    }

    const outcome = await classifyRecord(record, {
      index,
      oracle,
      ignorePatterns,
      seen,
      strategy: options.strategy ?? 'chain',
      logger,
    });

    if (outcome.kind === 'skipped') {
      skipped.push(outcome.skipped);
      options.onSkip?.(outcome.skipped);
      continue;
    }

    const { result } = outcome;
    all.push(result);
    (result.ipAddresses.length > 0 ? resolved : unresolved).push(result);
    options.onResult?.(result);
  }

  logger.info(
    { classified: all.length, resolved: resolved.length, unresolved: unresolved.length, skipped: skipped.length },
    'audit finished'
  );

  return { all, resolved, unresolved, skipped };
}

export interface ZoneAuditOptions extends AuditOptions {
  /** Zone apex, with or without the trailing dot */
  zone: string;
  isPrivate?: boolean;
}

/**
 * Find a hosted zone through a provider, list its records and audit them.
 *
 * Rejects with `ZoneNotFoundError` when no zone matches.
 */
export async function auditZone(
  provider: ZoneProvider,
  options: ZoneAuditOptions
): Promise<ZoneAuditResult> {
  const logger = options.logger ?? silentLogger;
  const zone = await findZone(provider, options.zone, { isPrivate: options.isPrivate ?? false });
  logger.info({ zone: zone.name, id: zone.id, isPrivate: zone.isPrivate }, 'zone found');

  const records = await provider.listRecords(zone.id);
  const result = await auditRecords(records, options);

  return { zone, ...result };
}
