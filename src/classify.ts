import { resolveChain } from './chain-resolver.js';
import { NO_RESOLUTION } from './constants.js';
import { normalizeName } from './domain.js';
import { silentLogger, type Logger } from './logger.js';
import type { RecordIndex } from './record-index.js';
import type { ResolutionOracle } from './resolver.js';
import type {
  AuditStrategy,
  DirectOutcome,
  ResolutionOutcome,
  ResolutionResult,
  ResolutionStatus,
  SkippedRecord,
  ZoneRecord,
} from './types.js';

export type ClassifyResult =
  | { kind: 'classified'; result: ResolutionResult }
  | { kind: 'skipped'; skipped: SkippedRecord };

export interface ClassifyContext {
  index: RecordIndex;
  oracle: ResolutionOracle;
  ignorePatterns?: readonly RegExp[];
  /**
   * Sources already classified in this run. When given, a repeated source is
   * skipped as a duplicate and new sources are added to it.
   */
  seen?: Set<string>;
  strategy?: AuditStrategy;
  logger?: Logger;
}

const STATUS_LABELS: Record<Exclude<ResolutionStatus, 'unsupported-record-type'>, string> = {
  'externally-resolvable-a': 'Externally resolvable A record',
  'a-record-does-not-resolve': 'A record does not resolve externally',
  'resolved-externally': 'Resolved externally',
  'no-local-record-no-external-match': 'Does not have an IP match',
  'chain-loop-detected': 'CNAME loop detected',
  'malformed-record': 'Malformed CNAME record: no target',
  'source-resolves': 'Source resolves',
  'source-does-not-resolve': 'Source does not resolve',
};

/** Human-readable label for an outcome, as exported to CSV */
export function describeOutcome(outcome: ResolutionOutcome): string {
  if (outcome.status === 'unsupported-record-type') {
    return `Unsupported record type: ${outcome.recordType}`;
  }
  return STATUS_LABELS[outcome.status];
}

/** Join IPs for export, or the no-resolution placeholder */
export function formatIps(ipAddresses: readonly string[]): string {
  return ipAddresses.length > 0 ? ipAddresses.join(', ') : NO_RESOLUTION;
}

/**
 * Compile ignore patterns. Strings become regular expressions; the `g` and
 * `y` flags are dropped so `test()` keeps no state between calls.
 */
export function compileIgnorePatterns(patterns: readonly (string | RegExp)[]): RegExp[] {
  return patterns.map((pattern) =>
    typeof pattern === 'string'
      ? new RegExp(pattern)
      : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
  );
}

/**
 * Classify one zone record.
 *
 * Filters run in order: record type (only A and CNAME), ignore patterns
 * against the source and the CNAME target, then duplicate sources. Records
 * that pass are resolved according to `strategy`:
 *
 * - `chain`: a CNAME follows its chain through the zone from its target; an A
 *   record is looked up live under its own name.
 * - `direct`: the source is looked up live, and a CNAME's target as well.
 */
export async function classifyRecord(
  record: ZoneRecord,
  context: ClassifyContext
): Promise<ClassifyResult> {
  const logger = context.logger ?? silentLogger;
  const type = record.type.toUpperCase();
  const source = normalizeName(record.name);

  if (type !== 'A' && type !== 'CNAME') {
    return skip(record, source, 'unsupported-type');
  }

  const rawTarget = type === 'CNAME' ? record.values[0] : undefined;
  const target = rawTarget ? normalizeName(rawTarget) : undefined;

  const ignored = (context.ignorePatterns ?? []).some(
    (pattern) => pattern.test(source) || (target !== undefined && pattern.test(target))
  );
  if (ignored) {
    logger.debug({ source, target }, 'record matches ignore pattern');
    return skip(record, source, 'ignored');
  }

  if (context.seen) {
    if (context.seen.has(source)) {
      logger.debug({ source }, 'duplicate source skipped');
      return skip(record, source, 'duplicate');
    }
    context.seen.add(source);
  }

  if (type === 'CNAME' && target === undefined) {
    logger.warn({ source }, 'CNAME record has no target');
    return classified(record, source, {
      status: 'malformed-record',
      finalName: source,
      ipAddresses: [],
    });
  }

  if (context.strategy === 'direct') {
    return classifyDirect(record, source, target, context.oracle);
  }

  if (target !== undefined) {
    const outcome = await resolveChain(target, context.index, context.oracle, logger);
    return classified(record, source, outcome);
  }

  const ips = await context.oracle.resolveA(source);
  return classified(
    record,
    source,
    ips
      ? { status: 'externally-resolvable-a', finalName: source, ipAddresses: ips }
      : { status: 'a-record-does-not-resolve', finalName: source, ipAddresses: [] }
  );
}

async function classifyDirect(
  record: ZoneRecord,
  source: string,
  target: string | undefined,
  oracle: ResolutionOracle
): Promise<ClassifyResult> {
  const sourceIps = await oracle.resolveA(source);
  const outcome: DirectOutcome = sourceIps
    ? { status: 'source-resolves', finalName: target ?? source, ipAddresses: sourceIps }
    : { status: 'source-does-not-resolve', finalName: target ?? source, ipAddresses: [] };

  const result = toResult(record, source, outcome);

  if (target !== undefined) {
    const targetIps = await oracle.resolveA(target);
    if (sourceIps) {
      result.status += targetIps ? '; Target resolves' : '; Target does not resolve';
    }
  }

  return { kind: 'classified', result };
}

function toResult(record: ZoneRecord, source: string, outcome: ResolutionOutcome): ResolutionResult {
  return {
    source,
    recordType: record.type.toUpperCase(),
    finalDomain: outcome.finalName,
    status: describeOutcome(outcome),
    code: outcome.status,
    ipAddresses: outcome.ipAddresses,
    allIps: formatIps(outcome.ipAddresses),
  };
}

function classified(record: ZoneRecord, source: string, outcome: ResolutionOutcome): ClassifyResult {
  return { kind: 'classified', result: toResult(record, source, outcome) };
}

function skip(record: ZoneRecord, source: string, reason: SkippedRecord['reason']): ClassifyResult {
  return { kind: 'skipped', skipped: { record, source, reason } };
}
