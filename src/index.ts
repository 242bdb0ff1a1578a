export { auditRecords, auditZone } from './audit.js';
export type { AuditOptions, ZoneAuditOptions } from './audit.js';
export { resolveChain } from './chain-resolver.js';
export {
  classifyRecord,
  compileIgnorePatterns,
  describeOutcome,
  formatIps,
} from './classify.js';
export type { ClassifyContext, ClassifyResult } from './classify.js';
export { parseAuditConfig } from './config.js';
export type { AuditConfig } from './config.js';
export { NO_RESOLUTION, CSV_HEADER, DEFAULT_TIMEOUT_MS } from './constants.js';
export { normalizeName, decodeRoute53Name } from './domain.js';
export { ZoneNotFoundError, ConfigError } from './errors.js';
export { findZone } from './provider.js';
export type { ZoneProvider } from './provider.js';
export { buildRecordIndex } from './record-index.js';
export type { RecordIndex } from './record-index.js';
export {
  toCsv,
  writeCsv,
  selectScope,
  formatResultLine,
  formatSkipLine,
  formatSummary,
} from './report.js';
export { createDnsOracle } from './resolver.js';
export type { DnsOracleOptions, ResolutionOracle } from './resolver.js';
export type {
  AuditResult,
  AuditStrategy,
  ChainOutcome,
  ChainStatus,
  CsvScope,
  DirectOutcome,
  DirectStatus,
  HostedZone,
  ResolutionOutcome,
  ResolutionResult,
  ResolutionStatus,
  SkippedRecord,
  SkipReason,
  ZoneAuditResult,
  ZoneRecord,
} from './types.js';
