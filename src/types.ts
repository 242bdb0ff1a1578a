/** A resource record as listed by a zone provider */
export interface ZoneRecord {
  name: string;
  /** Raw record type, e.g. `A`, `CNAME`, `MX` */
  type: string;
  /** For CNAME, `values[0]` is the target name */
  values: string[];
  ttl?: number;
  /** True for provider alias records; `values[0]` holds the alias target */
  alias?: boolean;
}

/** A hosted zone as listed by a zone provider */
export interface HostedZone {
  id: string;
  /** Zone apex without the trailing dot */
  name: string;
  isPrivate: boolean;
  recordCount?: number;
}

/** Machine-readable classification of a resolved record */
export type ResolutionStatus =
  | 'externally-resolvable-a'
  | 'a-record-does-not-resolve'
  | 'resolved-externally'
  | 'no-local-record-no-external-match'
  | 'unsupported-record-type'
  | 'chain-loop-detected'
  | 'malformed-record'
  | DirectStatus;

/** Statuses produced only by the `direct` strategy */
export type DirectStatus = 'source-resolves' | 'source-does-not-resolve';

/** Statuses a chain walk can end in */
export type ChainStatus = Exclude<ResolutionStatus, DirectStatus>;

/** Terminal state of a chain walk */
export type ChainOutcome =
  | {
      status: Exclude<ChainStatus, 'unsupported-record-type'>;
      /** Name at which the walk stopped */
      finalName: string;
      /** Sorted; empty when nothing resolved */
      ipAddresses: string[];
    }
  | {
      status: 'unsupported-record-type';
      finalName: string;
      recordType: string;
      ipAddresses: string[];
    };

/** Result of checking a record's source (and CNAME target) directly */
export interface DirectOutcome {
  status: DirectStatus;
  /** The CNAME target, or the source for an A record */
  finalName: string;
  /** Addresses of the source */
  ipAddresses: string[];
}

export type ResolutionOutcome = ChainOutcome | DirectOutcome;

/** Per-record report handed to summaries and CSV export */
export interface ResolutionResult {
  source: string;
  recordType: string;
  finalDomain: string;
  /** Human-readable status label */
  status: string;
  code: ResolutionStatus;
  ipAddresses: string[];
  /** IPs joined with `, `, or `No DNS resolution` */
  allIps: string;
}

export type SkipReason = 'ignored' | 'duplicate' | 'unsupported-type';

/** A record the classifier declined to classify */
export interface SkippedRecord {
  record: ZoneRecord;
  source: string;
  reason: SkipReason;
}

/** How records are checked: follow CNAME chains, or resolve source and target only */
export type AuditStrategy = 'chain' | 'direct';

export type CsvScope = 'all' | 'resolved' | 'unresolved';

export interface AuditResult {
  all: ResolutionResult[];
  /** Results with at least one IP */
  resolved: ResolutionResult[];
  /** Results with no IP */
  unresolved: ResolutionResult[];
  skipped: SkippedRecord[];
}

export interface ZoneAuditResult extends AuditResult {
  zone: HostedZone;
}
