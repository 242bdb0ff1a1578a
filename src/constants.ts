/** Placeholder written to `all_ips` when a record has no live A answer */
export const NO_RESOLUTION = 'No DNS resolution';

/** Column order of the exported CSV */
export const CSV_HEADER = ['source', 'final_domain', 'status', 'all_ips'] as const;

/** Per-query DNS timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 5000;

/** Attempts per query before a lookup counts as not resolved */
export const DEFAULT_TRIES = 2;

/** Route 53 is a global service; its API lives in us-east-1 */
export const ROUTE53_REGION = 'us-east-1';
