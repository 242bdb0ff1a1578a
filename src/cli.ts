import { Command, Option } from 'commander';
import { auditZone } from './audit.js';
import { parseAuditConfig, type AuditConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import type { ZoneProvider } from './provider.js';
import { cloudflare } from './providers/cloudflare.js';
import { route53 } from './providers/route53.js';
import { formatResultLine, formatSkipLine, formatSummary, selectScope, writeCsv } from './report.js';
import type { ResolutionOracle } from './resolver.js';
import type { ResolutionResult } from './types.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_UNRESOLVED = 2;

export interface CliDeps {
  createProvider: (config: AuditConfig) => ZoneProvider;
  /** Replaces live DNS; tests only */
  oracle?: ResolutionOracle;
  createLogger: (config: AuditConfig) => Logger;
  writeCsv: (path: string, results: readonly ResolutionResult[]) => Promise<void>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

export const defaultDeps: CliDeps = {
  createProvider: (config) =>
    config.provider === 'cloudflare'
      ? cloudflare({ apiToken: config.cloudflareToken ?? '' })
      : route53({ profile: config.profile }),
  createLogger: (config) => createLogger(config.logLevel),
  writeCsv,
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run one audit from raw CLI options and return the process exit code.
 */
export async function runCli(
  raw: Record<string, unknown>,
  deps: CliDeps = defaultDeps
): Promise<number> {
  let config: AuditConfig;
  try {
    config = parseAuditConfig(raw, deps.env);
  } catch (err) {
    deps.stderr(`Error: ${errorMessage(err)}`);
    return EXIT_ERROR;
  }

  const logger = deps.createLogger(config);

  try {
    const provider = deps.createProvider(config);
    const result = await auditZone(provider, {
      zone: config.zone,
      isPrivate: config.private,
      oracle: deps.oracle,
      resolver: config.resolver,
      timeoutMs: config.timeout,
      ignorePatterns: config.ignore,
      limit: config.limit,
      dedupe: config.dedupe,
      strategy: config.strategy,
      logger,
      onResult: (r) => {
        if (!config.silent) deps.stdout(formatResultLine(r));
      },
      onSkip: (s) => {
        if (!config.silent && s.reason === 'ignored') deps.stdout(formatSkipLine(s));
      },
    });

    deps.stdout('');
    deps.stdout(formatSummary(result));

    if (config.csv) {
      try {
        await deps.writeCsv(config.csv, selectScope(result, config.csvScope));
      } catch (err) {
        logger.error({ err, path: config.csv }, 'CSV export failed');
        deps.stderr(`Error writing CSV: ${errorMessage(err)}`);
        return EXIT_ERROR;
      }
      deps.stdout('');
      deps.stdout(`Records written to ${config.csv} (scope: ${config.csvScope})`);
    }

    return config.failOnUnresolved && result.unresolved.length > 0 ? EXIT_UNRESOLVED : EXIT_OK;
  } catch (err) {
    logger.error({ err }, 'audit failed');
    deps.stderr(`Error: ${errorMessage(err)}`);
    return EXIT_ERROR;
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Build the `zone-audit` command. Sets `process.exitCode` when the audit ends.
 */
export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('zone-audit')
    .description('List a hosted zone\'s A and CNAME records and check that they still resolve.')
    .version('0.1.0')
    .option('--zone <name>', 'DNS zone name to audit')
    .addOption(
      new Option('--provider <name>', 'zone provider')
        .choices(['route53', 'cloudflare'])
        .default('route53')
    )
    .option('--profile <name>', 'AWS profile name')
    .option('--private', 'the hosted zone is private', false)
    .option('--resolver <address>', 'DNS resolver to query (e.g. 8.8.8.8); system default if omitted')
    .option('--timeout <ms>', 'per-query DNS timeout in milliseconds')
    .option('--silent', 'only print the summary', false)
    .option('--csv <file>', 'write results to a CSV file')
    .addOption(
      new Option('--csv-scope <scope>', 'which records to export to CSV')
        .choices(['all', 'resolved', 'unresolved'])
        .default('all')
    )
    .option('--limit <n>', 'stop after this many records (ignored records excluded)')
    .option('--ignore <pattern>', 'regex for record names to skip; repeatable', collect, [])
    .option('--no-dedupe', 'classify every record, even when a name repeats')
    .addOption(
      new Option('--strategy <name>', 'follow CNAME chains, or resolve source and target only')
        .choices(['chain', 'direct'])
        .default('chain')
    )
    .option('--log-level <level>', 'diagnostic log level (written to stderr)', 'warn')
    .option('--fail-on-unresolved', 'exit with code 2 when any record does not resolve', false)
    .action(async (opts: Record<string, unknown>) => {
      process.exitCode = await runCli(opts, deps);
    });

  return program;
}
