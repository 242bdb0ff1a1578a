import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from './constants.js';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const isRegExp = (pattern: string): boolean => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
};

/** Accepts numbers or numeric strings, as commander hands options over as strings */
const integer = z.coerce.number().int();

const auditConfigSchema = z
  .object({
    provider: z.enum(['route53', 'cloudflare']).default('route53'),
    zone: z.string().trim().min(1, 'zone is required'),
    private: z.boolean().default(false),
    profile: z.string().min(1).optional(),
    resolver: z.string().min(1).optional(),
    timeout: integer.positive().default(DEFAULT_TIMEOUT_MS),
    silent: z.boolean().default(false),
    csv: z.string().min(1).optional(),
    csvScope: z.enum(['all', 'resolved', 'unresolved']).default('all'),
    limit: integer.nonnegative().optional(),
    ignore: z
      .array(z.string().refine(isRegExp, (p) => ({ message: `invalid ignore pattern: ${p}` })))
      .default([]),
    dedupe: z.boolean().default(true),
    strategy: z.enum(['chain', 'direct']).default('chain'),
    logLevel: z.enum(LOG_LEVELS).default('warn'),
    failOnUnresolved: z.boolean().default(false),
    cloudflareToken: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.provider === 'cloudflare' && !config.cloudflareToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cloudflareToken'],
        message: 'CF_API_TOKEN must be set for the cloudflare provider',
      });
    }
    if (config.provider === 'cloudflare' && config.private) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['private'],
        message: 'cloudflare has no private zones',
      });
    }
  });

export type AuditConfig = z.infer<typeof auditConfigSchema>;

/**
 * Validate raw CLI options merged with environment settings.
 *
 * Throws `ConfigError` listing every problem found.
 */
export function parseAuditConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): AuditConfig {
  const parsed = auditConfigSchema.safeParse({
    ...raw,
    cloudflareToken: env.CF_API_TOKEN || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  return parsed.data;
}
