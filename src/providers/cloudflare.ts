import type { ZoneProvider } from '../provider.js';
import type { HostedZone, ZoneRecord } from '../types.js';

export interface CloudflareOptions {
  apiToken: string;
  /** Records per page when listing (Cloudflare allows up to 5000) */
  perPage?: number;
}

interface CloudflareApiResponse<T> {
  success: boolean;
  errors: { code: number; message: string }[];
  result: T;
  result_info?: { page: number; total_pages: number };
}

interface CloudflareZone {
  id: string;
  name: string;
}

interface CloudflareDnsRecord {
  id: string;
  type: string;
  name: string;
  content: string;
  ttl?: number;
}

const CF_API = 'https://api.cloudflare.com/client/v4';

async function cfGetWithToken<T>(
  apiToken: string,
  path: string
): Promise<CloudflareApiResponse<T>> {
  const headers = new Headers();
  headers.set('Authorization', `Bearer ${apiToken}`);

  const res = await fetch(`${CF_API}${path}`, { headers });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Cloudflare API error ${res.status}: ${text}`);
  }

  const data = (await res.json()) as CloudflareApiResponse<T>;

  if (!data.success) {
    const errorDetails =
      data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') ||
      'unknown error';
    throw new Error(`Cloudflare API error: ${errorDetails}`);
  }

  return data;
}

/** Fetch every page of a paginated Cloudflare list endpoint */
async function cfFetchAll<T>(apiToken: string, path: string, perPage: number): Promise<T[]> {
  const items: T[] = [];
  const separator = path.includes('?') ? '&' : '?';
  let page = 1;

  while (true) {
    const data = await cfGetWithToken<T[]>(
      apiToken,
      `${path}${separator}page=${page}&per_page=${perPage}`
    );
    items.push(...data.result);

    const info = data.result_info;
    if (!info || page >= info.total_pages) break;
    page++;
  }

  return items;
}

/**
 * Create a read-only Cloudflare zone provider.
 *
 * Uses Cloudflare API v4 with native `fetch`. Cloudflare has no private
 * zones, so every zone is reported as public.
 */
export function cloudflare(options: CloudflareOptions): ZoneProvider {
  const { apiToken } = options;
  const perPage = options.perPage ?? 100;

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }

  return {
    async listZones(): Promise<HostedZone[]> {
      const zones = await cfFetchAll<CloudflareZone>(apiToken, '/zones', 50);
      return zones.map((z) => ({ id: z.id, name: z.name, isPrivate: false }));
    },

    async listRecords(zoneId: string): Promise<ZoneRecord[]> {
      const records = await cfFetchAll<CloudflareDnsRecord>(
        apiToken,
        `/zones/${encodeURIComponent(zoneId)}/dns_records`,
        perPage
      );

      return records.map((r) => ({
        name: r.name,
        type: r.type,
        values: r.content ? [r.content] : [],
        ttl: r.ttl,
      }));
    },
  };
}
