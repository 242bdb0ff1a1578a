import {
  ListHostedZonesCommand,
  ListResourceRecordSetsCommand,
  Route53Client,
  type ListResourceRecordSetsCommandInput,
  type ListResourceRecordSetsCommandOutput,
  type ResourceRecordSet,
} from '@aws-sdk/client-route-53';
import { fromIni } from '@aws-sdk/credential-providers';
import { ROUTE53_REGION } from '../constants.js';
import { decodeRoute53Name, normalizeName } from '../domain.js';
import type { ZoneProvider } from '../provider.js';
import type { HostedZone, ZoneRecord } from '../types.js';

export interface Route53Options {
  /** Named profile from the shared AWS config/credentials files */
  profile?: string;
  region?: string;
  /** Pre-built client; `profile` and `region` are ignored when given */
  client?: Pick<Route53Client, 'send'>;
}

/**
 * Create a read-only Amazon Route 53 zone provider.
 *
 * Without `profile`, credentials come from the SDK's default chain
 * (environment, shared files, instance metadata).
 */
export function route53(options: Route53Options = {}): ZoneProvider {
  const client =
    options.client ??
    new Route53Client({
      region: options.region ?? ROUTE53_REGION,
      credentials: options.profile ? fromIni({ profile: options.profile }) : undefined,
    });

  return {
    async listZones(): Promise<HostedZone[]> {
      const zones: HostedZone[] = [];
      let marker: string | undefined;

      do {
        const page = await client.send(new ListHostedZonesCommand({ Marker: marker }));

        for (const z of page.HostedZones ?? []) {
          if (!z.Id || !z.Name) continue;
          zones.push({
            id: hostedZoneId(z.Id),
            name: normalizeName(decodeRoute53Name(z.Name)),
            isPrivate: z.Config?.PrivateZone ?? false,
            recordCount: z.ResourceRecordSetCount,
          });
        }

        marker = page.IsTruncated ? page.NextMarker : undefined;
      } while (marker);

      return zones;
    },

    async listRecords(zoneId: string): Promise<ZoneRecord[]> {
      const records: ZoneRecord[] = [];
      let input: ListResourceRecordSetsCommandInput | undefined = {
        HostedZoneId: zoneId,
      };

      while (input) {
        const page: ListResourceRecordSetsCommandOutput = await client.send(
          new ListResourceRecordSetsCommand(input)
        );

        for (const set of page.ResourceRecordSets ?? []) {
          records.push(toZoneRecord(set));
        }

        input = page.IsTruncated
          ? {
              HostedZoneId: zoneId,
              StartRecordName: page.NextRecordName,
              StartRecordType: page.NextRecordType,
              StartRecordIdentifier: page.NextRecordIdentifier,
            }
          : undefined;
      }

      return records;
    },
  };
}

/** `/hostedzone/Z123` → `Z123` */
function hostedZoneId(id: string): string {
  return id.split('/').pop() ?? id;
}

function toZoneRecord(set: ResourceRecordSet): ZoneRecord {
  const name = decodeRoute53Name(set.Name ?? '');
  const type = set.Type ?? '';

  if (set.AliasTarget?.DNSName) {
    return { name, type, values: [set.AliasTarget.DNSName], alias: true };
  }

  return {
    name,
    type,
    values: (set.ResourceRecords ?? []).flatMap((r) => (r.Value ? [r.Value] : [])),
    ttl: set.TTL,
  };
}
