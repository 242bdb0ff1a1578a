/**
 * Live test: audit a Cloudflare zone for records that no longer resolve.
 *
 * Usage:
 *   CF_API_TOKEN=xxx npx tsx examples/audit.ts example.com
 */

import { auditZone, formatSummary, toCsv } from '../src/index.js';
import { cloudflare } from '../src/providers/cloudflare.js';

const zone = process.argv[2];
const apiToken = process.env.CF_API_TOKEN;

if (!zone) {
  console.error('Usage: CF_API_TOKEN=xxx npx tsx examples/audit.ts <zone>');
  process.exit(1);
}

if (!apiToken) {
  console.error('Missing CF_API_TOKEN environment variable.');
  console.error('Required permission: Zone > DNS > Read');
  process.exit(1);
}

async function main(zoneName: string, token: string) {
  const provider = cloudflare({ apiToken: token });

  console.log(`\nAuditing ${zoneName}...`);
  const result = await auditZone(provider, {
    zone: zoneName,
    onResult: (r) => console.log(`  ${r.source} -> ${r.finalDomain}: ${r.status} (${r.allIps})`),
  });

  console.log(`\n${formatSummary(result)}`);
  console.log(`\n${toCsv(result.unresolved)}`);
  console.log(
    `Done! ${result.all.length} checked, ${result.resolved.length} resolved, ${result.unresolved.length} unresolved, ${result.skipped.length} skipped.`
  );
}

main(zone, apiToken).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
