/**
 * Normalize a DNS name into the key used for every comparison and lookup.
 *
 * Strips exactly one trailing dot (FQDN notation) and lowercases.
 *
 * Examples:
 * - `Example.COM.` → `example.com`
 * - `a.example.com` → `a.example.com`
 * - `example.com..` → `example.com.`
 */
export function normalizeName(name: string): string {
  let normalized = name.toLowerCase();

  if (normalized.endsWith('.')) {
    normalized = normalized.slice(0, -1);
  }

  return normalized;
}

/**
 * Decode Route 53 octal escapes (`\052` → `*`) in a record or zone name.
 */
export function decodeRoute53Name(name: string): string {
  return name.replace(/\\([0-7]{3})/g, (_, octal: string) =>
    String.fromCharCode(parseInt(octal, 8))
  );
}

/** True when both names are the same zone, ignoring case and the trailing dot */
export function sameZoneName(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b);
}
