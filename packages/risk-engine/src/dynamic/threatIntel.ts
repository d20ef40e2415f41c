import { readFile } from 'node:fs/promises';

/**
 * Set of hosts (domains and IPs) known to be malicious
 */
export interface ThreatIntel {
  readonly hosts: ReadonlySet<string>;
}

export const EMPTY_THREAT_INTEL: ThreatIntel = Object.freeze({ hosts: new Set<string>() });

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Parse a plain-text feed: one domain or IP per line, `#` starts a comment.
 * Lines may carry a trailing `,tag` column, which is ignored.
 */
export function parseIntelFeed(content: string): ThreatIntel {
  const hosts = new Set<string>();
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const host = normalizeHost(line.split(',')[0] ?? '');
    if (host) {
      hosts.add(host);
    }
  }
  return Object.freeze({ hosts });
}

/**
 * Read and parse a feed file
 */
export async function loadIntelFeed(path: string): Promise<ThreatIntel> {
  return parseIntelFeed(await readFile(path, 'utf8'));
}

export function mergeThreatIntel(...feeds: readonly ThreatIntel[]): ThreatIntel {
  const hosts = new Set<string>();
  for (const feed of feeds) {
    for (const host of feed.hosts) hosts.add(host);
  }
  return Object.freeze({ hosts });
}

/**
 * Exact match against the feed
 */
export function isMaliciousHost(intel: ThreatIntel, host: string | undefined): boolean {
  return host !== undefined && intel.hosts.has(normalizeHost(host));
}
