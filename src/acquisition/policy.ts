import type { CrawlPolicy } from '../config';

export type FollowPolicy = Pick<CrawlPolicy, 'allowedHostSuffix' | 'pathAllowList' | 'pathDenyList'>;

/**
 * Canonical form used for visited/queued bookkeeping: parsed, fragment
 * dropped. Returns null for anything that is not an absolute URL.
 */
export function normalizeUrl(raw: string): string | null {
  try {
    const url = new URL(raw);
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * A link is followed only when it is http(s), on the allowed host suffix,
 * its path contains at least one allow pattern and no deny pattern.
 * Patterns match case-insensitively as substrings of the path.
 */
export function shouldFollow(url: string, policy: FollowPolicy): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
  if (!parsed.hostname || !parsed.hostname.endsWith(policy.allowedHostSuffix)) return false;

  const pathname = parsed.pathname.toLowerCase();
  if (!policy.pathAllowList.some((p) => pathname.includes(p.toLowerCase()))) return false;
  if (policy.pathDenyList.some((p) => pathname.includes(p.toLowerCase()))) return false;

  return true;
}
