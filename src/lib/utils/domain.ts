/**
 * Domain normalization and guessing helpers
 */

export const GUESS_TLDS = ['com', 'net', 'org', 'biz'] as const;

const SCHEME_PREFIXES = ['http://', 'https://', '//'];

/**
 * Extract a bare host from a URL or free-form domain string.
 * Returns null when nothing usable can be parsed.
 */
export function extractDomain(input: string | null | undefined): string | null {
  if (!input) return null;

  let candidate = input.trim();
  if (!candidate) return null;

  const lower = candidate.toLowerCase();
  if (!SCHEME_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    candidate = `http://${candidate}`;
  } else if (lower.startsWith('//')) {
    candidate = `http:${candidate}`;
  }

  try {
    const parsed = new URL(candidate);
    return parsed.host || null;
  } catch {
    return null;
  }
}

/**
 * Domain patterns derived from a company name, in trial order:
 * squashed, hyphenated, first word only
 */
export function buildNamePatterns(companyName: string): string[] {
  const cleaned = companyName
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/\s+/g, ' ');

  if (!cleaned) return [];

  const patterns = [
    cleaned.replace(/ /g, ''),
    cleaned.replace(/ /g, '-'),
    cleaned.split(' ')[0],
  ];

  return [...new Set(patterns.filter((pattern) => /[a-z0-9]/.test(pattern)))];
}

/**
 * Candidate domains for a business without a working website.
 * Iterates patterns first, TLDs second.
 */
export function buildDomainCandidates(
  companyName: string,
  tlds: readonly string[] = GUESS_TLDS
): string[] {
  const candidates: string[] = [];
  for (const pattern of buildNamePatterns(companyName)) {
    for (const tld of tlds) {
      candidates.push(`${pattern}.${tld}`);
    }
  }
  return candidates;
}

/**
 * Build a fetchable URL, defaulting to https when no scheme is given
 */
export function toUrl(target: string): string {
  const trimmed = target.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed.replace(/^\/\//, '')}`;
}
