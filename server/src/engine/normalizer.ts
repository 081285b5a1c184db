/**
 * Company identity normalization.
 *
 * Produces a comparison key for a company from its name and domain. The key
 * is a bare hostname when a well-formed domain is available, otherwise the
 * lower-cased name with punctuation, whitespace and legal suffixes removed.
 * Pure and total: bad input degrades to a best-effort (possibly empty) key.
 */

export type NormalizedKey = string;

const LEGAL_SUFFIXES = new Set([
  'inc',
  'incorporated',
  'llc',
  'llp',
  'lp',
  'corp',
  'corporation',
  'co',
  'company',
  'ltd',
  'limited',
  'plc',
  'gmbh',
  'ag',
  'sa',
  'sas',
  'srl',
  'spa',
  'bv',
  'nv',
  'pty',
  'pvt',
  'oy',
  'ab',
  'kk',
]);

const DOMAIN_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

/**
 * Reduce a domain or URL to its bare lower-case hostname.
 * Returns null unless the result is a well-formed DNS name.
 */
export function normalizeDomain(domain: string | null | undefined): string | null {
  if (!domain) return null;
  let host = domain.trim().toLowerCase();
  if (!host) return null;

  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  host = host.replace(/^[^@/]*@/, '');
  host = host.split(/[/?#]/)[0] ?? '';
  host = host.replace(/:\d+$/, '').replace(/\.$/, '');
  if (host.startsWith('www.')) host = host.slice(4);

  return DOMAIN_PATTERN.test(host) ? host : null;
}

/**
 * Name-only key: "ACME, Inc." → "acme", "The Widget Co" → "widget".
 */
export function normalizeCompanyName(name: string | null | undefined): NormalizedKey {
  if (!name) return '';

  const tokens = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/\./g, '')
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

  while (tokens.length > 1 && LEGAL_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  if (tokens.length > 1 && tokens[0] === 'the') {
    tokens.shift();
  }

  return tokens.join('');
}

/**
 * Comparison key for a company. A well-formed domain wins over the name, and
 * a name that is itself a domain ("acme.com") is treated as one.
 * Idempotent: feeding a key back in as the name returns the same key.
 */
export function normalizeCompanyKey(
  companyName: string | null | undefined,
  domain?: string | null,
): NormalizedKey {
  const fromDomain = normalizeDomain(domain);
  if (fromDomain) return fromDomain;

  const nameAsDomain = normalizeDomain(companyName);
  if (nameAsDomain) return nameAsDomain;

  return normalizeCompanyName(companyName);
}
