import { ConfigurationError } from '../common/errors';

const LABEL = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/;

export function normalizeDomain(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/[/?#].*$/, '')
    .replace(/:\d+$/, '')
    .replace(/\.$/, '');
}

export function isValidDomain(domain: string): boolean {
  if (domain.length > 253) return false;
  const labels = domain.split('.');
  if (labels.length < 2) return false;
  // the TLD is never all-numeric, which also rejects IPv4 literals
  if (/^\d+$/.test(labels[labels.length - 1])) return false;
  return labels.every((l) => LABEL.test(l));
}

/**
 * Normalizes the requested domains and keeps the first occurrence of each.
 * Throws ConfigurationError on an empty list or any malformed name.
 */
export function parseDomainList(input: readonly string[]): string[] {
  const domains = input.map(normalizeDomain).filter(Boolean);
  if (!domains.length) throw new ConfigurationError('no domains to scan');

  const invalid = domains.filter((d) => !isValidDomain(d));
  if (invalid.length) {
    throw new ConfigurationError(
      `malformed domain name: ${invalid.join(', ')}`,
      invalid.map((d) => `invalid domain: ${d}`),
    );
  }
  return [...new Set(domains)];
}

/** Splits a comma-separated CLI or query-string value. */
export function splitDomainArg(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
