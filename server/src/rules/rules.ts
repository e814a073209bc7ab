import dayjs from 'dayjs';
import type {
  DnsRecords,
  DomainSnapshot,
  Evidence,
  Finding,
  ScanConfig,
  Severity,
  WhoisRecord,
} from '../scan/types';

export type RulePolicy = Pick<
  ScanConfig,
  'expiryWarningDays' | 'expiryCriticalDays'
>;

export const RULE_IDS = [
  'ns_delegation_mismatch',
  'ns_single_server',
  'mx_missing',
  'spf_missing',
  'spf_permissive',
  'spf_multiple',
  'dmarc_missing',
  'dmarc_policy_none',
  'dkim_missing',
  'domain_expiry',
  'whois_privacy_disabled',
  'dangling_cname',
  'caa_missing',
  'soa_missing',
  'no_address_records',
] as const;
export type RuleId = (typeof RULE_IDS)[number];

export type RuleContext = {
  snapshot: DomainSnapshot;
  policy: RulePolicy;
};

export type Rule = {
  id: RuleId;
  evaluate: (ctx: RuleContext) => Finding[];
};

function f(
  ruleId: RuleId,
  severity: Severity,
  title: string,
  description: string,
  evidence: Evidence[],
): Finding {
  return Object.freeze({
    ruleId,
    severity,
    title,
    description,
    evidence: Object.freeze(evidence.map((e) => Object.freeze(e))),
  });
}

/** Rule that only looks at DNS data; skipped when DNS collection failed. */
const dnsRule =
  (check: (dns: DnsRecords, ctx: RuleContext) => Finding[]) =>
  (ctx: RuleContext): Finding[] =>
    ctx.snapshot.dns ? check(ctx.snapshot.dns, ctx) : [];

/** Rule that only looks at registration data. */
const whoisRule =
  (check: (whois: WhoisRecord, ctx: RuleContext) => Finding[]) =>
  (ctx: RuleContext): Finding[] =>
    ctx.snapshot.whois ? check(ctx.snapshot.whois, ctx) : [];

const spfRecords = (dns: DnsRecords) =>
  dns.records.TXT.filter((t) => /^v=spf1(\s|$)/i.test(t.trim()));

// "0 ." (null MX, RFC 7505) normalizes to an empty exchange
const refusesMail = (dns: DnsRecords) =>
  dns.records.MX.length > 0 &&
  dns.records.MX.every((mx) => !mx.split(' ')[1]);

function dmarcTags(record: string): Map<string, string> {
  const tags = new Map<string, string>();
  for (const part of record.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) continue;
    tags.set(
      part.slice(0, eq).trim().toLowerCase(),
      part.slice(eq + 1).trim().toLowerCase(),
    );
  }
  return tags;
}

const sameSet = (a: readonly string[], b: readonly string[]) => {
  const sa = new Set(a);
  const sb = new Set(b);
  return sa.size === sb.size && [...sa].every((x) => sb.has(x));
};

export const RULES: readonly Rule[] = [
  {
    id: 'ns_delegation_mismatch',
    evaluate: (ctx) => {
      const { dns, whois } = ctx.snapshot;
      if (!dns || !whois) return [];
      const zone = dns.records.NS;
      const registry = whois.nameServers;
      if (!zone.length || !registry.length || sameSet(zone, registry)) return [];
      const onlyZone = zone.filter((ns) => !registry.includes(ns));
      const onlyRegistry = registry.filter((ns) => !zone.includes(ns));
      return [
        f(
          'ns_delegation_mismatch',
          'CRITICAL',
          'Name servers differ between the zone and the registry',
          `The zone publishes ${onlyZone.join(', ') || 'no extra servers'} while the registry delegates to ${onlyRegistry.join(', ') || 'no extra servers'}. Inconsistent delegation points to a stale or lame server that may answer for the zone.`,
          [
            { field: 'dns.records.NS', value: zone },
            { field: 'whois.nameServers', value: registry },
          ],
        ),
      ];
    },
  },
  {
    id: 'ns_single_server',
    evaluate: dnsRule((dns) =>
      dns.records.NS.length === 1
        ? [
            f(
              'ns_single_server',
              'WARNING',
              'Single authoritative name server',
              `Only ${dns.records.NS[0]} serves the zone; its outage or compromise takes the whole domain down.`,
              [{ field: 'dns.records.NS', value: dns.records.NS }],
            ),
          ]
        : [],
    ),
  },
  {
    id: 'mx_missing',
    evaluate: dnsRule((dns) =>
      dns.records.MX.length
        ? []
        : [
            f(
              'mx_missing',
              'INFO',
              'No MX records',
              'The domain publishes no MX records and may not be able to receive email.',
              [{ field: 'dns.records.MX', value: dns.records.MX }],
            ),
          ],
    ),
  },
  {
    id: 'spf_missing',
    evaluate: dnsRule((dns) =>
      spfRecords(dns).length
        ? []
        : [
            f(
              'spf_missing',
              'WARNING',
              'SPF record missing',
              refusesMail(dns)
                ? 'The domain declares a null MX but publishes no SPF record. Without "v=spf1 -all" anyone can send mail that claims to come from it.'
                : 'No v=spf1 TXT record is published, so receivers cannot tell which hosts may send on behalf of the domain.',
              [
                { field: 'dns.records.MX', value: dns.records.MX },
                { field: 'dns.records.TXT', value: dns.records.TXT },
              ],
            ),
          ],
    ),
  },
  {
    id: 'spf_permissive',
    evaluate: dnsRule((dns) =>
      spfRecords(dns).flatMap((spf) => {
        const all = spf
          .split(/\s+/)
          .find((term) => /^[+?~-]?all$/i.test(term));
        if (!all || all.startsWith('~') || all.startsWith('-')) return [];
        return [
          f(
            'spf_permissive',
            'CRITICAL',
            'SPF policy allows any sender',
            `The SPF record ends in "${all}", which lets any host send mail as this domain.`,
            [{ field: 'dns.records.TXT', value: spf }],
          ),
        ];
      }),
    ),
  },
  {
    id: 'spf_multiple',
    evaluate: dnsRule((dns) => {
      const spf = spfRecords(dns);
      return spf.length > 1
        ? [
            f(
              'spf_multiple',
              'WARNING',
              'Multiple SPF records',
              `${spf.length} v=spf1 records are published; receivers treat this as a permanent error and ignore SPF.`,
              [{ field: 'dns.records.TXT', value: spf }],
            ),
          ]
        : [];
    }),
  },
  {
    id: 'dmarc_missing',
    evaluate: dnsRule((dns) =>
      dns.records.DMARC.length
        ? []
        : [
            f(
              'dmarc_missing',
              'WARNING',
              'DMARC record missing',
              refusesMail(dns)
                ? 'The domain declares a null MX but has no DMARC record. Publish "v=DMARC1; p=reject" so forged mail in its name is refused.'
                : 'No v=DMARC1 record exists at _dmarc; receivers get no instruction for mail failing SPF or DKIM.',
              [{ field: 'dns.records.DMARC', value: dns.records.DMARC }],
            ),
          ],
    ),
  },
  {
    id: 'dmarc_policy_none',
    evaluate: dnsRule((dns) => {
      const record = dns.records.DMARC[0];
      if (record === undefined) return [];
      const policy = dmarcTags(record).get('p');
      if (policy && policy !== 'none') return [];
      return [
        f(
          'dmarc_policy_none',
          'CRITICAL',
          'DMARC policy does not enforce',
          policy
            ? 'The DMARC policy is p=none, so spoofed mail is still delivered.'
            : 'The DMARC record has no p= tag and is ignored by receivers.',
          [{ field: 'dns.records.DMARC', value: record }],
        ),
      ];
    }),
  },
  {
    id: 'dkim_missing',
    evaluate: dnsRule((dns) =>
      dns.records.DKIM.length
        ? []
        : [
            f(
              'dkim_missing',
              'WARNING',
              'No DKIM key found',
              'None of the probed DKIM selectors publishes a key. Outgoing mail may be unsigned, or signed under a selector that was not checked.',
              [{ field: 'dns.records.DKIM', value: dns.records.DKIM }],
            ),
          ],
    ),
  },
  {
    id: 'domain_expiry',
    evaluate: whoisRule((whois, { snapshot, policy }) => {
      if (!whois.expires) return [];
      const days = dayjs(whois.expires).diff(dayjs(snapshot.collectedAt), 'day');
      const evidence: Evidence[] = [
        { field: 'whois.expires', value: whois.expires.toISOString() },
      ];
      if (days < 0) {
        return [
          f(
            'domain_expiry',
            'CRITICAL',
            'Domain registration has expired',
            `The registration expired ${-days} day(s) ago; anyone may be able to register it once it is released.`,
            evidence,
          ),
        ];
      }
      if (days > policy.expiryWarningDays) return [];
      const critical = days <= policy.expiryCriticalDays;
      return [
        f(
          'domain_expiry',
          critical ? 'CRITICAL' : 'WARNING',
          critical
            ? 'Domain registration expires imminently'
            : 'Domain registration expires soon',
          `The registration expires in ${days} day(s). A lapse lets a third party register the domain and take over its mail and web traffic.`,
          evidence,
        ),
      ];
    }),
  },
  {
    id: 'whois_privacy_disabled',
    evaluate: whoisRule((whois) =>
      whois.privacyProtected
        ? []
        : [
            f(
              'whois_privacy_disabled',
              'INFO',
              'Registrant contact data is public',
              'The registry publishes registrant contact details, which can be harvested for phishing and social engineering.',
              [{ field: 'whois.privacyProtected', value: false }],
            ),
          ],
    ),
  },
  {
    id: 'dangling_cname',
    evaluate: dnsRule((dns) =>
      dns.records.CNAME.flatMap((target) => {
        const addresses = dns.cnameTargets[target] ?? [];
        if (addresses.length) return [];
        return [
          f(
            'dangling_cname',
            'WARNING',
            'CNAME points to a name that does not resolve',
            `The CNAME target ${target} has no A or AAAA records. If it belongs to a released cloud resource, whoever claims it serves content for this name.`,
            [
              { field: 'dns.records.CNAME', value: target },
              { field: `dns.cnameTargets.${target}`, value: addresses },
            ],
          ),
        ];
      }),
    ),
  },
  {
    id: 'caa_missing',
    evaluate: dnsRule((dns) =>
      dns.records.CAA.length
        ? []
        : [
            f(
              'caa_missing',
              'INFO',
              'No CAA record',
              'Any certificate authority may issue certificates for this domain.',
              [{ field: 'dns.records.CAA', value: dns.records.CAA }],
            ),
          ],
    ),
  },
  {
    id: 'soa_missing',
    evaluate: dnsRule((dns) =>
      dns.records.NS.length && !dns.records.SOA.length
        ? [
            f(
              'soa_missing',
              'WARNING',
              'No SOA record',
              'The zone has name servers but returns no SOA record, which indicates a broken zone configuration.',
              [
                { field: 'dns.records.NS', value: dns.records.NS },
                { field: 'dns.records.SOA', value: dns.records.SOA },
              ],
            ),
          ]
        : [],
    ),
  },
  {
    id: 'no_address_records',
    evaluate: dnsRule((dns) => {
      const { A, AAAA, CNAME } = dns.records;
      if (A.length || AAAA.length || CNAME.length) return [];
      return [
        f(
          'no_address_records',
          'INFO',
          'Domain has no address records',
          'Neither A, AAAA nor CNAME records exist; the name is not reachable over IPv4 or IPv6.',
          [
            { field: 'dns.records.A', value: A },
            { field: 'dns.records.AAAA', value: AAAA },
          ],
        ),
      ];
    }),
  },
];
