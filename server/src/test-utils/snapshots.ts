import { DnsLookupError, WhoisLookupError } from '../common/errors';
import type {
  BatchResult,
  DnsRecords,
  DomainScanResult,
  DomainSnapshot,
  Evidence,
  Finding,
  RecordType,
  ScanStatus,
  Severity,
  WhoisRecord,
} from '../scan/types';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export function dnsRecords(
  records: Partial<Record<RecordType, string[]>> = {},
  cnameTargets: Record<string, string[]> = {},
): DnsRecords {
  return {
    records: {
      A: [],
      AAAA: [],
      MX: [],
      NS: [],
      TXT: [],
      SOA: [],
      CNAME: [],
      CAA: [],
      DMARC: [],
      DKIM: [],
      ...records,
    },
    cnameTargets,
  };
}

export function whoisRecord(over: Partial<WhoisRecord> = {}): WhoisRecord {
  return {
    registrar: 'Example Registrar',
    created: new Date('2010-01-01T00:00:00.000Z'),
    expires: new Date('2030-01-01T00:00:00.000Z'),
    nameServers: [],
    privacyProtected: true,
    ...over,
  };
}

export function snapshotOf(
  parts: { dns?: DnsRecords | null; whois?: WhoisRecord | null },
  domain = 'example.com',
): DomainSnapshot {
  return {
    domain,
    collectedAt: NOW,
    dns: parts.dns ?? null,
    whois: parts.whois ?? null,
  };
}

/** A well-configured domain that no rule flags. */
export function healthyDns(): DnsRecords {
  return dnsRecords({
    A: ['192.0.2.10'],
    MX: ['10 mx1.example.com'],
    NS: ['ns1.example.com', 'ns2.example.com'],
    TXT: ['v=spf1 include:_spf.example.com -all'],
    SOA: ['ns1.example.com hostmaster.example.com 2026010101 7200 3600 1209600 300'],
    CAA: ['0 issue "letsencrypt.org"'],
    DMARC: ['v=DMARC1; p=reject; rua=mailto:dmarc@example.com'],
    DKIM: ['selector1: v=DKIM1; k=rsa; p=MIGfMA0GCSqGSIb3DQEBAQUAA4GNADCBiQKBgQC'],
  });
}

export function finding(
  ruleId: string,
  severity: Severity,
  evidence: Evidence[] = [],
): Finding {
  return {
    ruleId,
    severity,
    title: `${ruleId} title`,
    description: `${ruleId} description`,
    evidence,
  };
}

export function resultOf(
  domain: string,
  status: ScanStatus,
  findings: Finding[] = [],
): DomainScanResult {
  return {
    domain,
    status,
    findings,
    errors: [],
    snapshot: snapshotOf({}, domain),
  };
}

/** One clean domain with two findings and one domain where every lookup failed. */
export function sampleBatch(): BatchResult {
  const ok: DomainScanResult = {
    domain: 'example.com',
    status: 'OK',
    snapshot: snapshotOf({
      dns: dnsRecords({ A: ['192.0.2.1'], TXT: ['v=spf1 +all'] }),
      whois: whoisRecord(),
    }),
    findings: [
      finding('spf_permissive', 'CRITICAL', [
        { field: 'dns.records.TXT', value: 'v=spf1 +all' },
      ]),
      finding('caa_missing', 'INFO', [{ field: 'dns.records.CAA', value: [] }]),
    ],
    errors: [],
  };
  const failed: DomainScanResult = {
    domain: 'broken.example',
    status: 'FAILED',
    snapshot: snapshotOf({}, 'broken.example'),
    findings: [],
    errors: [
      new DnsLookupError(
        'broken.example',
        new Error('query ENOTFOUND broken.example'),
      ),
      new WhoisLookupError(
        'broken.example',
        new Error('domain not found in registry'),
      ),
    ],
  };
  return {
    results: new Map([
      [ok.domain, ok],
      [failed.domain, failed],
    ]),
    summary: {
      criticalCount: 1,
      warningCount: 0,
      infoCount: 1,
      domainsOk: 1,
      domainsPartial: 0,
      domainsFailed: 1,
    },
    cancelled: false,
    generatedAt: NOW,
  };
}
