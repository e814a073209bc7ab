import type { CollectorError } from '../common/errors';

export type Severity = 'CRITICAL' | 'WARNING' | 'INFO';

/** Presentation order: lower rank first. */
export const SEVERITY_RANK: Record<Severity, number> = {
  CRITICAL: 0,
  WARNING: 1,
  INFO: 2,
};

export const RECORD_TYPES = [
  'A',
  'AAAA',
  'MX',
  'NS',
  'TXT',
  'SOA',
  'CNAME',
  'CAA',
  'DMARC',
  'DKIM',
] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

export type DnsRecords = {
  records: Readonly<Record<RecordType, readonly string[]>>;
  /** A/AAAA addresses per CNAME target; empty when the target did not resolve. */
  cnameTargets: Readonly<Record<string, readonly string[]>>;
};

export type WhoisRecord = {
  registrar: string | null;
  created: Date | null;
  /** null: the registry publishes no expiration event. */
  expires: Date | null;
  nameServers: readonly string[];
  privacyProtected: boolean;
};

export type DomainSnapshot = {
  readonly domain: string;
  readonly collectedAt: Date;
  /** null when the DNS collector failed. */
  readonly dns: DnsRecords | null;
  /** null when the WHOIS collector failed. */
  readonly whois: WhoisRecord | null;
};

export type EvidenceValue = string | number | boolean | null | readonly string[];

export type Evidence = {
  /** Snapshot path, e.g. `dns.records.TXT` or `whois.expires`. */
  field: string;
  value: EvidenceValue;
};

export type Finding = {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly title: string;
  readonly description: string;
  readonly evidence: readonly Evidence[];
};

export type ScanStatus = 'OK' | 'PARTIAL' | 'FAILED';

export type DomainScanResult = {
  domain: string;
  snapshot: DomainSnapshot;
  findings: readonly Finding[];
  status: ScanStatus;
  errors: readonly CollectorError[];
};

export type ScanSummary = {
  criticalCount: number;
  warningCount: number;
  infoCount: number;
  domainsOk: number;
  domainsPartial: number;
  domainsFailed: number;
};

export type BatchResult = {
  /** Keyed by domain, in the caller's requested order. */
  results: ReadonlyMap<string, DomainScanResult>;
  summary: ScanSummary;
  /** True when the batch was aborted before every domain finished. */
  cancelled: boolean;
  generatedAt: Date;
};

export type ScanConfig = {
  threadCount: number;
  perDomainTimeoutMs: number;
  expiryWarningDays: number;
  expiryCriticalDays: number;
};

/** Per-domain progress item, emitted in completion order. */
export type ScanProgress = {
  index: number;
  result: DomainScanResult;
};
