import type {
  BatchResult,
  DomainScanResult,
  EvidenceValue,
  ScanStatus,
  ScanSummary,
  Severity,
} from '../scan/types';

export type MachineFinding = {
  rule_id: string;
  severity: Severity;
  title: string;
  description: string;
  evidence: { field: string; value: EvidenceValue }[];
};

export type MachineDomainReport = {
  status: ScanStatus;
  dns: Record<string, string[]> | null;
  whois: {
    registrar: string | null;
    created: string | null;
    expires: string | null;
    privacy_protected: boolean;
    name_servers: string[];
  } | null;
  findings: MachineFinding[];
  errors: { collector: string; message: string }[];
};

export type MachineSummary = {
  critical_count: number;
  warning_count: number;
  info_count: number;
  domains_ok: number;
  domains_partial: number;
  domains_failed: number;
};

export type MachineReport = {
  generated_at: string;
  cancelled: boolean;
  domains: Record<string, MachineDomainReport>;
  summary: MachineSummary;
};

export function domainReport(r: DomainScanResult): MachineDomainReport {
  const { dns, whois } = r.snapshot;
  return {
    status: r.status,
    dns: dns
      ? Object.fromEntries(
          Object.entries(dns.records).map(([type, values]) => [
            type,
            [...values],
          ]),
        )
      : null,
    whois: whois
      ? {
          registrar: whois.registrar,
          created: whois.created?.toISOString() ?? null,
          expires: whois.expires?.toISOString() ?? null,
          privacy_protected: whois.privacyProtected,
          name_servers: [...whois.nameServers],
        }
      : null,
    findings: r.findings.map((f) => ({
      rule_id: f.ruleId,
      severity: f.severity,
      title: f.title,
      description: f.description,
      evidence: f.evidence.map((e) => ({ field: e.field, value: e.value })),
    })),
    errors: r.errors.map((e) => ({
      collector: e.collector,
      message: e.message,
    })),
  };
}

export function machineSummary(s: ScanSummary): MachineSummary {
  return {
    critical_count: s.criticalCount,
    warning_count: s.warningCount,
    info_count: s.infoCount,
    domains_ok: s.domainsOk,
    domains_partial: s.domainsPartial,
    domains_failed: s.domainsFailed,
  };
}

/** JSON-ready view of a batch; domains keep the batch's order. */
export function toMachineReport(batch: BatchResult): MachineReport {
  const domains: Record<string, MachineDomainReport> = {};
  for (const [domain, result] of batch.results) {
    domains[domain] = domainReport(result);
  }
  return {
    generated_at: batch.generatedAt.toISOString(),
    cancelled: batch.cancelled,
    domains,
    summary: machineSummary(batch.summary),
  };
}
