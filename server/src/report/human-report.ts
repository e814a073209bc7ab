import { recommendationFor } from '../rules/recommendations';
import type {
  BatchResult,
  DomainScanResult,
  EvidenceValue,
  Finding,
  Severity,
} from '../scan/types';

const SECTIONS: { severity: Severity; heading: string }[] = [
  { severity: 'CRITICAL', heading: 'Critical' },
  { severity: 'WARNING', heading: 'Warning' },
  { severity: 'INFO', heading: 'Info' },
];

const cell = (s: string) => s.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');

function formatValue(v: EvidenceValue): string {
  if (v === null) return 'null';
  if (typeof v === 'string') return v || '""';
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return v.length ? v.join(', ') : '(none)';
}

const countOf = (r: DomainScanResult, severity: Severity) =>
  r.findings.filter((f) => f.severity === severity).length;

function findingTable(findings: Finding[]): string[] {
  return [
    '| Rule | Finding | Evidence |',
    '|---|---|---|',
    ...findings.map((f) => {
      const evidence = f.evidence
        .map((e) => `${e.field} = ${formatValue(e.value)}`)
        .join('; ');
      return `| \`${f.ruleId}\` | ${cell(f.title)} | ${cell(evidence)} |`;
    }),
  ];
}

function domainSection(r: DomainScanResult): string[] {
  const out = [`## ${r.domain}`, '', `Status: **${r.status}**`, ''];

  if (r.errors.length) {
    out.push('Lookup errors:', '');
    for (const e of r.errors) out.push(`- ${e.collector}: ${e.message}`);
    out.push('');
  }

  if (!r.findings.length) {
    out.push(
      r.status === 'FAILED'
        ? 'No data could be collected, so no rules were evaluated.'
        : 'No findings.',
      '',
    );
    return out;
  }

  for (const { severity, heading } of SECTIONS) {
    const group = r.findings.filter((f) => f.severity === severity);
    if (!group.length) continue;
    out.push(`### ${heading}`, '', ...findingTable(group), '');
  }

  out.push('### Remediation', '');
  const seen = new Set<string>();
  for (const f of r.findings) {
    if (seen.has(f.ruleId)) continue;
    seen.add(f.ruleId);
    out.push(
      `- **${f.ruleId}**: ${recommendationFor(f.ruleId) ?? f.description}`,
    );
  }
  out.push('');
  return out;
}

/** Markdown report: executive summary, then findings per domain. */
export function renderHumanReport(batch: BatchResult): string {
  const s = batch.summary;
  const results = [...batch.results.values()];
  const lines = [
    '# DNS Exposure Report',
    '',
    `Generated: ${batch.generatedAt.toISOString()}`,
    '',
    '## Executive summary',
    '',
    `Scanned ${results.length} domain(s): ${s.domainsOk} OK, ${s.domainsPartial} partial, ${s.domainsFailed} failed.`,
    `Findings: ${s.criticalCount} critical, ${s.warningCount} warning, ${s.infoCount} info.`,
    '',
  ];
  if (batch.cancelled) {
    lines.push(
      '> The scan was cancelled; only domains that completed are listed.',
      '',
    );
  }
  if (results.length) {
    lines.push(
      '| Domain | Status | Critical | Warning | Info |',
      '|---|---|---|---|---|',
      ...results.map(
        (r) =>
          `| ${r.domain} | ${r.status} | ${countOf(r, 'CRITICAL')} | ${countOf(r, 'WARNING')} | ${countOf(r, 'INFO')} |`,
      ),
      '',
    );
  }
  for (const r of results) lines.push(...domainSection(r));
  return lines.join('\n');
}
