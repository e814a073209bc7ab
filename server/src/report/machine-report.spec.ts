import { sampleBatch } from '../test-utils/snapshots';
import { toMachineReport } from './machine-report';

describe('toMachineReport', () => {
  const report = toMachineReport(sampleBatch());

  it('carries the batch metadata and summary', () => {
    expect(report.generated_at).toBe('2026-03-01T12:00:00.000Z');
    expect(report.cancelled).toBe(false);
    expect(report.summary).toEqual({
      critical_count: 1,
      warning_count: 0,
      info_count: 1,
      domains_ok: 1,
      domains_partial: 0,
      domains_failed: 1,
    });
  });

  it('nests domains beside the batch metadata, in batch order', () => {
    expect(Object.keys(report)).toEqual([
      'generated_at',
      'cancelled',
      'domains',
      'summary',
    ]);
    expect(Object.keys(report.domains)).toEqual(['example.com', 'broken.example']);
  });

  it('serializes a scanned domain', () => {
    expect(report.domains['example.com']).toEqual({
      status: 'OK',
      dns: {
        A: ['192.0.2.1'],
        AAAA: [],
        MX: [],
        NS: [],
        TXT: ['v=spf1 +all'],
        SOA: [],
        CNAME: [],
        CAA: [],
        DMARC: [],
        DKIM: [],
      },
      whois: {
        registrar: 'Example Registrar',
        created: '2010-01-01T00:00:00.000Z',
        expires: '2030-01-01T00:00:00.000Z',
        privacy_protected: true,
        name_servers: [],
      },
      findings: [
        {
          rule_id: 'spf_permissive',
          severity: 'CRITICAL',
          title: 'spf_permissive title',
          description: 'spf_permissive description',
          evidence: [{ field: 'dns.records.TXT', value: 'v=spf1 +all' }],
        },
        {
          rule_id: 'caa_missing',
          severity: 'INFO',
          title: 'caa_missing title',
          description: 'caa_missing description',
          evidence: [{ field: 'dns.records.CAA', value: [] }],
        },
      ],
      errors: [],
    });
  });

  it('serializes a failed domain with null sections and its errors', () => {
    expect(report.domains['broken.example']).toEqual({
      status: 'FAILED',
      dns: null,
      whois: null,
      findings: [],
      errors: [
        { collector: 'dns', message: 'query ENOTFOUND broken.example' },
        { collector: 'whois', message: 'domain not found in registry' },
      ],
    });
  });

  it('survives a JSON round trip unchanged', () => {
    expect(JSON.parse(JSON.stringify(report))).toEqual(report);
  });
});
