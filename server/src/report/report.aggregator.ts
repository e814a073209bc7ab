import { Injectable } from '@nestjs/common';
import type {
  BatchResult,
  DomainScanResult,
  ScanSummary,
} from '../scan/types';

@Injectable()
export class ReportAggregator {
  /** Full recount over the results; never updated incrementally. */
  summarize(results: Iterable<DomainScanResult>): ScanSummary {
    const summary: ScanSummary = {
      criticalCount: 0,
      warningCount: 0,
      infoCount: 0,
      domainsOk: 0,
      domainsPartial: 0,
      domainsFailed: 0,
    };
    for (const r of results) {
      if (r.status === 'OK') summary.domainsOk++;
      else if (r.status === 'PARTIAL') summary.domainsPartial++;
      else summary.domainsFailed++;

      for (const finding of r.findings) {
        if (finding.severity === 'CRITICAL') summary.criticalCount++;
        else if (finding.severity === 'WARNING') summary.warningCount++;
        else summary.infoCount++;
      }
    }
    return summary;
  }

  /**
   * Assembles the batch from index-addressed slots. Empty slots (domains
   * that never finished because the batch was cancelled) are left out.
   */
  build(
    domains: readonly string[],
    slots: ReadonlyArray<DomainScanResult | undefined>,
    cancelled = false,
  ): BatchResult {
    const results = new Map<string, DomainScanResult>();
    domains.forEach((domain, i) => {
      const r = slots[i];
      if (r) results.set(domain, r);
    });
    return {
      results,
      summary: this.summarize(results.values()),
      cancelled,
      generatedAt: new Date(),
    };
  }
}
