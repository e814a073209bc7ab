import { Inject, Injectable, Logger } from '@nestjs/common';
import { defer, EMPTY, from, lastValueFrom, Observable } from 'rxjs';
import { map, mergeMap, takeUntil, tap } from 'rxjs/operators';
import { DnsCollector } from '../collectors/dns.collector';
import { WhoisCollector } from '../collectors/whois.collector';
import { withDeadline } from '../common/deadline';
import {
  CollectorError,
  DnsLookupError,
  WhoisLookupError,
  type CollectorName,
} from '../common/errors';
import { parseScanConfig, SCAN_DEFAULTS } from '../config/scan.config';
import { ReportAggregator } from '../report/report.aggregator';
import { RuleEngine } from '../rules/rule-engine';
import { parseDomainList } from './domain-name';
import type {
  BatchResult,
  DomainScanResult,
  DomainSnapshot,
  Finding,
  ScanConfig,
  ScanProgress,
  ScanStatus,
} from './types';

export type ScanPlan = {
  domains: string[];
  config: ScanConfig;
};

function aborted$(signal?: AbortSignal): Observable<void> {
  return new Observable<void>((sub) => {
    if (!signal) return;
    const onAbort = () => sub.next();
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  });
}

function statusOf(dnsOk: boolean, whoisOk: boolean): ScanStatus {
  if (dnsOk && whoisOk) return 'OK';
  if (dnsOk || whoisOk) return 'PARTIAL';
  return 'FAILED';
}

@Injectable()
export class ScanOrchestrator {
  private readonly logger = new Logger(ScanOrchestrator.name);

  constructor(
    private readonly dns: DnsCollector,
    private readonly whois: WhoisCollector,
    private readonly rules: RuleEngine,
    private readonly aggregator: ReportAggregator,
    @Inject(SCAN_DEFAULTS) private readonly defaults: ScanConfig,
  ) {}

  /** Validates input; throws ConfigurationError before anything is scheduled. */
  plan(
    domains: readonly string[],
    config: Partial<ScanConfig> = {},
  ): ScanPlan {
    return {
      domains: parseDomainList(domains),
      config: parseScanConfig(config, this.defaults),
    };
  }

  /**
   * Scans every domain and resolves once all of them have terminated. On
   * abort, returns the domains that had completed, still in input order.
   */
  async scan(
    domains: readonly string[],
    config: Partial<ScanConfig> = {},
    signal?: AbortSignal,
  ): Promise<BatchResult> {
    const plan = this.plan(domains, config);
    const slots = Array.from(
      { length: plan.domains.length },
      (): DomainScanResult | undefined => undefined,
    );

    this.logger.log(
      `scanning ${plan.domains.length} domain(s) with ${plan.config.threadCount} worker(s)`,
    );
    await lastValueFrom(
      this.run$(plan, signal).pipe(
        tap(({ index, result }) => {
          slots[index] = result;
        }),
      ),
      { defaultValue: undefined },
    );

    const done = slots.filter(Boolean).length;
    const cancelled = done < plan.domains.length;
    if (cancelled) {
      this.logger.warn(
        `scan cancelled after ${done}/${plan.domains.length} domain(s)`,
      );
    }
    return this.aggregator.build(plan.domains, slots, cancelled);
  }

  /** Per-domain results in completion order; validates input eagerly. */
  scan$(
    domains: readonly string[],
    config: Partial<ScanConfig> = {},
    signal?: AbortSignal,
  ): Observable<ScanProgress> {
    return this.run$(this.plan(domains, config), signal);
  }

  private run$(plan: ScanPlan, signal?: AbortSignal): Observable<ScanProgress> {
    return defer(() =>
      signal?.aborted
        ? EMPTY
        : from(plan.domains).pipe(
            mergeMap(
              (domain, index) =>
                defer(() => this.scanDomain(domain, plan.config, signal)).pipe(
                  map((result) => ({ index, result })),
                ),
              plan.config.threadCount,
            ),
            takeUntil(aborted$(signal)),
          ),
    );
  }

  /** Collects and classifies one domain; lookup failures land in `errors`. */
  async scanDomain(
    domain: string,
    config: ScanConfig,
    signal?: AbortSignal,
  ): Promise<DomainScanResult> {
    const errors: CollectorError[] = [];
    const attempt = async <T>(
      collector: CollectorName,
      task: (signal: AbortSignal) => Promise<T>,
    ): Promise<T | null> => {
      try {
        return await withDeadline(task, config.perDomainTimeoutMs, signal);
      } catch (e) {
        const err =
          e instanceof CollectorError
            ? e
            : collector === 'dns'
              ? new DnsLookupError(domain, e)
              : new WhoisLookupError(domain, e);
        this.logger.warn(
          `${domain}: ${collector} lookup failed: ${err.message}`,
        );
        errors.push(err);
        return null;
      }
    };

    const dns = await attempt('dns', (s) =>
      this.dns.collect(domain, { signal: s }),
    );
    const whois = await attempt('whois', (s) =>
      this.whois.collect(domain, { signal: s }),
    );

    const snapshot: DomainSnapshot = Object.freeze({
      domain,
      collectedAt: new Date(),
      dns,
      whois,
    });
    const status = statusOf(dns !== null, whois !== null);
    // a FAILED domain has no data to classify
    const findings: Finding[] =
      status === 'FAILED' ? [] : this.rules.evaluate(snapshot, config);

    this.logger.log(`${domain}: ${status}, ${findings.length} finding(s)`);
    return {
      domain,
      snapshot,
      findings: Object.freeze(findings),
      status,
      errors: Object.freeze(errors),
    };
  }
}
