import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { lastValueFrom } from 'rxjs';
import { toArray } from 'rxjs/operators';
import {
  DnsCollector,
  type CollectOptions,
} from '../collectors/dns.collector';
import { WhoisCollector } from '../collectors/whois.collector';
import {
  ConfigurationError,
  DnsLookupError,
  LookupCancelledError,
  LookupTimeoutError,
  WhoisLookupError,
} from '../common/errors';
import { DEFAULT_SCAN_CONFIG, SCAN_DEFAULTS } from '../config/scan.config';
import { ReportAggregator } from '../report/report.aggregator';
import { RuleEngine } from '../rules/rule-engine';
import { healthyDns, whoisRecord } from '../test-utils/snapshots';
import { ScanOrchestrator } from './scan.orchestrator';
import type { DnsRecords, WhoisRecord } from './types';

type Collect<T> = (domain: string, opts: CollectOptions) => Promise<T>;

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    const t = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(t);
        reject(signal.reason);
      },
      { once: true },
    );
  });

const untilAborted = (signal?: AbortSignal) =>
  new Promise<never>((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), {
      once: true,
    });
  });

describe('ScanOrchestrator', () => {
  let orchestrator: ScanOrchestrator;
  let rules: RuleEngine;
  let dnsImpl: Collect<DnsRecords>;
  let whoisImpl: Collect<WhoisRecord>;
  const dns = {
    collect: jest.fn((domain: string, opts: CollectOptions = {}) =>
      dnsImpl(domain, opts),
    ),
  };
  const whois = {
    collect: jest.fn((domain: string, opts: CollectOptions = {}) =>
      whoisImpl(domain, opts),
    ),
  };

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dns.collect.mockClear();
    whois.collect.mockClear();
    dnsImpl = async () => healthyDns();
    whoisImpl = async () => whoisRecord();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ScanOrchestrator,
        RuleEngine,
        ReportAggregator,
        { provide: DnsCollector, useValue: dns },
        { provide: WhoisCollector, useValue: whois },
        { provide: SCAN_DEFAULTS, useValue: DEFAULT_SCAN_CONFIG },
      ],
    }).compile();

    orchestrator = moduleRef.get(ScanOrchestrator);
    rules = moduleRef.get(RuleEngine);
  });

  it('reports results in input order regardless of completion order', async () => {
    const delays: Record<string, number> = {
      'slow.example': 60,
      'mid.example': 30,
      'fast.example': 0,
    };
    dnsImpl = async (domain) => {
      await sleep(delays[domain]);
      return healthyDns();
    };

    const batch = await orchestrator.scan(
      ['slow.example', 'mid.example', 'fast.example'],
      { threadCount: 3 },
    );

    expect([...batch.results.keys()]).toEqual([
      'slow.example',
      'mid.example',
      'fast.example',
    ]);
    expect(batch.cancelled).toBe(false);
    expect(batch.summary.domainsOk).toBe(3);
  });

  it('streams results as they complete', async () => {
    const delays: Record<string, number> = {
      'slow.example': 60,
      'mid.example': 30,
      'fast.example': 0,
    };
    dnsImpl = async (domain) => {
      await sleep(delays[domain]);
      return healthyDns();
    };

    const progress = await lastValueFrom(
      orchestrator
        .scan$(['slow.example', 'mid.example', 'fast.example'], {
          threadCount: 3,
        })
        .pipe(toArray()),
    );

    expect(progress.map((p) => [p.index, p.result.domain])).toEqual([
      [2, 'fast.example'],
      [1, 'mid.example'],
      [0, 'slow.example'],
    ]);
  });

  it('keeps one collector failure from affecting other domains', async () => {
    whoisImpl = async (domain) => {
      if (domain === 'b.example') throw new Error('rate limited by rdap.test');
      return whoisRecord();
    };

    const batch = await orchestrator.scan(['a.example', 'b.example']);
    const a = batch.results.get('a.example');
    const b = batch.results.get('b.example');

    expect(a?.status).toBe('OK');
    expect(a?.errors).toEqual([]);
    expect(b?.status).toBe('PARTIAL');
    expect(b?.errors).toHaveLength(1);
    expect(b?.errors[0]).toBeInstanceOf(WhoisLookupError);
    expect(b?.errors[0].collector).toBe('whois');
    expect(b?.errors[0].message).toBe('rate limited by rdap.test');
    expect(b?.snapshot.whois).toBeNull();
    expect(b?.snapshot.dns).not.toBeNull();
  });

  it('does not evaluate rules for a domain where every collector failed', async () => {
    const evaluate = jest.spyOn(rules, 'evaluate');
    dnsImpl = async (domain) => {
      if (domain === 'dead.example') {
        throw new DnsLookupError(domain, new Error('queryA ENOTFOUND'));
      }
      return healthyDns();
    };
    whoisImpl = async (domain) => {
      if (domain === 'dead.example') throw new Error('domain not found in registry');
      return whoisRecord();
    };

    const batch = await orchestrator.scan(['live.example', 'dead.example']);
    const dead = batch.results.get('dead.example');

    expect(dead?.status).toBe('FAILED');
    expect(dead?.findings).toEqual([]);
    expect(dead?.errors.map((e) => e.collector)).toEqual(['dns', 'whois']);
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(evaluate.mock.calls[0][0].domain).toBe('live.example');
    expect(batch.summary.domainsFailed).toBe(1);
    expect(batch.summary.domainsOk).toBe(1);
  });

  it('records a lookup that outlives its timeout as a collector error', async () => {
    let seen: AbortSignal | undefined;
    dnsImpl = (_domain, { signal }) => {
      seen = signal;
      return new Promise<DnsRecords>(() => undefined);
    };

    const batch = await orchestrator.scan(['hang.example'], {
      perDomainTimeoutMs: 50,
    });
    const r = batch.results.get('hang.example');

    expect(r?.status).toBe('PARTIAL');
    expect(r?.errors[0]).toBeInstanceOf(DnsLookupError);
    expect(r?.errors[0].cause).toBeInstanceOf(LookupTimeoutError);
    expect(r?.errors[0].message).toBe('lookup timed out after 50ms');
    expect(seen?.aborted).toBe(true);
  });

  it('never runs more domains at once than the thread count', async () => {
    let inFlight = 0;
    let peak = 0;
    dnsImpl = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(20);
      inFlight--;
      return healthyDns();
    };

    const domains = Array.from({ length: 6 }, (_, i) => `d${i}.example`);
    const batch = await orchestrator.scan(domains, { threadCount: 2 });

    expect(batch.results.size).toBe(6);
    expect(peak).toBe(2);
  });

  it.each([
    [[], 'no domains to scan'],
    [['not a domain'], 'malformed domain name: not a domain'],
  ])('rejects %j before any lookup', async (domains, message) => {
    await expect(orchestrator.scan(domains)).rejects.toThrow(message);
    await expect(orchestrator.scan(domains)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(dns.collect).not.toHaveBeenCalled();
    expect(whois.collect).not.toHaveBeenCalled();
  });

  it('rejects an invalid thread count', async () => {
    await expect(
      orchestrator.scan(['a.example'], { threadCount: 0 }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(() => orchestrator.scan$(['a.example'], { threadCount: -1 })).toThrow(
      ConfigurationError,
    );
    expect(dns.collect).not.toHaveBeenCalled();
  });

  it('scans each distinct domain once', async () => {
    const batch = await orchestrator.scan([
      'Example.com',
      'example.com.',
      'https://example.com/login',
    ]);

    expect([...batch.results.keys()]).toEqual(['example.com']);
    expect(dns.collect).toHaveBeenCalledTimes(1);
    expect(whois.collect).toHaveBeenCalledTimes(1);
  });

  describe('cancellation', () => {
    it('returns completed domains and stops scheduling new ones', async () => {
      const ac = new AbortController();
      let inFlightSignal: AbortSignal | undefined;
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        markStarted = resolve;
      });
      dnsImpl = async (domain, { signal }) => {
        if (domain !== 'd2.example') return healthyDns();
        inFlightSignal = signal;
        markStarted();
        return untilAborted(signal);
      };

      const pending = orchestrator.scan(
        ['d1.example', 'd2.example', 'd3.example'],
        { threadCount: 1 },
        ac.signal,
      );
      await started;
      ac.abort();
      const batch = await pending;

      expect(batch.cancelled).toBe(true);
      expect([...batch.results.keys()]).toEqual(['d1.example']);
      expect(batch.summary.domainsOk).toBe(1);
      expect(inFlightSignal?.aborted).toBe(true);
      expect(inFlightSignal?.reason).toBeInstanceOf(LookupCancelledError);
      expect(dns.collect.mock.calls.map(([d]) => d)).toEqual([
        'd1.example',
        'd2.example',
      ]);
    });

    it('starts nothing when the signal is already aborted', async () => {
      const ac = new AbortController();
      ac.abort();

      const batch = await orchestrator.scan(['a.example'], {}, ac.signal);

      expect(batch.cancelled).toBe(true);
      expect(batch.results.size).toBe(0);
      expect(dns.collect).not.toHaveBeenCalled();
    });
  });
});
