import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CaaRecord, MxRecord, SoaRecord } from 'node:dns';
import { Resolver } from 'node:dns/promises';
import { DnsLookupError } from '../common/errors';
import { DNS_OPTIONS, type DnsOptions } from '../config/scan.config';
import type { DnsRecords, RecordType } from '../scan/types';

/** The subset of `dns.promises.Resolver` the collector uses. */
export interface DnsResolver {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveMx(hostname: string): Promise<MxRecord[]>;
  resolveNs(hostname: string): Promise<string[]>;
  resolveTxt(hostname: string): Promise<string[][]>;
  resolveSoa(hostname: string): Promise<SoaRecord>;
  resolveCname(hostname: string): Promise<string[]>;
  resolveCaa(hostname: string): Promise<CaaRecord[]>;
  cancel(): void;
}

export const DNS_RESOLVER_FACTORY = Symbol('DNS_RESOLVER_FACTORY');
export type DnsResolverFactory = () => DnsResolver;

export function createSystemResolverFactory(
  opts: DnsOptions,
): DnsResolverFactory {
  return () => {
    const r = new Resolver({ timeout: opts.queryTimeoutMs, tries: 1 });
    if (opts.servers.length) r.setServers(opts.servers);
    return r;
  };
}

export type CollectOptions = { signal?: AbortSignal };

// "no such record" answers; anything else on the domain itself is a failure
const EMPTY_ON_DOMAIN = new Set(['ENODATA']);
// behind a CNAME the resolver follows the chain, so a missing target is NXDOMAIN
const EMPTY_BEHIND_CNAME = new Set(['ENODATA', 'ENOTFOUND']);
// auxiliary names (_dmarc, DKIM selectors, CNAME targets) may simply not exist
const EMPTY_ON_AUXILIARY = new Set(['ENODATA', 'ENOTFOUND', 'ESERVFAIL']);

function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    return typeof e.code === 'string' ? e.code : undefined;
  }
  return undefined;
}

const host = (h: string) => h.toLowerCase().replace(/\.$/, '');

function formatCaa(r: CaaRecord): string {
  const tags = [
    'issue',
    'issuewild',
    'iodef',
    'contactemail',
    'contactphone',
  ] as const;
  for (const tag of tags) {
    const value = r[tag];
    if (value !== undefined) return `${r.critical} ${tag} "${value}"`;
  }
  return `${r.critical}`;
}

@Injectable()
export class DnsCollector {
  private readonly logger = new Logger(DnsCollector.name);

  constructor(
    @Inject(DNS_RESOLVER_FACTORY)
    private readonly createResolver: DnsResolverFactory,
    @Inject(DNS_OPTIONS) private readonly opts: DnsOptions,
  ) {}

  async collect(
    domain: string,
    { signal }: CollectOptions = {},
  ): Promise<DnsRecords> {
    const resolver = this.createResolver();
    const cancel = () => resolver.cancel();
    signal?.addEventListener('abort', cancel, { once: true });

    try {
      const CNAME = await this.query(
        domain,
        domain,
        (n) => resolver.resolveCname(n),
        EMPTY_ON_DOMAIN,
      );
      signal?.throwIfAborted();
      const emptyOn = CNAME.length ? EMPTY_BEHIND_CNAME : EMPTY_ON_DOMAIN;
      const q = <T>(fn: (name: string) => Promise<T[]>) =>
        this.query(domain, domain, fn, emptyOn);

      const [A, AAAA, MX, NS, TXT, SOA, CAA] = await Promise.all([
        q((n) => resolver.resolve4(n)),
        q((n) => resolver.resolve6(n)),
        q((n) => resolver.resolveMx(n)),
        q((n) => resolver.resolveNs(n)),
        q((n) => resolver.resolveTxt(n)),
        q(async (n) => [await resolver.resolveSoa(n)]),
        q((n) => resolver.resolveCaa(n)),
      ]);

      const [DMARC, DKIM, cnameTargets] = await Promise.all([
        this.collectDmarc(domain, resolver),
        this.collectDkim(domain, resolver),
        this.resolveTargets(domain, CNAME.map(host), resolver),
      ]);

      const records: Record<RecordType, string[]> = {
        A,
        AAAA,
        MX: MX.map((m) => `${m.priority} ${host(m.exchange)}`),
        NS: NS.map(host),
        TXT: TXT.map((chunks) => chunks.join('')),
        SOA: SOA.map(
          (s) =>
            `${host(s.nsname)} ${host(s.hostmaster)} ${s.serial} ${s.refresh} ${s.retry} ${s.expire} ${s.minttl}`,
        ),
        CNAME: CNAME.map(host),
        CAA: CAA.map(formatCaa),
        DMARC,
        DKIM,
      };
      this.logger.debug(
        `${domain}: ${A.length} A, ${NS.length} NS, ${MX.length} MX, ${TXT.length} TXT`,
      );
      return Object.freeze({
        records: Object.freeze(records),
        cnameTargets: Object.freeze(cnameTargets),
      });
    } catch (e) {
      // Promise.all rejects on the first failure; drop the queries still out
      if (!signal?.aborted) resolver.cancel();
      throw e instanceof DnsLookupError ? e : new DnsLookupError(domain, e);
    } finally {
      signal?.removeEventListener('abort', cancel);
    }
  }

  private async collectDmarc(
    domain: string,
    resolver: DnsResolver,
  ): Promise<string[]> {
    const txt = await this.query(
      domain,
      `_dmarc.${domain}`,
      (n) => resolver.resolveTxt(n),
      EMPTY_ON_AUXILIARY,
    );
    return txt
      .map((chunks) => chunks.join(''))
      .filter((t) => /^v=dmarc1/i.test(t.trim()));
  }

  private async collectDkim(
    domain: string,
    resolver: DnsResolver,
  ): Promise<string[]> {
    const found: string[] = [];
    for (const sel of this.opts.dkimSelectors) {
      const txt = await this.query(
        domain,
        `${sel}._domainkey.${domain}`,
        (n) => resolver.resolveTxt(n),
        EMPTY_ON_AUXILIARY,
      );
      const key = txt
        .map((chunks) => chunks.join(''))
        .find((t) => /v=dkim1|(^|;)\s*p=/i.test(t));
      if (key) found.push(`${sel}: ${key}`);
    }
    return found;
  }

  private async resolveTargets(
    domain: string,
    targets: string[],
    resolver: DnsResolver,
  ): Promise<Record<string, string[]>> {
    const out: Record<string, string[]> = {};
    for (const target of targets) {
      const lookup = (fn: (name: string) => Promise<string[]>) =>
        this.query(domain, target, fn, EMPTY_ON_AUXILIARY);
      const [v4, v6] = await Promise.all([
        lookup((n) => resolver.resolve4(n)),
        lookup((n) => resolver.resolve6(n)),
      ]);
      out[target] = [...v4, ...v6];
    }
    return out;
  }

  private async query<T>(
    domain: string,
    name: string,
    fn: (name: string) => Promise<T[]>,
    emptyOn: ReadonlySet<string>,
  ): Promise<T[]> {
    try {
      return await fn(name);
    } catch (e) {
      const code = errorCode(e);
      if (code && emptyOn.has(code)) return [];
      throw new DnsLookupError(domain, e);
    }
  }
}
