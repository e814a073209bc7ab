import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError, WhoisLookupError } from '../common/errors';
import { RDAP_OPTIONS, type RdapOptions } from '../config/scan.config';
import type { WhoisRecord } from '../scan/types';
import type { CollectOptions } from './dns.collector';
import {
  parseRdapDomain,
  rdapBootstrapSchema,
  rdapServersFor,
  type RdapBootstrap,
} from './rdap';

const RDAP_ACCEPT = 'application/rdap+json, application/json';
const BOOTSTRAP_TIMEOUT_MS = 30_000;

async function getJson(url: string, signal?: AbortSignal): Promise<unknown> {
  const r = await fetch(url, {
    headers: { accept: RDAP_ACCEPT },
    redirect: 'follow',
    signal,
  });
  if (r.status === 429) throw new Error(`rate limited by ${new URL(url).host}`);
  if (r.status === 404) throw new Error('domain not found in registry');
  if (!r.ok) throw new Error(`RDAP HTTP ${r.status} from ${new URL(url).host}`);
  try {
    return await r.json();
  } catch (e) {
    throw new Error(`invalid JSON from ${new URL(url).host}`, { cause: e });
  }
}

/** Registration data through RDAP, the structured successor of WHOIS. */
@Injectable()
export class WhoisCollector {
  private readonly logger = new Logger(WhoisCollector.name);
  private bootstrap?: Promise<RdapBootstrap>;

  constructor(@Inject(RDAP_OPTIONS) private readonly opts: RdapOptions) {}

  async collect(
    domain: string,
    { signal }: CollectOptions = {},
  ): Promise<WhoisRecord> {
    try {
      const servers = rdapServersFor(await this.loadBootstrap(), domain);
      if (!servers.length) {
        throw new Error(`no RDAP service for .${domain.split('.').pop()}`);
      }

      let lastError: unknown;
      for (const base of servers) {
        try {
          const body = await getJson(
            `${base}domain/${encodeURIComponent(domain)}`,
            signal,
          );
          const record = parseRdapDomain(body);
          this.logger.debug(
            `${domain}: registrar=${record.registrar ?? '-'} expires=${record.expires?.toISOString() ?? '-'}`,
          );
          return record;
        } catch (e) {
          if (signal?.aborted) throw e;
          this.logger.debug(`${domain}: ${base} failed: ${describeError(e)}`);
          lastError = e;
        }
      }
      throw lastError;
    } catch (e) {
      throw new WhoisLookupError(domain, e);
    }
  }

  // shared by every domain, so it is not tied to one scan's signal
  private loadBootstrap(): Promise<RdapBootstrap> {
    if (!this.bootstrap) {
      const signal = AbortSignal.timeout(BOOTSTRAP_TIMEOUT_MS);
      this.bootstrap = getJson(this.opts.bootstrapUrl, signal).then(
        (body) => rdapBootstrapSchema.parse(body),
      );
      // a failed load is retried by the next lookup
      this.bootstrap.catch(() => {
        this.bootstrap = undefined;
      });
    }
    return this.bootstrap;
  }
}
