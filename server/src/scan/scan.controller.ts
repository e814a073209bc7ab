import {
  BadRequestException,
  Controller,
  Get,
  MessageEvent,
  Query,
  Res,
  Sse,
} from '@nestjs/common';
import { concat, defer, Observable, of } from 'rxjs';
import { finalize, map, tap } from 'rxjs/operators';
import { ReportAggregator } from '../report/report.aggregator';
import {
  domainReport,
  machineSummary,
  toMachineReport,
  type MachineReport,
} from '../report/machine-report';
import { splitDomainArg } from './domain-name';
import { ScanOrchestrator } from './scan.orchestrator';
import type { DomainScanResult, ScanConfig } from './types';

/** The part of the HTTP response the handler watches; Express's satisfies it. */
type ClientConnection = {
  readonly writableFinished: boolean;
  on(event: 'close', listener: () => void): unknown;
};

type ScanQuery = {
  domains?: string;
  threads?: string;
  timeout?: string;
};

function toConfig(q: ScanQuery): Partial<ScanConfig> {
  return {
    threadCount: q.threads ? Number(q.threads) : undefined,
    perDomainTimeoutMs: q.timeout ? Number(q.timeout) : undefined,
  };
}

function requireDomains(q: ScanQuery): string[] {
  if (!q.domains) throw new BadRequestException('domains is required');
  return splitDomainArg(q.domains);
}

@Controller('api/scan')
export class ScanController {
  constructor(
    private readonly orchestrator: ScanOrchestrator,
    private readonly aggregator: ReportAggregator,
  ) {}

  @Get()
  async scan(
    @Query() q: ScanQuery,
    @Res({ passthrough: true }) res: ClientConnection,
  ): Promise<MachineReport> {
    const ac = new AbortController();
    // client went away before the batch finished
    res.on('close', () => {
      if (!res.writableFinished) ac.abort();
    });
    const batch = await this.orchestrator.scan(
      requireDomains(q),
      toConfig(q),
      ac.signal,
    );
    return toMachineReport(batch);
  }

  @Sse('stream')
  stream(@Query() q: ScanQuery): Observable<MessageEvent> {
    const plan = this.orchestrator.plan(requireDomains(q), toConfig(q));
    const ac = new AbortController();
    const done: DomainScanResult[] = [];

    return concat(
      of<MessageEvent>({ data: { type: 'start', domains: plan.domains } }),
      this.orchestrator.scan$(plan.domains, plan.config, ac.signal).pipe(
        tap(({ result }) => done.push(result)),
        map(
          ({ index, result }): MessageEvent => ({
            data: {
              type: 'result',
              index,
              domain: result.domain,
              payload: domainReport(result),
            },
          }),
        ),
      ),
      defer(() =>
        of<MessageEvent>({
          data: {
            type: 'summary',
            summary: machineSummary(this.aggregator.summarize(done)),
          },
        }),
      ),
    ).pipe(finalize(() => ac.abort()));
  }
}
