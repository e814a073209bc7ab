import { Module } from '@nestjs/common';
import {
  createSystemResolverFactory,
  DNS_RESOLVER_FACTORY,
  DnsCollector,
} from '../collectors/dns.collector';
import { WhoisCollector } from '../collectors/whois.collector';
import {
  APP_ENVIRONMENT,
  DNS_OPTIONS,
  loadEnvironment,
  RDAP_OPTIONS,
  SCAN_DEFAULTS,
  type AppEnvironment,
  type DnsOptions,
} from '../config/scan.config';
import { ReportAggregator } from '../report/report.aggregator';
import { ReportWriter } from '../report/report.writer';
import { RuleEngine } from '../rules/rule-engine';
import { ScanController } from './scan.controller';
import { ScanOrchestrator } from './scan.orchestrator';

@Module({
  controllers: [ScanController],
  providers: [
    { provide: APP_ENVIRONMENT, useFactory: () => loadEnvironment() },
    {
      provide: SCAN_DEFAULTS,
      inject: [APP_ENVIRONMENT],
      useFactory: (env: AppEnvironment) => env.scan,
    },
    {
      provide: DNS_OPTIONS,
      inject: [APP_ENVIRONMENT],
      useFactory: (env: AppEnvironment) => env.dns,
    },
    {
      provide: RDAP_OPTIONS,
      inject: [APP_ENVIRONMENT],
      useFactory: (env: AppEnvironment) => env.rdap,
    },
    {
      provide: DNS_RESOLVER_FACTORY,
      inject: [DNS_OPTIONS],
      useFactory: (opts: DnsOptions) => createSystemResolverFactory(opts),
    },
    DnsCollector,
    WhoisCollector,
    RuleEngine,
    ReportAggregator,
    ReportWriter,
    ScanOrchestrator,
  ],
  exports: [APP_ENVIRONMENT, ScanOrchestrator, ReportWriter],
})
export class ScanModule {}
