#!/usr/bin/env node
import 'reflect-metadata';
import {
  Logger,
  type INestApplicationContext,
  type LogLevel,
} from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'node:util';
import { AppModule } from './app.module';
import { ConfigurationError, describeError } from './common/errors';
import { ReportWriter } from './report/report.writer';
import { splitDomainArg } from './scan/domain-name';
import { ScanOrchestrator } from './scan/scan.orchestrator';
import type { BatchResult, ScanConfig } from './scan/types';

export const EXIT_OK = 0;
export const EXIT_ALL_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

const USAGE = `Usage: scan-domains --domains a.com,b.com [options]

  --domains <list>              comma-separated domains to scan (required)
  --threads <n>                 concurrent domain scans
  --timeout <ms>                timeout for each DNS / RDAP lookup
  --expiry-warning-days <n>     WARNING when registration expires within n days
  --expiry-critical-days <n>    CRITICAL when registration expires within n days
  --json <path>                 machine-readable report (default security_report.json)
  --report <path>               human-readable report (default security_report.md)
  --verbose                     debug logging
  --help`;

export type CliOptions = {
  domains: string[];
  config: Partial<ScanConfig>;
  jsonPath: string;
  reportPath: string;
  verbose: boolean;
};

const num = (v: string | undefined) =>
  v === undefined ? undefined : Number(v);

const OPTIONS = {
  domains: { type: 'string', short: 'd' },
  threads: { type: 'string', short: 't' },
  timeout: { type: 'string' },
  'expiry-warning-days': { type: 'string' },
  'expiry-critical-days': { type: 'string' },
  json: { type: 'string', default: 'security_report.json' },
  report: { type: 'string', default: 'security_report.md' },
  verbose: { type: 'boolean', short: 'v', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, strict: true, options: OPTIONS });
  } catch (e) {
    throw new ConfigurationError(describeError(e));
  }
}

/** Returns null when --help was requested. */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const parsed = readArgs(argv);
  const v = parsed.values;
  if (v.help) return null;
  if (!v.domains) throw new ConfigurationError('--domains is required');

  return {
    domains: splitDomainArg(v.domains),
    config: {
      threadCount: num(v.threads),
      perDomainTimeoutMs: num(v.timeout),
      expiryWarningDays: num(v['expiry-warning-days']),
      expiryCriticalDays: num(v['expiry-critical-days']),
    },
    jsonPath: v.json ?? 'security_report.json',
    reportPath: v.report ?? 'security_report.md',
    verbose: v.verbose ?? false,
  };
}

/** 1 only when every requested domain failed; partial results still exit 0. */
export function exitCodeFor(batch: BatchResult): number {
  if (batch.cancelled) return EXIT_CANCELLED;
  const { domainsFailed } = batch.summary;
  return batch.results.size > 0 && domainsFailed === batch.results.size
    ? EXIT_ALL_FAILED
    : EXIT_OK;
}

export async function run(argv: string[]): Promise<number> {
  const logger = new Logger('Cli');
  let opts: CliOptions | null;
  try {
    opts = parseCliArgs(argv);
  } catch (e) {
    logger.error(describeError(e));
    console.error(USAGE);
    return EXIT_USAGE;
  }
  if (!opts) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const levels: LogLevel[] = opts.verbose
    ? ['error', 'warn', 'log', 'debug']
    : ['error', 'warn', 'log'];
  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: levels,
      abortOnError: false,
    });
  } catch (e) {
    if (!(e instanceof ConfigurationError)) throw e;
    logger.error(e.message);
    return EXIT_USAGE;
  }

  const ac = new AbortController();
  const onSigint = () => {
    logger.warn('interrupted, finishing with completed domains');
    ac.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const batch = await app
      .get(ScanOrchestrator)
      .scan(opts.domains, opts.config, ac.signal);

    const writer = app.get(ReportWriter);
    await writer.writeMachineReport(opts.jsonPath, batch);
    await writer.writeHumanReport(opts.reportPath, batch);

    const s = batch.summary;
    logger.log(
      `done: ${s.domainsOk} ok, ${s.domainsPartial} partial, ${s.domainsFailed} failed; ` +
        `${s.criticalCount} critical, ${s.warningCount} warning, ${s.infoCount} info`,
    );
    return exitCodeFor(batch);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      logger.error(e.message);
      return EXIT_USAGE;
    }
    throw e;
  } finally {
    process.off('SIGINT', onSigint);
    await app.close();
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
