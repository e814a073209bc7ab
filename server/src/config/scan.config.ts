import { z, ZodError } from 'zod';
import { ConfigurationError } from '../common/errors';
import type { ScanConfig } from '../scan/types';

export const SCAN_DEFAULTS = Symbol('SCAN_DEFAULTS');
export const DNS_OPTIONS = Symbol('DNS_OPTIONS');
export const RDAP_OPTIONS = Symbol('RDAP_OPTIONS');

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  threadCount: 10,
  perDomainTimeoutMs: 10_000,
  expiryWarningDays: 90,
  expiryCriticalDays: 30,
};

export const DEFAULT_DKIM_SELECTORS = [
  'default',
  'selector1',
  'selector2',
  'google',
  'k1',
];

export const DEFAULT_RDAP_BOOTSTRAP_URL = 'https://data.iana.org/rdap/dns.json';

export type DnsOptions = {
  /** Upstream resolvers; empty means the system configuration. */
  servers: string[];
  dkimSelectors: string[];
  /** Per-query resolver timeout. */
  queryTimeoutMs: number;
};

export type RdapOptions = {
  bootstrapUrl: string;
};

export type AppEnvironment = {
  port: number;
  scan: ScanConfig;
  dns: DnsOptions;
  rdap: RdapOptions;
};

const positiveInt = z.coerce.number().int().positive();

export const scanConfigSchema = z
  .object({
    threadCount: positiveInt.max(256),
    perDomainTimeoutMs: positiveInt,
    expiryWarningDays: positiveInt,
    expiryCriticalDays: z.coerce.number().int().nonnegative(),
  })
  .refine((c) => c.expiryCriticalDays <= c.expiryWarningDays, {
    message: 'expiryCriticalDays must not exceed expiryWarningDays',
    path: ['expiryCriticalDays'],
  });

const csv = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  );

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  SCAN_THREADS: positiveInt.default(DEFAULT_SCAN_CONFIG.threadCount),
  SCAN_TIMEOUT_MS: positiveInt.default(DEFAULT_SCAN_CONFIG.perDomainTimeoutMs),
  EXPIRY_WARNING_DAYS: positiveInt.default(
    DEFAULT_SCAN_CONFIG.expiryWarningDays,
  ),
  EXPIRY_CRITICAL_DAYS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_SCAN_CONFIG.expiryCriticalDays),
  DNS_SERVERS: csv,
  DNS_QUERY_TIMEOUT_MS: positiveInt.default(5000),
  DKIM_SELECTORS: csv,
  RDAP_BOOTSTRAP_URL: z.string().url().default(DEFAULT_RDAP_BOOTSTRAP_URL),
});

function issuesOf(e: ZodError): string[] {
  return e.issues.map((i) =>
    i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message,
  );
}

/** Validates a scan config, filling unset fields from the defaults. */
export function parseScanConfig(
  input: Partial<ScanConfig> = {},
  defaults: ScanConfig = DEFAULT_SCAN_CONFIG,
): ScanConfig {
  const parsed = scanConfigSchema.safeParse({
    threadCount: input.threadCount ?? defaults.threadCount,
    perDomainTimeoutMs: input.perDomainTimeoutMs ?? defaults.perDomainTimeoutMs,
    expiryWarningDays: input.expiryWarningDays ?? defaults.expiryWarningDays,
    expiryCriticalDays: input.expiryCriticalDays ?? defaults.expiryCriticalDays,
  });
  if (!parsed.success) {
    const issues = issuesOf(parsed.error);
    throw new ConfigurationError(
      `invalid scan config: ${issues.join('; ')}`,
      issues,
    );
  }
  return parsed.data;
}

export function loadEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): AppEnvironment {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = issuesOf(parsed.error);
    throw new ConfigurationError(
      `invalid environment: ${issues.join('; ')}`,
      issues,
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    scan: parseScanConfig({
      threadCount: e.SCAN_THREADS,
      perDomainTimeoutMs: e.SCAN_TIMEOUT_MS,
      expiryWarningDays: e.EXPIRY_WARNING_DAYS,
      expiryCriticalDays: e.EXPIRY_CRITICAL_DAYS,
    }),
    dns: {
      servers: e.DNS_SERVERS,
      dkimSelectors: e.DKIM_SELECTORS.length
        ? e.DKIM_SELECTORS
        : DEFAULT_DKIM_SELECTORS,
      queryTimeoutMs: e.DNS_QUERY_TIMEOUT_MS,
    },
    rdap: { bootstrapUrl: e.RDAP_BOOTSTRAP_URL },
  };
}

export const APP_ENVIRONMENT = Symbol('APP_ENVIRONMENT');
