export type CollectorName = 'dns' | 'whois';

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}

/** Failure of one collector call for one domain; never aborts a batch. */
export abstract class CollectorError extends Error {
  abstract readonly collector: CollectorName;

  constructor(
    readonly domain: string,
    cause: unknown,
  ) {
    super(describeError(cause), { cause });
  }
}

export class DnsLookupError extends CollectorError {
  readonly collector = 'dns';
  override readonly name = 'DnsLookupError';
}

export class WhoisLookupError extends CollectorError {
  readonly collector = 'whois';
  override readonly name = 'WhoisLookupError';
}

/** Raised before any scanning starts; fatal for the whole batch. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

/** Collector call exceeded its per-domain deadline. */
export class LookupTimeoutError extends Error {
  override readonly name = 'LookupTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`lookup timed out after ${timeoutMs}ms`);
  }
}

export class LookupCancelledError extends Error {
  override readonly name = 'LookupCancelledError';

  constructor() {
    super('lookup cancelled');
  }
}
