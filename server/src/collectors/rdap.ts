import dayjs from 'dayjs';
import { z } from 'zod';
import type { WhoisRecord } from '../scan/types';

const remarkSchema = z.object({
  title: z.string().optional(),
  description: z.array(z.string()).default([]),
});

const entitySchema = z.object({
  roles: z.array(z.string()).default([]),
  // ["vcard", [[name, params, type, value], ...]]
  vcardArray: z.tuple([z.string(), z.array(z.array(z.unknown()))]).optional(),
  remarks: z.array(remarkSchema).default([]),
});
type RdapEntity = z.infer<typeof entitySchema>;

export const rdapDomainSchema = z.object({
  ldhName: z.string(),
  events: z
    .array(z.object({ eventAction: z.string(), eventDate: z.string() }))
    .default([]),
  nameservers: z.array(z.object({ ldhName: z.string() })).default([]),
  entities: z.array(entitySchema).default([]),
  remarks: z.array(remarkSchema).default([]),
});
export type RdapDomain = z.infer<typeof rdapDomainSchema>;

export const rdapBootstrapSchema = z.object({
  services: z.array(z.tuple([z.array(z.string()), z.array(z.string())])),
});
export type RdapBootstrap = z.infer<typeof rdapBootstrapSchema>;

const REDACTION = /redacted|privacy|withheld|data protected|not disclosed/i;

export class RdapParseError extends Error {
  override readonly name = 'RdapParseError';
}

function vcardStrings(e: RdapEntity): string[] {
  if (!e.vcardArray) return [];
  return e.vcardArray[1].flatMap((prop) =>
    prop.slice(3).filter((v): v is string => typeof v === 'string'),
  );
}

function vcardFn(e: RdapEntity): string | null {
  const fn = e.vcardArray?.[1].find((prop) => prop[0] === 'fn');
  const value = fn?.[3];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function eventDate(d: RdapDomain, action: string): Date | null {
  const ev = d.events.find((e) => e.eventAction.toLowerCase() === action);
  if (!ev) return null;
  const parsed = dayjs(ev.eventDate);
  if (!parsed.isValid()) {
    throw new RdapParseError(`unparseable ${action} date "${ev.eventDate}"`);
  }
  return parsed.toDate();
}

function isPrivacyProtected(d: RdapDomain): boolean {
  const registrant = d.entities.find((e) => e.roles.includes('registrant'));
  if (!registrant) return true;
  const texts = [
    ...vcardStrings(registrant),
    ...registrant.remarks.flatMap((r) => [r.title ?? '', ...r.description]),
  ];
  return texts.some((t) => REDACTION.test(t));
}

/** Normalizes an RDAP domain object; throws on any schema or date problem. */
export function parseRdapDomain(body: unknown): WhoisRecord {
  const res = rdapDomainSchema.safeParse(body);
  if (!res.success) {
    throw new RdapParseError(
      `unexpected RDAP response: ${res.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  const d = res.data;
  const registrar = d.entities.find((e) => e.roles.includes('registrar'));
  return Object.freeze({
    registrar: registrar ? vcardFn(registrar) : null,
    created: eventDate(d, 'registration'),
    expires: eventDate(d, 'expiration'),
    nameServers: Object.freeze(
      d.nameservers.map((ns) => ns.ldhName.toLowerCase().replace(/\.$/, '')),
    ),
    privacyProtected: isPrivacyProtected(d),
  });
}

/** RDAP base URLs serving the domain's TLD, each ending in a slash. */
export function rdapServersFor(
  bootstrap: RdapBootstrap,
  domain: string,
): string[] {
  const tld = domain.split('.').pop()?.toLowerCase() ?? '';
  const service = bootstrap.services.find(([tlds]) =>
    tlds.some((t) => t.toLowerCase() === tld),
  );
  if (!service) return [];
  return service[1].map((url) => (url.endsWith('/') ? url : `${url}/`));
}
