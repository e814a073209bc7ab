import { RULE_IDS, type RuleId } from './rules';

/** Canonical remediation text per rule, used by the report renderers. */
export const RECOMMENDATIONS: Readonly<Record<RuleId, string>> = {
  ns_delegation_mismatch:
    'Make the NS records in the zone match the delegation at the registrar, and decommission servers that are no longer authoritative.',
  ns_single_server:
    'Add at least one more authoritative name server, preferably on a separate network or provider.',
  mx_missing:
    'Publish MX records for the mail servers if the domain should receive email; otherwise publish a null MX (0 .).',
  spf_missing:
    'Publish a v=spf1 TXT record listing the hosts allowed to send mail for the domain, ending in -all or ~all. A domain that sends no mail publishes v=spf1 -all.',
  spf_permissive:
    'Replace +all or ?all in the SPF record with -all (or ~all while rolling out) so unlisted hosts fail SPF.',
  spf_multiple:
    'Merge all SPF mechanisms into a single v=spf1 TXT record.',
  dmarc_missing:
    'Publish a DMARC record at _dmarc with p=quarantine or p=reject and an rua= address for aggregate reports. A domain that sends no mail publishes p=reject.',
  dmarc_policy_none:
    'Move the DMARC policy from p=none to p=quarantine, then p=reject, once reports show legitimate mail passes.',
  dkim_missing:
    'Enable DKIM signing at every mail provider and publish the public keys under their selectors.',
  domain_expiry:
    'Renew the domain registration and enable auto-renew and registrar lock.',
  whois_privacy_disabled:
    'Enable the registrar privacy or proxy service, or publish role contacts instead of personal data.',
  dangling_cname:
    'Remove the CNAME record, or re-provision the resource it points to, before someone else claims it.',
  caa_missing:
    'Add CAA records naming the certificate authorities you use, e.g. 0 issue "letsencrypt.org".',
  soa_missing:
    'Fix the zone on its authoritative servers so it serves a valid SOA record.',
  no_address_records:
    'Add A/AAAA records if the domain should serve traffic; otherwise no action is needed.',
};

export function recommendationFor(ruleId: string): string | undefined {
  const id = RULE_IDS.find((r) => r === ruleId);
  return id && RECOMMENDATIONS[id];
}
