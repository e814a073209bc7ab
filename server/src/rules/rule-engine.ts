import { Injectable } from '@nestjs/common';
import { DEFAULT_SCAN_CONFIG } from '../config/scan.config';
import { SEVERITY_RANK, type DomainSnapshot, type Finding } from '../scan/types';
import { RULES, type Rule, type RulePolicy } from './rules';

export const DEFAULT_RULE_POLICY: RulePolicy = {
  expiryWarningDays: DEFAULT_SCAN_CONFIG.expiryWarningDays,
  expiryCriticalDays: DEFAULT_SCAN_CONFIG.expiryCriticalDays,
};

/** CRITICAL > WARNING > INFO; equal severities keep their relative order. */
export function sortBySeverity(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity],
  );
}

@Injectable()
export class RuleEngine {
  private readonly rules: readonly Rule[];

  constructor() {
    this.rules = RULES;
    const ids = new Set(this.rules.map((r) => r.id));
    if (ids.size !== this.rules.length) {
      throw new Error('rule ids must be unique');
    }
  }

  get ruleIds(): string[] {
    return this.rules.map((r) => r.id);
  }

  /**
   * Runs every rule in declaration order against the snapshot. Pure: the
   * same snapshot and policy always give the same findings in the same order.
   */
  evaluate(
    snapshot: DomainSnapshot,
    policy: RulePolicy = DEFAULT_RULE_POLICY,
  ): Finding[] {
    const ctx = { snapshot, policy };
    return sortBySeverity(this.rules.flatMap((rule) => rule.evaluate(ctx)));
  }
}
