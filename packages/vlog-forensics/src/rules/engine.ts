/**
 * Anomaly Rule Engine
 *
 * A rule is constructed with its parameters and evaluates a whole timeline.
 * Rules keep no state between calls and never touch the records they flag.
 */

import type { Anomaly, Timeline } from "../types.js";

export interface AnomalyRule {
  readonly id: string;
  readonly description: string;
  evaluate(timeline: Timeline): Anomaly[];
}

export class RuleRegistry implements Iterable<AnomalyRule> {
  private readonly rules: AnomalyRule[] = [];

  register(rule: AnomalyRule): this {
    if (this.has(rule.id)) {
      throw new Error(`Anomaly rule "${rule.id}" is already registered`);
    }
    this.rules.push(rule);
    return this;
  }

  has(id: string): boolean {
    return this.rules.some((rule) => rule.id === id);
  }

  list(): readonly AnomalyRule[] {
    return [...this.rules];
  }

  [Symbol.iterator](): Iterator<AnomalyRule> {
    return this.list()[Symbol.iterator]();
  }
}

/**
 * Runs every rule over the same timeline. Output follows registration order,
 * then each rule's own order.
 */
export function runRules(timeline: Timeline, rules: Iterable<AnomalyRule>): Anomaly[] {
  const anomalies: Anomaly[] = [];
  for (const rule of rules) {
    anomalies.push(...rule.evaluate(timeline));
  }
  return anomalies;
}

/**
 * Index of record id to the ids of the rules that flagged it.
 */
export function tagRecords(anomalies: readonly Anomaly[]): Map<string, string[]> {
  const tags = new Map<string, string[]>();
  for (const anomaly of anomalies) {
    for (const record of anomaly.records) {
      const ruleIds = tags.get(record.id) ?? [];
      if (!ruleIds.includes(anomaly.ruleId)) ruleIds.push(anomaly.ruleId);
      tags.set(record.id, ruleIds);
    }
  }
  return tags;
}
