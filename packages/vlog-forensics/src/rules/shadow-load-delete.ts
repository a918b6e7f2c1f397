/**
 * shadow-load-delete - a shadow load followed shortly by a delete
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { groupBySubject, secondsBetween, targetOf, verbOf } from "./helpers.js";

export interface ShadowLoadDeleteParams {
  /** How many of the subject's following records to inspect */
  lookahead: number;
  windowSeconds: number;
}

/**
 * Flags a subject's delete within its next `lookahead` records after a
 * shadow load, when it happens at most `windowSeconds` later.
 */
export function createShadowLoadDeleteRule(params: ShadowLoadDeleteParams): AnomalyRule {
  return {
    id: "shadow-load-delete",
    description: `Shadow load followed by a delete within ${params.windowSeconds}s`,
    evaluate(timeline: Timeline): Anomaly[] {
      const anomalies: Anomaly[] = [];

      for (const [subject, records] of groupBySubject(timeline)) {
        records.forEach((record, i) => {
          if (verbOf(record) !== "shadow-load") return;

          for (const next of records.slice(i + 1, i + 1 + params.lookahead)) {
            if (verbOf(next) !== "delete") continue;
            const elapsed = secondsBetween(record, next);
            if (elapsed === null || elapsed > params.windowSeconds) continue;

            anomalies.push({
              ruleId: "shadow-load-delete",
              severity: "high",
              subject,
              records: [record, next],
              explanation: `${subject} deleted ${targetOf(next) ?? "an object"} ${elapsed}s after a shadow load`,
            });
          }
        });
      }
      return anomalies;
    },
  };
}
