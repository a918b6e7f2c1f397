/**
 * create-delete - short-lived files
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { groupBySubject, targetOf, verbOf } from "./helpers.js";

export interface CreateDeleteParams {
  lookahead: number;
}

/**
 * Flags a create followed, within the subject's next `lookahead` records, by
 * a delete whose target contains the created target.
 */
export function createCreateDeleteRule(params: CreateDeleteParams): AnomalyRule {
  return {
    id: "create-delete",
    description: "A file is created and then deleted by the same subject",
    evaluate(timeline: Timeline): Anomaly[] {
      const anomalies: Anomaly[] = [];

      for (const [subject, records] of groupBySubject(timeline)) {
        records.forEach((record, i) => {
          if (verbOf(record) !== "create") return;
          const created = targetOf(record);
          if (created === null) return;

          for (const next of records.slice(i + 1, i + 1 + params.lookahead)) {
            const deleted = targetOf(next);
            if (verbOf(next) !== "delete" || deleted === null || !deleted.includes(created)) continue;

            anomalies.push({
              ruleId: "create-delete",
              severity: "medium",
              subject,
              records: [record, next],
              explanation: `${subject} created then deleted ${created}`,
            });
          }
        });
      }
      return anomalies;
    },
  };
}
