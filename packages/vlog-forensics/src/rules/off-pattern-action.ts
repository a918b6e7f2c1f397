/**
 * off-pattern-action - a user doing something they have not done before
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { verbOf } from "./helpers.js";

export interface OffPatternActionParams {
  /** Earlier user actions a subject needs before new verbs count as off-pattern */
  minHistory: number;
}

/**
 * Flags a UserActivity record whose verb is new for its subject, once the
 * subject has `minHistory` earlier user actions. Only the first use of a
 * verb is reported.
 */
export function createOffPatternActionRule(params: OffPatternActionParams): AnomalyRule {
  return {
    id: "off-pattern-action",
    description: "A user performs an action never seen before for them",
    evaluate(timeline: Timeline): Anomaly[] {
      const history = new Map<string, { count: number; verbs: Set<string> }>();
      const anomalies: Anomaly[] = [];

      for (const record of timeline) {
        if (record.category !== "UserActivity" || record.subject === null) continue;
        const verb = verbOf(record);
        if (verb === null) continue;

        let seen = history.get(record.subject);
        if (!seen) {
          seen = { count: 0, verbs: new Set() };
          history.set(record.subject, seen);
        }

        if (seen.count >= params.minHistory && !seen.verbs.has(verb)) {
          anomalies.push({
            ruleId: "off-pattern-action",
            severity: "low",
            subject: record.subject,
            records: [record],
            explanation: `${record.subject} performed "${verb}" for the first time after ${seen.count} earlier actions`,
          });
        }
        seen.verbs.add(verb);
        seen.count++;
      }
      return anomalies;
    },
  };
}
