/**
 * suspicious-exec - watch-listed binaries being run
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { targetOf, verbOf } from "./helpers.js";

export interface SuspiciousExecParams {
  binaries: readonly string[];
}

export function createSuspiciousExecRule(params: SuspiciousExecParams): AnomalyRule {
  return {
    id: "suspicious-exec",
    description: "A watch-listed binary is executed",
    evaluate(timeline: Timeline): Anomaly[] {
      const anomalies: Anomaly[] = [];
      for (const record of timeline) {
        if (verbOf(record) !== "exec") continue;
        const target = targetOf(record);
        const binary = target === null ? undefined : params.binaries.find((b) => target.includes(b));
        if (binary === undefined) continue;

        anomalies.push({
          ruleId: "suspicious-exec",
          severity: "high",
          subject: record.subject,
          records: [record],
          explanation: `${record.subject ?? "Unknown subject"} executed watch-listed binary ${binary}`,
        });
      }
      return anomalies;
    },
  };
}
