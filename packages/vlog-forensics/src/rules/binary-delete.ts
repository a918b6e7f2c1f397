/**
 * binary-delete - removal of executables
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { targetOf, verbOf } from "./helpers.js";

export interface BinaryDeleteParams {
  extensions: readonly string[];
  directories: readonly string[];
}

/**
 * Flags a delete whose target ends with one of `extensions` or lies under
 * one of `directories`.
 */
export function createBinaryDeleteRule(params: BinaryDeleteParams): AnomalyRule {
  const looksExecutable = (target: string): boolean =>
    params.extensions.some((ext) => target.endsWith(ext)) ||
    params.directories.some((dir) => target.includes(dir));

  return {
    id: "binary-delete",
    description: "A binary or a file in an executable directory is deleted",
    evaluate(timeline: Timeline): Anomaly[] {
      const anomalies: Anomaly[] = [];
      for (const record of timeline) {
        if (verbOf(record) !== "delete") continue;
        const target = targetOf(record);
        if (target === null || !looksExecutable(target)) continue;

        anomalies.push({
          ruleId: "binary-delete",
          severity: "high",
          subject: record.subject,
          records: [record],
          explanation: `${record.subject ?? "Unknown subject"} deleted executable ${target}`,
        });
      }
      return anomalies;
    },
  };
}
