/**
 * repeated-ip - bursts of connection attempts from one network address
 */

import type { Anomaly, LogRecord, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";
import { networkAddress, verbOf } from "./helpers.js";

export interface RepeatedIpParams {
  /** Bursts with more attempts than this are flagged */
  maxAttempts: number;
  windowSeconds: number;
}

interface Span {
  start: number;
  end: number;
}

const ATTEMPT_VERBS: ReadonlySet<string> = new Set(["connect", "accept", "dial", "attempt"]);

/**
 * Flags an address making more than `maxAttempts` connection attempts within
 * `windowSeconds`. Every over-limit window is checked; overlapping ones merge
 * so that each maximal burst becomes one anomaly.
 */
export function createRepeatedIpRule(params: RepeatedIpParams): AnomalyRule {
  const windowMs = params.windowSeconds * 1000;

  return {
    id: "repeated-ip",
    description: `More than ${params.maxAttempts} connection attempts from one address within ${params.windowSeconds}s`,
    evaluate(timeline: Timeline): Anomaly[] {
      const attempts = new Map<string, LogRecord[]>();
      for (const record of timeline) {
        if (record.category !== "Network" || record.timestamp === null) continue;
        const verb = verbOf(record);
        if (verb === null || !ATTEMPT_VERBS.has(verb)) continue;
        const address = networkAddress(record);
        if (address === null) continue;
        const list = attempts.get(address);
        if (list) list.push(record);
        else attempts.set(address, [record]);
      }

      const anomalies: Anomaly[] = [];
      for (const [address, records] of attempts) {
        const times = records.map((record) => record.timestamp?.getTime() ?? 0);

        const spans: Span[] = [];
        let end = 0;
        for (let start = 0; start < records.length; start++) {
          if (end < start) end = start;
          while (end < records.length && times[end] - times[start] <= windowMs) end++;
          if (end - start <= params.maxAttempts) continue;

          const last = spans[spans.length - 1];
          if (last && start < last.end) last.end = end;
          else spans.push({ start, end });
        }

        for (const span of spans) {
          const count = span.end - span.start;
          anomalies.push({
            ruleId: "repeated-ip",
            severity: "high",
            subject: address,
            records: records.slice(span.start, span.end),
            explanation: `${count} connection attempts from ${address} within ${params.windowSeconds}s (limit ${params.maxAttempts})`,
          });
        }
      }
      return anomalies;
    },
  };
}
