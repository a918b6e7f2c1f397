/**
 * unknown-spike - runs of records the classifier could not place
 */

import type { Anomaly, Timeline } from "../types.js";
import type { AnomalyRule } from "./engine.js";

export interface UnknownSpikeParams {
  windowSize: number;
  /** Share of Unknown records, 0..1, that a window must exceed */
  threshold: number;
  /** Timelines shorter than this are not evaluated */
  minRecords: number;
}

interface Span {
  start: number;
  end: number;
}

/**
 * Slides a window of `windowSize` records over the timeline (the whole
 * timeline when it is shorter) and flags windows whose Unknown share exceeds
 * the threshold. Overlapping flagged windows are reported as one span.
 */
export function createUnknownSpikeRule(params: UnknownSpikeParams): AnomalyRule {
  return {
    id: "unknown-spike",
    description: `More than ${Math.round(params.threshold * 100)}% unclassified records in a window of ${params.windowSize}`,
    evaluate(timeline: Timeline): Anomaly[] {
      if (timeline.length === 0 || timeline.length < params.minRecords) return [];

      const size = Math.min(params.windowSize, timeline.length);
      const prefix = [0];
      for (const record of timeline) {
        prefix.push(prefix[prefix.length - 1] + (record.category === "Unknown" ? 1 : 0));
      }

      const spans: Span[] = [];
      for (let start = 0; start + size <= timeline.length; start++) {
        const unknown = prefix[start + size] - prefix[start];
        if (unknown / size <= params.threshold) continue;

        const last = spans[spans.length - 1];
        if (last && start < last.end) last.end = start + size;
        else spans.push({ start, end: start + size });
      }

      return spans.map((span): Anomaly => {
        const records = timeline.slice(span.start, span.end).filter((r) => r.category === "Unknown");
        const length = span.end - span.start;
        return {
          ruleId: "unknown-spike",
          severity: "medium",
          subject: null,
          records,
          explanation: `${records.length} of ${length} consecutive records are unclassified (window ${size}, threshold ${Math.round(params.threshold * 100)}%)`,
        };
      });
    },
  };
}
