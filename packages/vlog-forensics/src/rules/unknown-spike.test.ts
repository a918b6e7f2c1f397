import { describe, expect, it } from "vitest";
import { timelineFrom } from "../test-utils.js";
import { createUnknownSpikeRule } from "./unknown-spike.js";

const known = (second: number) => `2024-01-01T10:00:0${second} user=alice action=login`;
const unknown = (second: number) => `2024-01-01T10:00:0${second} proc=worker action=restart`;

describe("unknown-spike rule", () => {
  it("merges overlapping windows above the threshold", () => {
    const rule = createUnknownSpikeRule({ windowSize: 4, threshold: 0.5, minRecords: 4 });
    const timeline = timelineFrom([
      known(0),
      known(1),
      unknown(2),
      unknown(3),
      unknown(4),
      known(5),
      known(6),
      known(7),
    ]);

    const anomalies = rule.evaluate(timeline);

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0].subject).toBeNull();
    expect(anomalies[0].severity).toBe("medium");
    expect(anomalies[0].records.map((r) => r.id)).toEqual(["test.vlog:3", "test.vlog:4", "test.vlog:5"]);
    expect(anomalies[0].explanation).toBe(
      "3 of 5 consecutive records are unclassified (window 4, threshold 50%)"
    );
  });

  it("does not flag a share equal to the threshold", () => {
    const rule = createUnknownSpikeRule({ windowSize: 4, threshold: 0.5, minRecords: 4 });
    const timeline = timelineFrom([known(0), unknown(1), known(2), unknown(3)]);
    expect(rule.evaluate(timeline)).toEqual([]);
  });

  it("evaluates a short timeline as a single window", () => {
    const rule = createUnknownSpikeRule({ windowSize: 20, threshold: 0.5, minRecords: 3 });
    const anomalies = rule.evaluate(timelineFrom([unknown(0), unknown(1), unknown(2)]));

    expect(anomalies.map((a) => a.explanation)).toEqual([
      "3 of 3 consecutive records are unclassified (window 3, threshold 50%)",
    ]);
  });

  it("skips timelines below the minimum size", () => {
    const rule = createUnknownSpikeRule({ windowSize: 20, threshold: 0.5, minRecords: 5 });
    expect(rule.evaluate(timelineFrom([unknown(0), unknown(1)]))).toEqual([]);
    expect(rule.evaluate([])).toEqual([]);
  });
});
