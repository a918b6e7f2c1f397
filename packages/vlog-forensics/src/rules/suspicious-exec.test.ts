import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config.js";
import { timelineFrom } from "../test-utils.js";
import { createSuspiciousExecRule } from "./suspicious-exec.js";

describe("suspicious-exec rule", () => {
  const rule = createSuspiciousExecRule(DEFAULT_CONFIG.rules.suspiciousExec);

  it("flags execution of a watch-listed binary", () => {
    const timeline = timelineFrom([
      "0x5[ts:1704103200]|EVNT:PROC!@RUN_usr:alice=>/bin/nc -lvp 4444",
      "0x6[ts:1704103201]|EVNT:PROC!@RUN_usr:alice=>/usr/bin/ls",
    ]);

    const anomalies = rule.evaluate(timeline);

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0].records.map((r) => r.id)).toEqual(["test.vlog:1"]);
    expect(anomalies[0].explanation).toBe("alice executed watch-listed binary /bin/nc");
  });

  it("uses the configured list", () => {
    const custom = createSuspiciousExecRule({ binaries: ["/usr/bin/ls"] });
    const timeline = timelineFrom(["2024-01-01T10:00:00 user=alice action=exec path=/usr/bin/ls pid=77"]);
    expect(custom.evaluate(timeline).map((a) => a.subject)).toEqual(["alice"]);
  });
});
