import { describe, expect, it } from "vitest";
import { REASONS, parseLine, parseSource, parseTimestamp } from "./parser.js";
import { parseRecord } from "./test-utils.js";

describe("parseLine", () => {
  it("extracts timestamp, subject, action and fields from a key-value line", () => {
    const record = parseRecord("2024-01-01T10:00:00 user=alice action=login ip=10.0.0.5");

    expect(record.format).toBe("key-value");
    expect(record.timestamp?.getTime()).toBe(Date.UTC(2024, 0, 1, 10, 0, 0));
    expect(record.subject).toBe("alice");
    expect(record.action).toBe("login");
    expect(record.hint).toBeNull();
    expect(record.fields).toEqual([
      { key: "user", value: "alice" },
      { key: "action", value: "login" },
      { key: "ip", value: "10.0.0.5" },
    ]);
    expect(record.id).toBe("test.vlog:1");
  });

  it("reports unrecognisable text as malformed with the raw text kept", () => {
    const outcome = parseLine({ source: "a.vlog", line: 7, text: "????garbage????" });

    expect(outcome).toEqual({
      kind: "malformed",
      entry: {
        line: { source: "a.vlog", line: 7, text: "????garbage????" },
        reason: REASONS.UNRECOGNIZED,
      },
    });
  });

  it("skips empty and whitespace-only lines", () => {
    expect(parseLine({ source: "a.vlog", line: 1, text: "" })).toEqual({ kind: "skip" });
    expect(parseLine({ source: "a.vlog", line: 2, text: " \t  " })).toEqual({ kind: "skip" });
  });

  it("parses framed event lines", () => {
    const record = parseRecord("0x1f4a[ts:1704103200]|EVNT:PROC!@RUN_usr:alice=>/bin/xz");

    expect(record.format).toBe("framed");
    expect(record.timestamp?.getTime()).toBe(1704103200 * 1000);
    expect(record.subject).toBe("alice");
    expect(record.action).toBe("RUN");
    expect(record.hint).toBe("Process");
    expect(record.fields).toEqual([
      { key: "log_id", value: "0x1f4a" },
      { key: "event", value: "PROC" },
      { key: "action", value: "RUN" },
      { key: "actor_type", value: "usr" },
      { key: "actor", value: "alice" },
      { key: "target", value: "/bin/xz" },
    ]);
  });

  it("keeps records without a timestamp", () => {
    const record = parseRecord("user=bob action=logout");

    expect(record.timestamp).toBeNull();
    expect(record.subject).toBe("bob");
    expect(record.action).toBe("logout");
  });

  it("reads timestamps from timestamp fields", () => {
    expect(parseRecord("ts=1704103200 user=bob action=login").timestamp?.getTime()).toBe(1704103200000);
    expect(parseRecord("time=2024-01-01T12:00:00+02:00 user=bob action=login").timestamp?.getTime()).toBe(
      Date.UTC(2024, 0, 1, 10, 0, 0)
    );
  });

  it("strips a bracketed timestamp, a category hint and unknown tags from the head", () => {
    const record = parseRecord("[2024-01-01 10:00:00] [NET] [sshd] src=10.0.0.9 action=connect port=22");

    expect(record.timestamp?.getTime()).toBe(Date.UTC(2024, 0, 1, 10, 0, 0));
    expect(record.hint).toBe("Network");
    expect(record.subject).toBe("10.0.0.9");
    expect(record.fields).toEqual([
      { key: "tag", value: "sshd" },
      { key: "src", value: "10.0.0.9" },
      { key: "action", value: "connect" },
      { key: "port", value: "22" },
    ]);
  });

  it("unquotes values and takes the action from bare words when no action key exists", () => {
    const record = parseRecord('2024-01-01T10:00:00 login failed user=carol reason="bad password"');

    expect(record.subject).toBe("carol");
    expect(record.action).toBe("login");
    expect(record.fields).toEqual([
      { key: "user", value: "carol" },
      { key: "reason", value: "bad password" },
      { key: "message", value: "login failed" },
    ]);
  });

  it("parses free-form lines after a timestamp", () => {
    const record = parseRecord("2024-01-01T10:00:00 bob delete /tmp/payload.bin");

    expect(record.format).toBe("free-form");
    expect(record.subject).toBe("bob");
    expect(record.action).toBe("delete");
    expect(record.fields).toEqual([{ key: "target", value: "/tmp/payload.bin" }]);
  });

  it("rejects a free-form line without subject and verb", () => {
    const outcome = parseLine({ source: "a.vlog", line: 1, text: "2024-01-01T10:00:00 ???" });
    expect(outcome.kind === "malformed" && outcome.entry.reason).toBe(REASONS.FREE_FORM);
  });

  it("rejects key-value lines with neither subject nor action", () => {
    const outcome = parseLine({ source: "a.vlog", line: 1, text: "2024-01-01T10:00:00 foo=bar" });
    expect(outcome.kind === "malformed" && outcome.entry.reason).toBe(REASONS.NO_SUBJECT_OR_ACTION);
  });

  it("treats an impossible date as an absent timestamp", () => {
    const record = parseRecord("2024-02-30T10:00:00 user=a action=b");

    expect(record.timestamp).toBeNull();
    expect(record.subject).toBe("a");
    expect(record.action).toBe("b");
  });

  it("never throws for arbitrary input", () => {
    let seed = 42;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed;
    };

    for (let i = 0; i < 500; i++) {
      const length = next() % 80;
      let text = "";
      for (let j = 0; j < length; j++) {
        text += String.fromCharCode(next() % 0x10000);
      }
      const outcome = parseLine({ source: "fuzz.vlog", line: i + 1, text });
      expect(["record", "malformed", "skip"]).toContain(outcome.kind);
    }
  });
});

describe("parseTimestamp", () => {
  it("accepts ISO date-times and epoch values", () => {
    expect(parseTimestamp("2024-01-01T10:00:00.25Z")?.getTime()).toBe(Date.UTC(2024, 0, 1, 10, 0, 0, 250));
    expect(parseTimestamp("2024-01-01 10:00:00-0130")?.getTime()).toBe(Date.UTC(2024, 0, 1, 11, 30, 0));
    expect(parseTimestamp("1704103200000")?.getTime()).toBe(1704103200000);
  });

  it("keeps two-digit years as written", () => {
    expect(parseTimestamp("0050-01-01T00:00:00")?.getUTCFullYear()).toBe(50);
    expect(parseTimestamp("0050-01-01T00:00:00")?.toISOString()).toBe("0050-01-01T00:00:00.000Z");
  });

  it("returns null for anything else", () => {
    expect(parseTimestamp("2023-02-29T00:00:00")).toBeNull();
    expect(parseTimestamp("2024-13-01T00:00:00")).toBeNull();
    expect(parseTimestamp("yesterday")).toBeNull();
  });
});

describe("parseSource", () => {
  it("numbers lines from 1 and handles CRLF endings", () => {
    const result = parseSource("f.vlog", "a=1\r\n\r\nuser=x action=y\n????\n");

    expect(result.records.map((record) => record.id)).toEqual(["f.vlog:3"]);
    expect(result.malformed.map((entry) => [entry.line.line, entry.reason])).toEqual([
      [1, REASONS.NO_SUBJECT_OR_ACTION],
      [4, REASONS.UNRECOGNIZED],
    ]);
  });
});
