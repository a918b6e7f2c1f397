/**
 * Line Parser - tolerant, best-effort extraction of records from .vlog lines
 *
 * Recognised shapes, tried in this order:
 *
 * 1. Framed event
 *      0x1f4a[ts:1704103200]|EVNT:PROC!@RUN_usr:alice=>/bin/xz
 *    log id, epoch-seconds timestamp, event hint, ACTION, actor type, actor, target.
 *
 * 2. Head tokens, stripped from the front in any order:
 *      2024-01-01T10:00:00   2024-01-01 10:00:00.250Z   [2024-01-01T10:00:00+02:00]
 *      [NET]  [FILE]  [PROC]  [AUTH] ...  (unknown tags are kept as a `tag` field)
 *    Timestamps without an offset are read as UTC.
 *
 * 3. Key-value body
 *      user=alice action=login ip=10.0.0.5 msg="two words"
 *    Bare words between the pairs are kept as a `message` field.
 *
 * 4. Free-form body, only after a head timestamp
 *      2024-01-01T10:00:00 bob delete /tmp/payload.bin
 *    <subject> <verb> [target...]
 *
 * Anything else is malformed. Blank lines are skipped.
 */

import { describeError } from "./errors.js";
import type {
  Category,
  Field,
  MalformedEntry,
  ParsedRecord,
  ParsedSource,
  ParseOutcome,
  RawLine,
} from "./types.js";
import { fieldValue, normalizeInput } from "./utils.js";

const PATTERNS = {
  FRAMED: /^(0x[0-9a-fA-F]+)\[ts:(\d+)\]\|EVNT:([^!]+)!@([^_]+)_([^:]+):([^=]+)=*>(.+)$/,
  HEAD_TIMESTAMP:
    /^\[?(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d{1,9})?(?:Z|[+-]\d{2}:?\d{2})?)\]?(?=\s|$)/,
  HEAD_TAG: /^\[([A-Za-z][\w-]*)\](?=\s|$)/,
  KEY_VALUE: /(?:^|\s)([A-Za-z_][\w.-]*)=("[^"]*"|'[^']*'|\S*)/g,
  ISO: /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?$/,
  EPOCH_MS: /^\d{12,13}$/,
  EPOCH_S: /^\d{1,11}$/,
  SUBJECT: /^[\w.@:/\\-]+$/,
  VERB: /^[A-Za-z][\w-]*$/,
};

export const REASONS = {
  UNRECOGNIZED: "no timestamp, key=value fields or event frame found",
  NO_SUBJECT_OR_ACTION: "key=value fields carry neither a subject nor an action",
  FREE_FORM: "free-form line needs a subject and an action after the timestamp",
} as const;

const HINT_TOKENS: Record<string, Category> = {
  net: "Network",
  network: "Network",
  conn: "Network",
  fw: "Network",
  file: "FileOp",
  fs: "FileOp",
  io: "FileOp",
  proc: "Process",
  process: "Process",
  exec: "Process",
  user: "UserActivity",
  usr: "UserActivity",
  auth: "UserActivity",
  session: "UserActivity",
};

const SUBJECT_KEYS = [
  "user",
  "username",
  "usr",
  "uid",
  "account",
  "login",
  "actor",
  "subject",
  "process",
  "proc",
  "pname",
  "ip",
  "src_ip",
  "src",
  "source_ip",
  "client_ip",
  "remote_ip",
  "remote",
  "addr",
  "host",
  "pid",
] as const;

const ACTION_KEYS = ["action", "act", "op", "operation", "verb", "event", "cmd", "command"] as const;

const TIMESTAMP_KEYS = ["ts", "time", "timestamp", "date", "at"] as const;
const HINT_KEYS = ["cat", "category", "kind"] as const;

export function hintFromToken(token: string): Category | null {
  return HINT_TOKENS[token.trim().toLowerCase()] ?? null;
}

/**
 * Parse an ISO-8601 date-time or an epoch value (seconds, or milliseconds
 * when 12-13 digits long). Returns null for anything else.
 */
export function parseTimestamp(value: string): Date | null {
  const text = value.trim();

  if (PATTERNS.EPOCH_MS.test(text)) return validDate(Number(text));
  if (PATTERNS.EPOCH_S.test(text)) return validDate(Number(text) * 1000);

  const match = text.match(PATTERNS.ISO);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  // Date.UTC would map years 0-99 to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  // Feb 30 rolls over into March
  if (date.getUTCDate() !== day) return null;
  const utc = date.getTime();

  return validDate(utc - zoneOffsetMinutes(zone) * 60_000);
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function validDate(millis: number): Date | null {
  const date = new Date(millis);
  return Number.isFinite(date.getTime()) ? date : null;
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

function malformed(line: RawLine, reason: string): ParseOutcome {
  const entry: MalformedEntry = { line, reason };
  return { kind: "malformed", entry };
}

function baseRecord(line: RawLine): Pick<ParsedRecord, "id" | "source" | "line" | "raw"> {
  return { id: `${line.source}:${line.line}`, source: line.source, line: line.line, raw: line.text };
}

function parseFramed(line: RawLine, match: RegExpMatchArray): ParseOutcome {
  const [, logId, ts, event, action, actorType, actor, target] = match;
  const fields: Field[] = [
    { key: "log_id", value: logId },
    { key: "event", value: event },
    { key: "action", value: action },
    { key: "actor_type", value: actorType },
    { key: "actor", value: actor },
    { key: "target", value: target.trim() },
  ];
  return {
    kind: "record",
    record: {
      ...baseRecord(line),
      format: "framed",
      timestamp: parseTimestamp(ts),
      hint: hintFromToken(event),
      subject: actor.trim() || null,
      action: action.trim() || null,
      fields,
    },
  };
}

interface HeadTokens {
  timestamp: Date | null;
  hint: Category | null;
  tags: string[];
  rest: string;
}

function stripHead(text: string): HeadTokens {
  const head: HeadTokens = { timestamp: null, hint: null, tags: [], rest: text };

  let progressed = true;
  while (progressed) {
    progressed = false;

    const tsMatch = head.timestamp === null ? head.rest.match(PATTERNS.HEAD_TIMESTAMP) : null;
    if (tsMatch) {
      const timestamp = parseTimestamp(tsMatch[1]);
      if (timestamp) {
        head.timestamp = timestamp;
        head.rest = head.rest.slice(tsMatch[0].length).trimStart();
        progressed = true;
        continue;
      }
    }

    const tagMatch = head.rest.match(PATTERNS.HEAD_TAG);
    if (tagMatch) {
      const hint = hintFromToken(tagMatch[1]);
      if (hint && head.hint === null) {
        head.hint = hint;
      } else {
        head.tags.push(tagMatch[1]);
      }
      head.rest = head.rest.slice(tagMatch[0].length).trimStart();
      progressed = true;
    }
  }

  return head;
}

function parseKeyValue(line: RawLine, head: HeadTokens, pairs: RegExpMatchArray[]): ParseOutcome {
  const fields: Field[] = head.tags.map((tag) => ({ key: "tag", value: tag }));
  for (const pair of pairs) {
    fields.push({ key: pair[1].toLowerCase(), value: unquote(pair[2]) });
  }

  const message = head.rest.replace(PATTERNS.KEY_VALUE, " ").trim().split(/\s+/).filter(Boolean);
  if (message.length > 0) {
    fields.push({ key: "message", value: message.join(" ") });
  }

  const subject = fieldValue(fields, SUBJECT_KEYS);
  let action = fieldValue(fields, ACTION_KEYS);
  if (action === null && message.length > 0 && PATTERNS.VERB.test(message[0])) {
    action = message[0];
  }
  if (subject === null && action === null) {
    return malformed(line, REASONS.NO_SUBJECT_OR_ACTION);
  }

  let timestamp = head.timestamp;
  if (timestamp === null) {
    const tsValue = fieldValue(fields, TIMESTAMP_KEYS);
    timestamp = tsValue === null ? null : parseTimestamp(tsValue);
  }

  let hint = head.hint;
  if (hint === null) {
    const hintValue = fieldValue(fields, HINT_KEYS);
    hint = hintValue === null ? null : hintFromToken(hintValue);
  }

  return {
    kind: "record",
    record: { ...baseRecord(line), format: "key-value", timestamp, hint, subject, action, fields },
  };
}

function parseFreeForm(line: RawLine, head: HeadTokens): ParseOutcome {
  const tokens = head.rest.split(/\s+/).filter(Boolean);
  const [subject, verb, ...target] = tokens;
  if (!subject || !verb || !PATTERNS.SUBJECT.test(subject) || !PATTERNS.VERB.test(verb)) {
    return malformed(line, REASONS.FREE_FORM);
  }

  const fields: Field[] = head.tags.map((tag) => ({ key: "tag", value: tag }));
  if (target.length > 0) {
    fields.push({ key: "target", value: target.join(" ") });
  }

  return {
    kind: "record",
    record: {
      ...baseRecord(line),
      format: "free-form",
      timestamp: head.timestamp,
      hint: head.hint,
      subject,
      action: verb,
      fields,
    },
  };
}

function parseTrimmed(line: RawLine, text: string): ParseOutcome {
  const framed = text.match(PATTERNS.FRAMED);
  if (framed) return parseFramed(line, framed);

  const head = stripHead(text);
  const pairs = [...head.rest.matchAll(PATTERNS.KEY_VALUE)];
  if (pairs.length > 0) return parseKeyValue(line, head, pairs);

  if (head.timestamp !== null) return parseFreeForm(line, head);

  return malformed(line, REASONS.UNRECOGNIZED);
}

/**
 * Parse one line. Never throws: any failure degrades to a malformed entry.
 */
export function parseLine(line: RawLine): ParseOutcome {
  const text = line.text.trim();
  if (!text) return { kind: "skip" };

  try {
    return parseTrimmed(line, text);
  } catch (error) {
    return malformed(line, `parser failure: ${describeError(error)}`);
  }
}

/**
 * Parse the full text of one file. Line numbers are 1-based.
 */
export function parseSource(source: string, text: string): ParsedSource {
  const records: ParsedRecord[] = [];
  const malformedEntries: MalformedEntry[] = [];

  const lines = normalizeInput(text).split("\n");
  lines.forEach((lineText, index) => {
    const outcome = parseLine({ source, line: index + 1, text: lineText });
    if (outcome.kind === "record") records.push(outcome.record);
    else if (outcome.kind === "malformed") malformedEntries.push(outcome.entry);
  });

  return { records, malformed: malformedEntries };
}
