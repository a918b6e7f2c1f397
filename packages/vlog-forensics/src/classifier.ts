/**
 * Classifier - assigns each parsed record a category from its field shapes
 *
 * Rules run in a fixed priority order and the first match wins:
 * Network, FileOp, Process, UserActivity, the line's own category hint, Unknown.
 */

import type { Category, LogRecord, ParsedRecord } from "./types.js";
import { fieldValue, isIdentifier, isNumeric, isPathLike, isPort, normalizeVerb, parseIpToken } from "./utils.js";

export const NETWORK_VERBS: ReadonlySet<string> = new Set(["connect", "disconnect", "accept", "listen", "bind", "dial"]);

export const FILE_VERBS: ReadonlySet<string> = new Set([
  "open",
  "read",
  "write",
  "delete",
  "create",
  "rename",
  "move",
  "copy",
  "chmod",
  "chown",
  "unlink",
  "modify",
  "truncate",
]);

export const PROCESS_VERBS: ReadonlySet<string> = new Set(["spawn", "exec", "kill", "fork", "terminate", "start", "stop"]);

const PORT_KEYS = ["port", "dport", "sport", "src_port", "dst_port"] as const;
const PID_KEYS = ["pid", "ppid", "process_id"] as const;
const USER_KEYS = ["user", "username", "usr", "uid", "account", "login"] as const;
const USER_ACTOR_TYPES: ReadonlySet<string> = new Set(["usr", "user", "uid", "acct", "account"]);

interface RecordView {
  record: ParsedRecord;
  verb: string | null;
  tokens: string[];
}

interface CategoryRule {
  category: Category;
  matches(view: RecordView): boolean;
}

function hasIp(view: RecordView): boolean {
  return view.tokens.some((token) => parseIpToken(token) !== null);
}

function hasPort(view: RecordView): boolean {
  const port = fieldValue(view.record.fields, PORT_KEYS);
  if (port !== null && isNumeric(port) && isPort(Number(port))) return true;
  return view.tokens.some((token) => parseIpToken(token)?.port != null);
}

function hasUserIdentifier(view: RecordView): boolean {
  const { record } = view;
  const user = fieldValue(record.fields, USER_KEYS);
  if (user !== null && isIdentifier(user)) return true;

  const actor = fieldValue(record.fields, ["actor"]);
  if (actor !== null && isIdentifier(actor)) {
    const actorType = fieldValue(record.fields, ["actor_type"]);
    if (actorType === null || USER_ACTOR_TYPES.has(actorType.toLowerCase())) return true;
  }

  return record.format === "free-form" && record.subject !== null && isIdentifier(record.subject);
}

const RULES: readonly CategoryRule[] = [
  {
    category: "Network",
    matches: (view) =>
      (view.verb !== null && NETWORK_VERBS.has(view.verb)) || (hasIp(view) && hasPort(view)),
  },
  {
    category: "FileOp",
    matches: (view) =>
      view.verb !== null && FILE_VERBS.has(view.verb) && view.tokens.some(isPathLike),
  },
  {
    category: "Process",
    matches: (view) => {
      if (view.verb === null || !PROCESS_VERBS.has(view.verb)) return false;
      const pid = fieldValue(view.record.fields, PID_KEYS);
      return pid !== null && isNumeric(pid);
    },
  },
  {
    category: "UserActivity",
    matches: (view) => view.record.action !== null && hasUserIdentifier(view),
  },
];

function tokensOf(record: ParsedRecord): string[] {
  const tokens: string[] = [];
  if (record.subject !== null) tokens.push(record.subject);
  for (const field of record.fields) {
    tokens.push(...field.value.split(/\s+/).filter(Boolean));
  }
  return tokens;
}

/** First matching rule's category, else the record's hint, else Unknown */
export function categorize(record: ParsedRecord): Category {
  const view: RecordView = { record, verb: normalizeVerb(record.action), tokens: tokensOf(record) };
  const rule = RULES.find((candidate) => candidate.matches(view));
  if (rule) return rule.category;
  return record.hint ?? "Unknown";
}

/**
 * Returns a new record carrying its category; the input is left untouched.
 */
export function classifyRecord(record: ParsedRecord): LogRecord {
  return { ...record, category: categorize(record) };
}

export function classifyRecords(records: readonly ParsedRecord[]): LogRecord[] {
  return records.map(classifyRecord);
}
