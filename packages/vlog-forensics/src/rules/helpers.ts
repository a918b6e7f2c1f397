/**
 * Record accessors shared by the anomaly rules
 */

import type { LogRecord, Timeline } from "../types.js";
import { TARGET_KEYS, fieldValue, normalizeVerb, parseIpToken } from "../utils.js";

/** Normalised action verb */
export function verbOf(record: LogRecord): string | null {
  return normalizeVerb(record.action);
}

/** Value of the first target-like field (target, path, file, ...) */
export function targetOf(record: LogRecord): string | null {
  return fieldValue(record.fields, TARGET_KEYS);
}

/** IPv4 address of the record: the subject when it is one, else the first address-shaped field */
export function networkAddress(record: LogRecord): string | null {
  if (record.subject !== null) {
    const subject = parseIpToken(record.subject);
    if (subject) return subject.address;
  }
  for (const field of record.fields) {
    const parsed = parseIpToken(field.value);
    if (parsed) return parsed.address;
  }
  return null;
}

/** Records per subject, each list in timeline order; map order is first appearance */
export function groupBySubject(timeline: Timeline): Map<string, LogRecord[]> {
  const groups = new Map<string, LogRecord[]>();
  for (const record of timeline) {
    if (record.subject === null) continue;
    const group = groups.get(record.subject);
    if (group) group.push(record);
    else groups.set(record.subject, [record]);
  }
  return groups;
}

/** Null when either record has no timestamp */
export function secondsBetween(earlier: LogRecord, later: LogRecord): number | null {
  if (earlier.timestamp === null || later.timestamp === null) return null;
  return (later.timestamp.getTime() - earlier.timestamp.getTime()) / 1000;
}
