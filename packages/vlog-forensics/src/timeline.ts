/**
 * Timeline Builder - merges records from every file into one chronological sequence
 */

import type { LogRecord, Timeline } from "./types.js";

/**
 * Orders records by timestamp, ascending.
 *
 * `records` must be in encounter order (file enumeration order, then line
 * order). Ties keep that order, and records without a timestamp follow all
 * timestamped ones, also in that order.
 */
export function buildTimeline(records: readonly LogRecord[]): Timeline {
  const timestamped: LogRecord[] = [];
  const untimed: LogRecord[] = [];

  for (const record of records) {
    if (record.timestamp === null) untimed.push(record);
    else timestamped.push(record);
  }

  // Array.prototype.sort is stable
  timestamped.sort((a, b) => timeOf(a) - timeOf(b));

  return [...timestamped, ...untimed];
}

function timeOf(record: LogRecord): number {
  return record.timestamp === null ? Number.POSITIVE_INFINITY : record.timestamp.getTime();
}
