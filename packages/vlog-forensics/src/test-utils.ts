import { classifyRecords } from "./classifier.js";
import { parseLine, parseSource } from "./parser.js";
import { buildTimeline } from "./timeline.js";
import type { ParsedRecord, Timeline } from "./types.js";

export function parseRecord(text: string, source = "test.vlog", line = 1): ParsedRecord {
  const outcome = parseLine({ source, line, text });
  if (outcome.kind !== "record") {
    throw new Error(`Expected a record for ${JSON.stringify(text)}, got ${outcome.kind}`);
  }
  return outcome.record;
}

export function timelineFrom(lines: string[], source = "test.vlog"): Timeline {
  const { records } = parseSource(source, lines.join("\n"));
  return buildTimeline(classifyRecords(records));
}
