import type { CoreResult } from "./api.js";
import type { AnalysisResult, Anomaly, Category, LogRecord, Severity, Timeline } from "./types.js";
import { compareText, normalizeVerb } from "./utils.js";

const CATEGORIES: readonly Category[] = ["UserActivity", "FileOp", "Process", "Network", "Unknown"];
const SEVERITIES: readonly Severity[] = ["high", "medium", "low"];

export interface ActionCount {
  action: string;
  count: number;
}

export interface Summary {
  files: number;
  totalEntries: number;
  timestamped: number;
  malformedLines: number;
  unreadableFiles: number;
  /** In order of first appearance on the timeline */
  uniqueSubjects: string[];
  topActions: ActionCount[];
  categories: Record<Category, number>;
  anomalies: Record<Severity, number>;
}

export interface ChartBucket {
  /** UTC minute, `YYYY-MM-DDTHH:MM` */
  minute: string;
  total: number;
  counts: ActionCount[];
}

export interface ChartOptions {
  /** Actions seen more often than this across the timeline are grouped as COMMON */
  commonThreshold?: number;
  maxBarWidth?: number;
}

function countActions(timeline: Timeline): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of timeline) {
    const verb = normalizeVerb(record.action);
    if (verb === null) continue;
    counts.set(verb, (counts.get(verb) ?? 0) + 1);
  }
  return counts;
}

function byCountThenName(a: ActionCount, b: ActionCount): number {
  return b.count - a.count || compareText(a.action, b.action);
}

export function summarize(result: AnalysisResult): Summary {
  const { timeline } = result;

  const subjects = new Set<string>();
  const categories: Record<Category, number> = { UserActivity: 0, FileOp: 0, Process: 0, Network: 0, Unknown: 0 };
  for (const record of timeline) {
    if (record.subject !== null) subjects.add(record.subject);
    categories[record.category]++;
  }

  const anomalies: Record<Severity, number> = { high: 0, medium: 0, low: 0 };
  for (const anomaly of result.anomalies) anomalies[anomaly.severity]++;

  const topActions = [...countActions(timeline)]
    .map(([action, count]) => ({ action, count }))
    .sort(byCountThenName)
    .slice(0, 5);

  return {
    files: result.files.length,
    totalEntries: timeline.length,
    timestamped: timeline.filter((record) => record.timestamp !== null).length,
    malformedLines: result.malformed.length,
    unreadableFiles: result.fileErrors.length,
    uniqueSubjects: [...subjects],
    topActions,
    categories,
    anomalies,
  };
}

/**
 * Per-minute event counts for the frequency chart. Records without a
 * timestamp are left out.
 */
export function bucketTimeline(timeline: Timeline, options: ChartOptions = {}): ChartBucket[] {
  const commonThreshold = options.commonThreshold ?? 3;
  const totals = countActions(timeline);

  const buckets = new Map<string, Map<string, number>>();
  for (const record of timeline) {
    if (record.timestamp === null) continue;
    const minute = record.timestamp.toISOString().slice(0, 16);
    const verb = normalizeVerb(record.action);
    const label = verb === null ? "(none)" : (totals.get(verb) ?? 0) > commonThreshold ? "COMMON" : verb;

    const bucket = buckets.get(minute) ?? new Map<string, number>();
    bucket.set(label, (bucket.get(label) ?? 0) + 1);
    buckets.set(minute, bucket);
  }

  return [...buckets]
    .sort(([a], [b]) => compareText(a, b))
    .map(([minute, counts]) => {
      const list = [...counts].map(([action, count]) => ({ action, count })).sort(byCountThenName);
      return { minute, total: list.reduce((sum, entry) => sum + entry.count, 0), counts: list };
    });
}

export function formatSummary(result: AnalysisResult): string {
  const summary = summarize(result);
  const lines: string[] = [];

  lines.push("## Summary");
  lines.push(`- Files: ${summary.files}`);
  lines.push(`- Total log entries: ${summary.totalEntries}`);
  lines.push(`- Timestamped: ${summary.timestamped}`);
  lines.push(`- Malformed lines: ${summary.malformedLines}`);
  lines.push(`- Unreadable files: ${summary.unreadableFiles}`);
  const subjects = summary.uniqueSubjects.length > 0 ? ` (${summary.uniqueSubjects.join(", ")})` : "";
  lines.push(`- Unique subjects: ${summary.uniqueSubjects.length}${subjects}`);
  lines.push(`- Categories: ${CATEGORIES.map((c) => `${c} ${summary.categories[c]}`).join(", ")}`);
  lines.push(`- Anomalies: ${SEVERITIES.map((s) => `${s} ${summary.anomalies[s]}`).join(", ")}`);

  if (summary.topActions.length > 0) {
    lines.push("");
    lines.push("## Top Actions");
    for (const { action, count } of summary.topActions) {
      lines.push(`- ${action}: ${count}`);
    }
  }

  if (result.fileErrors.length > 0) {
    lines.push("");
    lines.push("## Unreadable Files");
    for (const error of result.fileErrors) {
      lines.push(`- ${error.source}: ${error.reason}`);
    }
  }

  return lines.join("\n");
}

function formatRecord(record: LogRecord): string {
  const time = record.timestamp?.toISOString() ?? "(no timestamp)";
  return `${time}  ${record.category.padEnd(12)}  ${record.subject ?? "-"}  ${record.action ?? "-"}  [${record.id}]`;
}

export function formatTimeline(result: CoreResult): string {
  const lines: string[] = ["## Timeline"];
  if (result.timeline.length === 0) {
    lines.push("No log entries.");
  }
  for (const record of result.timeline) {
    lines.push(formatRecord(record));
  }

  if (result.malformed.length > 0) {
    lines.push("");
    lines.push(`## Malformed Lines (${result.malformed.length})`);
    for (const { line, reason } of result.malformed) {
      lines.push(`- ${line.source}:${line.line} ${reason}: ${JSON.stringify(line.text)}`);
    }
  }

  return lines.join("\n");
}

export function formatAlerts(anomalies: readonly Anomaly[]): string {
  const lines: string[] = ["## Alerts"];
  if (anomalies.length === 0) {
    lines.push("No anomalies detected.");
    return lines.join("\n");
  }

  for (const anomaly of anomalies) {
    const subject = anomaly.subject === null ? "" : ` (${anomaly.subject})`;
    lines.push(`- [${anomaly.severity.toUpperCase()}] ${anomaly.ruleId}${subject}: ${anomaly.explanation}`);
    lines.push(`  records: ${anomaly.records.map((record) => record.id).join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * Text bar chart of events per minute
 */
export function formatChart(timeline: Timeline, options: ChartOptions = {}): string {
  const maxBarWidth = options.maxBarWidth ?? 50;
  const buckets = bucketTimeline(timeline, options);
  const lines: string[] = ["## Event Frequency (per minute, UTC)"];
  if (buckets.length === 0) {
    lines.push("No timestamped entries.");
    return lines.join("\n");
  }

  const peak = buckets.reduce((max, bucket) => Math.max(max, bucket.total), 0);
  for (const bucket of buckets) {
    const width = peak <= maxBarWidth ? bucket.total : Math.max(1, Math.round((bucket.total / peak) * maxBarWidth));
    const breakdown = bucket.counts.map(({ action, count }) => `${action} ${count}`).join(", ");
    lines.push(`${bucket.minute}  ${"#".repeat(width)} ${bucket.total}  (${breakdown})`);
  }
  return lines.join("\n");
}

function serializeRecord(record: LogRecord) {
  return {
    id: record.id,
    source: record.source,
    line: record.line,
    timestamp: record.timestamp?.toISOString() ?? null,
    category: record.category,
    format: record.format,
    hint: record.hint,
    subject: record.subject,
    action: record.action,
    fields: record.fields.map((field) => ({ key: field.key, value: field.value })),
    raw: record.raw,
  };
}

/**
 * Plain JSON-ready form of a result. Anomalies reference records by id.
 */
export function serializeResult(result: AnalysisResult) {
  return {
    files: result.files,
    timeline: result.timeline.map(serializeRecord),
    malformed: result.malformed.map(({ line, reason }) => ({
      source: line.source,
      line: line.line,
      text: line.text,
      reason,
    })),
    anomalies: result.anomalies.map((anomaly) => ({
      ruleId: anomaly.ruleId,
      severity: anomaly.severity,
      subject: anomaly.subject,
      records: anomaly.records.map((record) => record.id),
      explanation: anomaly.explanation,
    })),
    fileErrors: result.fileErrors.map(({ source, reason }) => ({ source, reason })),
  };
}
