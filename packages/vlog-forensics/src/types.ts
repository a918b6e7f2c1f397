/**
 * Core types for .vlog parsing, classification and anomaly detection
 */

export type Category = "UserActivity" | "FileOp" | "Process" | "Network" | "Unknown";
export type LineFormat = "framed" | "key-value" | "free-form";
export type Severity = "low" | "medium" | "high";

export interface RawLine {
  /** File name the line was read from */
  source: string;
  /** 1-based */
  line: number;
  text: string;
}

export interface Field {
  key: string;
  value: string;
}

export interface ParsedRecord {
  /** `<source>:<line>`, unique within one run */
  id: string;
  source: string;
  line: number;
  raw: string;
  format: LineFormat;
  timestamp: Date | null;
  hint: Category | null;
  subject: string | null;
  action: string | null;
  fields: readonly Field[];
}

export interface LogRecord extends ParsedRecord {
  category: Category;
}

export interface MalformedEntry {
  line: RawLine;
  reason: string;
}

export type ParseOutcome =
  | { kind: "record"; record: ParsedRecord }
  | { kind: "malformed"; entry: MalformedEntry }
  | { kind: "skip" };

export interface ParsedSource {
  records: ParsedRecord[];
  malformed: MalformedEntry[];
}

export type Timeline = readonly LogRecord[];

export interface Anomaly {
  ruleId: string;
  severity: Severity;
  /** User, process or address the anomaly is about; null for timeline-wide rules */
  subject: string | null;
  records: readonly LogRecord[];
  explanation: string;
}

export interface FileError {
  source: string;
  path: string;
  reason: string;
}

export interface AnalysisResult {
  folder: string;
  /** .vlog files in enumeration order */
  files: string[];
  timeline: Timeline;
  malformed: MalformedEntry[];
  anomalies: Anomaly[];
  fileErrors: FileError[];
}
