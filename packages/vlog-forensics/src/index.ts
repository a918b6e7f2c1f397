// Pipeline
export { analyzeFolder, analyzeSources, type AnalyzeOptions, type CoreResult } from "./api.js";
export { readLogFolder, type LogSource, type FolderContents } from "./reader.js";

// Core stages
export { parseLine, parseSource, parseTimestamp, REASONS } from "./parser.js";
export { categorize, classifyRecord, classifyRecords } from "./classifier.js";
export { buildTimeline } from "./timeline.js";
export * from "./rules/index.js";

// Core types
export type {
  AnalysisResult,
  Anomaly,
  Category,
  Field,
  FileError,
  LogRecord,
  MalformedEntry,
  ParsedRecord,
  ParseOutcome,
  RawLine,
  Severity,
  Timeline,
} from "./types.js";

// Configuration, errors, logging
export { AnalysisConfigSchema, DEFAULT_CONFIG, loadConfigFile, parseConfig, type AnalysisConfig } from "./config.js";
export { ConfigError, LogFolderError } from "./errors.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";

// Report collaborators
export {
  bucketTimeline,
  formatAlerts,
  formatChart,
  formatSummary,
  formatTimeline,
  serializeResult,
  summarize,
} from "./formatter.js";
