/**
 * Public API for the .vlog analysis pipeline
 *
 * folder -> files -> Line Parser -> Classifier -> Timeline Builder -> Rule Engine
 */

import { classifyRecords } from "./classifier.js";
import { DEFAULT_CONFIG, type AnalysisConfig } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseSource } from "./parser.js";
import { readLogFolder, type LogSource } from "./reader.js";
import { createDefaultRules, runRules, type AnomalyRule } from "./rules/index.js";
import { buildTimeline } from "./timeline.js";
import type { AnalysisResult, Anomaly, MalformedEntry, ParsedRecord, Timeline } from "./types.js";

export interface AnalyzeOptions {
  config?: AnalysisConfig;
  /** Replaces the built-in rules from `config.rules` */
  rules?: Iterable<AnomalyRule>;
  logger?: Logger;
}

export interface CoreResult {
  timeline: Timeline;
  malformed: MalformedEntry[];
  anomalies: Anomaly[];
}

/**
 * Run the pipeline over in-memory sources, given in enumeration order.
 */
export function analyzeSources(sources: readonly LogSource[], options: AnalyzeOptions = {}): CoreResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? silentLogger;

  const parsed: ParsedRecord[] = [];
  const malformed: MalformedEntry[] = [];
  for (const { source, text } of sources) {
    const result = parseSource(source, text);
    parsed.push(...result.records);
    malformed.push(...result.malformed);
    logger.debug({ source, records: result.records.length, malformed: result.malformed.length }, "parsed log file");
  }

  const timeline = buildTimeline(classifyRecords(parsed));
  const rules = options.rules ?? createDefaultRules(config.rules);
  const anomalies = runRules(timeline, rules);

  logger.info(
    { records: timeline.length, malformed: malformed.length, anomalies: anomalies.length },
    "analysis complete"
  );
  return { timeline, malformed, anomalies };
}

/**
 * Analyse every log file in `folder`.
 * Throws LogFolderError before any parsing when the folder is unusable.
 */
export async function analyzeFolder(folder: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const contents = await readLogFolder(folder, { extension: config.extension, logger: options.logger });
  const core = analyzeSources(contents.sources, { ...options, config });

  return {
    folder: contents.folder,
    files: contents.files,
    ...core,
    fileErrors: contents.fileErrors,
  };
}
