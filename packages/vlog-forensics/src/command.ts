/**
 * Command-line handling for vlog-forensics
 *
 * Usage:
 *   vlog-forensics <folder> [--summary] [--timeline] [--alerts] [--visualize] [--json] [--config <file>]
 */

import * as path from "path";
import { parseArgs } from "util";
import { analyzeFolder } from "./api.js";
import { DEFAULT_CONFIG, loadConfigFile, loadEnvFile, resolveLogLevel, type EnvSource } from "./config.js";
import { ConfigError, LogFolderError, describeError } from "./errors.js";
import { formatAlerts, formatChart, formatSummary, formatTimeline, serializeResult } from "./formatter.js";
import { createLogger, type Logger } from "./logger.js";

export const USAGE = `Usage: vlog-forensics <folder> [options]

Analyse the .vlog files in <folder>.

Options:
  --summary          Totals, subjects, top actions (default when no section is chosen)
  --timeline         Chronological list of entries and malformed lines
  --alerts           Anomalies flagged by the rules
  --visualize        Events-per-minute chart
  --json             Print the full result bundle as JSON
  --config <file>    JSON file with rule parameters (or VLOG_CONFIG)
  -h, --help         Show this help
`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: EnvSource;
  cwd: string;
  /** Overrides the logger built from VLOG_LOG_LEVEL */
  logger?: Logger;
}

const OPTIONS = {
  summary: { type: "boolean" },
  timeline: { type: "boolean" },
  alerts: { type: "boolean" },
  visualize: { type: "boolean" },
  json: { type: "boolean" },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    io.stderr(`❌ ${describeError(error)}\n\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    io.stderr(`❌ Expected exactly one log folder\n\n${USAGE}`);
    return 2;
  }

  try {
    loadEnvFile(io.cwd, io.env);
    const logger = io.logger ?? createLogger({ level: resolveLogLevel(io.env) });
    const configPath = values.config ?? io.env.VLOG_CONFIG;
    const config = configPath ? await loadConfigFile(path.resolve(io.cwd, configPath)) : DEFAULT_CONFIG;

    const result = await analyzeFolder(path.resolve(io.cwd, positionals[0]), { config, logger });

    if (values.json) {
      io.stdout(JSON.stringify(serializeResult(result), null, 2) + "\n");
      return 0;
    }

    const sections: string[] = [];
    const anySection = values.summary || values.timeline || values.alerts || values.visualize;
    if (values.summary || !anySection) sections.push(formatSummary(result));
    if (values.timeline) sections.push(formatTimeline(result));
    if (values.alerts) sections.push(formatAlerts(result.anomalies));
    if (values.visualize) sections.push(formatChart(result.timeline));

    io.stdout(sections.join("\n\n") + "\n");
    return 0;
  } catch (error) {
    if (error instanceof LogFolderError || error instanceof ConfigError) {
      io.stderr(`❌ ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
