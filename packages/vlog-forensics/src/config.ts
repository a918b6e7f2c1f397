/**
 * Analysis configuration: rule parameters and input selection
 */

import * as fs from "fs/promises";
import { existsSync, readFileSync } from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const RepeatedIpSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxAttempts: z.number().int().min(1).default(5),
    windowSeconds: z.number().positive().default(60),
  })
  .strict();

const OffPatternActionSchema = z
  .object({
    enabled: z.boolean().default(true),
    minHistory: z.number().int().min(1).default(3),
  })
  .strict();

const UnknownSpikeSchema = z
  .object({
    enabled: z.boolean().default(true),
    windowSize: z.number().int().min(1).default(20),
    threshold: z.number().min(0).max(1).default(0.5),
    minRecords: z.number().int().min(1).default(5),
  })
  .strict();

const ShadowLoadDeleteSchema = z
  .object({
    enabled: z.boolean().default(true),
    lookahead: z.number().int().min(1).default(5),
    windowSeconds: z.number().positive().default(600),
  })
  .strict();

const CreateDeleteSchema = z
  .object({
    enabled: z.boolean().default(true),
    lookahead: z.number().int().min(1).default(5),
  })
  .strict();

const SuspiciousExecSchema = z
  .object({
    enabled: z.boolean().default(true),
    binaries: z
      .array(z.string().min(1))
      .default(["/bin/xz", "/bin/nc", "/usr/bin/python3", "/usr/bin/perl"]),
  })
  .strict();

const BinaryDeleteSchema = z
  .object({
    enabled: z.boolean().default(true),
    extensions: z.array(z.string().min(1)).default([".exe", ".bin", ".out", ".so"]),
    directories: z.array(z.string().min(1)).default(["/bin/", "/tmp/", "/sbin/", "/usr/local/bin/"]),
  })
  .strict();

export const AnalysisConfigSchema = z
  .object({
    extension: z
      .string()
      .regex(/^\.[\w-]+$/, "Extension must look like .vlog")
      .default(".vlog"),
    rules: z
      .object({
        repeatedIp: RepeatedIpSchema.default({}),
        offPatternAction: OffPatternActionSchema.default({}),
        unknownSpike: UnknownSpikeSchema.default({}),
        shadowLoadDelete: ShadowLoadDeleteSchema.default({}),
        createDelete: CreateDeleteSchema.default({}),
        suspiciousExec: SuspiciousExecSchema.default({}),
        binaryDelete: BinaryDeleteSchema.default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type RuleConfig = AnalysisConfig["rules"];

export const DEFAULT_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});

export function parseConfig(input: unknown, origin = "configuration"): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(origin, `Invalid ${origin}: ${issues}`);
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file
 */
export async function loadConfigFile(filePath: string): Promise<AnalysisConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(filePath, `Cannot read config file ${filePath}: ${describeError(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(filePath, `Config file ${filePath} is not valid JSON: ${describeError(error)}`);
  }
  return parseConfig(data, filePath);
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Load KEY=value pairs from a .env file into `target`.
 * Keys already present in `target` win over the file. Throws ConfigError
 * when the file exists but cannot be read.
 */
export function loadEnvFile(dir: string, target: EnvSource): string | null {
  const envPath = path.join(dir, ".env");
  if (!existsSync(envPath)) return null;

  let envContent: string;
  try {
    envContent = readFileSync(envPath, "utf-8");
  } catch (error) {
    throw new ConfigError(envPath, `Cannot read env file ${envPath}: ${describeError(error)}`);
  }
  for (const line of envContent.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const [key, ...valueParts] = trimmed.split("=");
    const value = valueParts.join("=").trim();
    if (key && value && target[key.trim()] === undefined) {
      target[key.trim()] = value.replace(/^["']|["']$/g, "");
    }
  }
  return envPath;
}

export function resolveLogLevel(env: EnvSource): LogLevel {
  const normalized = (env.VLOG_LOG_LEVEL ?? "warn").trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  throw new ConfigError("VLOG_LOG_LEVEL", `Invalid VLOG_LOG_LEVEL: ${normalized}`);
}
