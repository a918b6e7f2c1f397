/**
 * Anomaly rules and the default rule set
 */

import type { RuleConfig } from "../config.js";
import { createBinaryDeleteRule } from "./binary-delete.js";
import { createCreateDeleteRule } from "./create-delete.js";
import { RuleRegistry } from "./engine.js";
import { createOffPatternActionRule } from "./off-pattern-action.js";
import { createRepeatedIpRule } from "./repeated-ip.js";
import { createShadowLoadDeleteRule } from "./shadow-load-delete.js";
import { createSuspiciousExecRule } from "./suspicious-exec.js";
import { createUnknownSpikeRule } from "./unknown-spike.js";

export { RuleRegistry, runRules, tagRecords, type AnomalyRule } from "./engine.js";
export { createBinaryDeleteRule, type BinaryDeleteParams } from "./binary-delete.js";
export { createCreateDeleteRule, type CreateDeleteParams } from "./create-delete.js";
export { createOffPatternActionRule, type OffPatternActionParams } from "./off-pattern-action.js";
export { createRepeatedIpRule, type RepeatedIpParams } from "./repeated-ip.js";
export { createShadowLoadDeleteRule, type ShadowLoadDeleteParams } from "./shadow-load-delete.js";
export { createSuspiciousExecRule, type SuspiciousExecParams } from "./suspicious-exec.js";
export { createUnknownSpikeRule, type UnknownSpikeParams } from "./unknown-spike.js";

/**
 * Fresh registry holding every enabled built-in rule
 */
export function createDefaultRules(config: RuleConfig): RuleRegistry {
  const registry = new RuleRegistry();
  if (config.repeatedIp.enabled) registry.register(createRepeatedIpRule(config.repeatedIp));
  if (config.offPatternAction.enabled) registry.register(createOffPatternActionRule(config.offPatternAction));
  if (config.unknownSpike.enabled) registry.register(createUnknownSpikeRule(config.unknownSpike));
  if (config.shadowLoadDelete.enabled) registry.register(createShadowLoadDeleteRule(config.shadowLoadDelete));
  if (config.createDelete.enabled) registry.register(createCreateDeleteRule(config.createDelete));
  if (config.suspiciousExec.enabled) registry.register(createSuspiciousExecRule(config.suspiciousExec));
  if (config.binaryDelete.enabled) registry.register(createBinaryDeleteRule(config.binaryDelete));
  return registry;
}
