/**
 * @capstack/module-safety
 *
 * Shield runner (`safety` group) and named shield registry (`shields`
 * group), with the Llama Guard and pattern classifiers.
 */

export {
  SAFETY_PROVIDER,
  SHIELDS_PROVIDER,
  LlamaGuardConfigSchema,
  SafetyProviderConfigSchema,
  ShieldsProviderConfigSchema,
} from './manifest.js';
export type { SafetyProviderConfig, ShieldsProviderConfig } from './manifest.js';
export type { ShieldClassifier } from './classifier.js';
export { ShieldRunner } from './runner.js';
export { ShieldRegistry } from './shield-registry.js';
export type { ShieldTypeLookup } from './shield-registry.js';
export { aggregateVerdicts, safeVerdict, severity } from './verdict.js';
export {
  CANNED_REFUSAL,
  LLAMA_GUARD_CATEGORIES,
  LLAMA_GUARD_SHIELD_TYPE,
  LlamaGuardClassifier,
  buildLlamaGuardPrompt,
  isLlamaGuardCategory,
  parseAssessment,
} from './llama-guard.js';
export type { ChatCompletion, LlamaGuardOptions } from './llama-guard.js';
export { PATTERN_SHIELD_TYPE, PatternClassifier, PatternRuleSchema, compileRules } from './pattern.js';
export type { PatternRule } from './pattern.js';
