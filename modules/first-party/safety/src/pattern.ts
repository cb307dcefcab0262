/**
 * Capstack Safety Module — Pattern Classifier
 *
 * Regular-expression rules evaluated against every message, in message
 * order then rule order. Each match raises one verdict. Runs offline.
 */

import { z } from 'zod';
import type { InvokeOptions, Message, ShieldVerdict } from '@capstack/core';
import type { ShieldClassifier } from './classifier.js';

export const PATTERN_SHIELD_TYPE = 'pattern';

export const PatternRuleSchema = z.object({
  pattern: z.string().min(1),
  /** RegExp flags; `g` and `y` are ignored. */
  flags: z.string().default('i'),
  category: z.string().min(1),
  level: z.enum(['warning', 'error']).default('error'),
  message: z.string(),
});
export type PatternRule = z.output<typeof PatternRuleSchema>;

interface CompiledRule {
  readonly rule: PatternRule;
  readonly regex: RegExp;
}

/**
 * @throws {SyntaxError} when a rule's pattern or flags are not a valid RegExp
 */
export function compileRules(rules: ReadonlyArray<PatternRule>): CompiledRule[] {
  return rules.map((rule) => ({ rule, regex: new RegExp(rule.pattern, rule.flags.replace(/[gy]/g, '')) }));
}

export class PatternClassifier implements ShieldClassifier {
  readonly shield_type = PATTERN_SHIELD_TYPE;
  private readonly rules: CompiledRule[];

  constructor(rules: ReadonlyArray<PatternRule>) {
    this.rules = compileRules(rules);
  }

  async classify(
    messages: ReadonlyArray<Message>,
    _params: Readonly<Record<string, unknown>>,
    _options: InvokeOptions,
  ): Promise<ReadonlyArray<ShieldVerdict>> {
    const verdicts: ShieldVerdict[] = [];
    messages.forEach((message, index) => {
      for (const { rule, regex } of this.rules) {
        if (regex.test(message.content)) {
          verdicts.push({
            violation_level: rule.level,
            user_message: rule.message,
            metadata: { violation_type: rule.category, message_index: index },
          });
        }
      }
    });
    return verdicts;
  }
}
