/**
 * Capstack Safety Module — Classifier Interface
 */

import type { InvokeOptions, Message, ShieldVerdict } from '@capstack/core';

/** One shield type's backend. */
export interface ShieldClassifier {
  readonly shield_type: string;
  /**
   * Classify a conversation. Returns every verdict raised; an empty list
   * means nothing was flagged.
   *
   * @param params - per-call parameters, e.g. those stored with a named shield
   */
  classify(
    messages: ReadonlyArray<Message>,
    params: Readonly<Record<string, unknown>>,
    options: InvokeOptions,
  ): Promise<ReadonlyArray<ShieldVerdict>>;
}
