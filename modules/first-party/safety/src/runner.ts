/**
 * Capstack Safety Module — Shield Runner
 *
 * Serves the `safety` group: picks the classifier for the requested shield
 * type, runs it, and reduces its verdicts to one.
 */

import { RoutingError } from '@capstack/core';
import type {
  InvokeOptions,
  ListShieldTypesResponse,
  RunShieldRequest,
  SafetyApi,
  ShieldVerdict,
} from '@capstack/core';
import type { ShieldClassifier } from './classifier.js';
import { aggregateVerdicts } from './verdict.js';

export class ShieldRunner implements SafetyApi {
  private readonly classifiers = new Map<string, ShieldClassifier>();

  constructor(classifiers: ReadonlyArray<ShieldClassifier>) {
    for (const classifier of classifiers) {
      this.classifiers.set(classifier.shield_type, classifier);
    }
  }

  async run_shield(request: RunShieldRequest, options: InvokeOptions): Promise<ShieldVerdict> {
    const classifier = this.classifiers.get(request.shield_type);
    if (classifier === undefined) {
      throw new RoutingError(
        'UnknownShield',
        `Shield type '${request.shield_type}' is not served; available: ${[...this.classifiers.keys()].join(', ')}`,
      );
    }
    const verdicts = await classifier.classify(request.messages, request.params ?? {}, options);
    return aggregateVerdicts(verdicts);
  }

  async list_shield_types(): Promise<ListShieldTypesResponse> {
    return { shield_types: [...this.classifiers.keys()] };
  }
}
