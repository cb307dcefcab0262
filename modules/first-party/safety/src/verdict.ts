/**
 * Capstack Safety Module — Verdict Aggregation
 *
 * A shield call may yield several verdicts (one per matching rule, one per
 * classifier pass). The call returns the single most severe one.
 */

import type { ShieldVerdict, ViolationLevel } from '@capstack/core';

const SEVERITY: Readonly<Record<ViolationLevel, number>> = {
  none: 0,
  warning: 1,
  error: 2,
};

export function severity(level: ViolationLevel): number {
  return SEVERITY[level];
}

/** The verdict of a call in which nothing was flagged. */
export function safeVerdict(): ShieldVerdict {
  return { violation_level: 'none', user_message: '', metadata: {} };
}

/**
 * Highest level wins; among verdicts at that level the first one seen
 * supplies `user_message` and `metadata`, unchanged.
 */
export function aggregateVerdicts(verdicts: Iterable<ShieldVerdict>): ShieldVerdict {
  let worst: ShieldVerdict | undefined;
  for (const verdict of verdicts) {
    if (worst === undefined || severity(verdict.violation_level) > severity(worst.violation_level)) {
      worst = verdict;
    }
  }
  return worst ?? safeVerdict();
}
