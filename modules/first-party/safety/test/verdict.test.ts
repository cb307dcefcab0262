/**
 * Capstack Safety Module — Verdict Aggregation Tests
 *
 *   VER-U1: no verdicts aggregate to a clean verdict
 *   VER-U2: the highest level wins
 *   VER-U3: on equal levels the first verdict is kept, message and metadata untouched
 */

import { describe, it, expect } from 'vitest';
import type { ShieldVerdict } from '@capstack/core';
import { aggregateVerdicts } from '../src/verdict.js';

const warn = (message: string): ShieldVerdict => ({
  violation_level: 'warning',
  user_message: message,
  metadata: { source: message },
});

describe('aggregateVerdicts', () => {
  it('VER-U1: no verdicts aggregate to a clean verdict', () => {
    expect(aggregateVerdicts([])).toEqual({ violation_level: 'none', user_message: '', metadata: {} });
  });

  it('VER-U2: the highest level wins', () => {
    const error: ShieldVerdict = { violation_level: 'error', user_message: 'blocked', metadata: { code: 7 } };

    expect(aggregateVerdicts([warn('a'), error, warn('b')])).toBe(error);
  });

  it('VER-U3: equal levels keep the first verdict seen', () => {
    const first = warn('first');

    const result = aggregateVerdicts([{ violation_level: 'none', user_message: '', metadata: {} }, first, warn('second')]);

    expect(result).toBe(first);
    expect(result.metadata).toEqual({ source: 'first' });
  });
});
