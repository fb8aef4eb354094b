/**
 * Threshold evaluator -- compares a usage percentage with a rule's
 * thresholds and with the entry remembered from the last run, so that a
 * condition alerts once per threshold instead of on every run.
 */

import type { ThresholdEntry } from './types.js';

export type ThresholdOutcome =
  /** Below every threshold, nothing remembered */
  | { status: 'quiet' }
  /** Dropped below every threshold; the remembered entry goes away */
  | { status: 'cleared'; previousThreshold: number }
  /** Alerting for the first time */
  | { status: 'new'; threshold: number; entry: ThresholdEntry }
  /** Crossed a higher threshold than the one alerted on */
  | { status: 'escalated'; threshold: number; previousThreshold: number; entry: ThresholdEntry }
  /** Already alerted at this or a higher threshold */
  | { status: 'unchanged'; threshold: number; entry: ThresholdEntry };

/**
 * Highest threshold at or below `usedPercent`, or null when none is.
 * Order of `thresholds` does not matter.
 */
export function matchThreshold(thresholds: readonly number[], usedPercent: number): number | null {
  let matched: number | null = null;
  for (const threshold of thresholds) {
    if (usedPercent >= threshold && (matched === null || threshold > matched)) {
      matched = threshold;
    }
  }
  return matched;
}

/**
 * Decide what one threshold condition does this run.
 *
 * @param usedPercent - null when the reading is unavailable (treated as not alerting)
 * @param prior - entry persisted by the previous run, if any
 */
export function evaluateThreshold(
  thresholds: readonly number[],
  usedPercent: number | null,
  prior: ThresholdEntry | undefined,
  now: Date,
): ThresholdOutcome {
  const matched = usedPercent === null ? null : matchThreshold(thresholds, usedPercent);

  if (matched === null) {
    return prior ? { status: 'cleared', previousThreshold: prior.threshold } : { status: 'quiet' };
  }

  const entry: ThresholdEntry = { kind: 'threshold', threshold: matched, alertedAt: now.toISOString() };

  if (!prior) {
    return { status: 'new', threshold: matched, entry };
  }

  if (prior.threshold < matched) {
    return { status: 'escalated', threshold: matched, previousThreshold: prior.threshold, entry };
  }

  return { status: 'unchanged', threshold: matched, entry: prior };
}
