/**
 * Unit tests for threshold matching and per-condition dedup.
 * Pure functions -- no mocking needed.
 */

import { describe, it, expect } from 'vitest';
import { evaluateThreshold, matchThreshold } from '../monitor/thresholds.js';
import type { ThresholdEntry } from '../monitor/types.js';

const NOW = new Date('2026-10-19T12:00:00.000Z');

describe('matchThreshold', () => {
  it('returns null below the lowest threshold', () => {
    expect(matchThreshold([50, 75, 90], 40)).toBeNull();
  });

  it('returns the highest threshold at or below the usage', () => {
    expect(matchThreshold([50, 75, 90], 60)).toBe(50);
    expect(matchThreshold([50, 75, 90], 75)).toBe(75);
    expect(matchThreshold([50, 75, 90], 95)).toBe(90);
  });

  it('does not depend on threshold order', () => {
    expect(matchThreshold([90, 50, 75], 80)).toBe(75);
  });

  it('matches a zero threshold at zero usage', () => {
    expect(matchThreshold([0], 0)).toBe(0);
  });
});

describe('evaluateThreshold', () => {
  it('is quiet with no match and no history', () => {
    expect(evaluateThreshold([95], 10, undefined, NOW)).toEqual({ status: 'quiet' });
  });

  it('treats an unavailable reading as not alerting', () => {
    const prior: ThresholdEntry = { kind: 'threshold', threshold: 95, alertedAt: '2026-10-18T12:00:00.000Z' };
    expect(evaluateThreshold([95], null, prior, NOW)).toEqual({ status: 'cleared', previousThreshold: 95 });
  });

  it('creates an entry for a new alert', () => {
    expect(evaluateThreshold([95], 96.2, undefined, NOW)).toEqual({
      status: 'new',
      threshold: 95,
      entry: { kind: 'threshold', threshold: 95, alertedAt: '2026-10-19T12:00:00.000Z' },
    });
  });

  it('escalates when a higher threshold is crossed', () => {
    const prior: ThresholdEntry = { kind: 'threshold', threshold: 50, alertedAt: '2026-10-18T12:00:00.000Z' };
    const outcome = evaluateThreshold([50, 75, 90], 80, prior, NOW);
    expect(outcome).toEqual({
      status: 'escalated',
      threshold: 75,
      previousThreshold: 50,
      entry: { kind: 'threshold', threshold: 75, alertedAt: '2026-10-19T12:00:00.000Z' },
    });
  });

  it('keeps the higher stored threshold when usage drops but still matches', () => {
    const prior: ThresholdEntry = { kind: 'threshold', threshold: 90, alertedAt: '2026-10-18T12:00:00.000Z' };
    const outcome = evaluateThreshold([50, 75, 90], 80, prior, NOW);
    expect(outcome).toEqual({ status: 'unchanged', threshold: 75, entry: prior });
  });

  it('alerts exactly once per threshold as usage rises 40 -> 60 -> 80 -> 95', () => {
    const thresholds = [50, 75, 90];
    let entry: ThresholdEntry | undefined;
    const alertedAt: number[] = [];

    for (const usage of [40, 60, 80, 95, 95]) {
      const outcome = evaluateThreshold(thresholds, usage, entry, NOW);
      if (outcome.status === 'new' || outcome.status === 'escalated') alertedAt.push(outcome.threshold);
      entry = outcome.status === 'quiet' || outcome.status === 'cleared' ? undefined : outcome.entry;
    }

    expect(alertedAt).toEqual([50, 75, 90]);
  });

  it('re-alerts on the lowest threshold after clearing', () => {
    const thresholds = [50, 75];
    const first = evaluateThreshold(thresholds, 60, undefined, NOW);
    expect(first.status).toBe('new');
    const firstEntry = first.status === 'new' ? first.entry : undefined;

    const dropped = evaluateThreshold(thresholds, 30, firstEntry, NOW);
    expect(dropped).toEqual({ status: 'cleared', previousThreshold: 50 });

    const again = evaluateThreshold(thresholds, 55, undefined, NOW);
    expect(again.status).toBe('new');
  });
});
