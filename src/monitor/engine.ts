/**
 * Evaluation engine -- turns (rule set, readings, prior history) into alert
 * decisions and the history that replaces the prior one.
 *
 * Pure: no network, mail or file access. Rules run one after another in a
 * fixed order (capacity, quota, default quota, replication). A rule that
 * throws is reported as a failure and keeps its prior entries; the other
 * rules are unaffected.
 */

import { capacityKey, defaultQuotaKey, quotaKey, rulePrefix } from './keys.js';
import { evaluateReplication } from './replication.js';
import { evaluateThreshold } from './thresholds.js';
import type {
  AlertDecision,
  EvaluationResult,
  HistoryEntry,
  HistoryStore,
  QuotaReading,
  Readings,
  RuleFailure,
  ThresholdEntry,
} from './types.js';
import type { QuotaRule, RuleSet } from '../rules/types.js';

interface RuleResult {
  decisions: AlertDecision[];
  entries: Record<string, HistoryEntry>;
  cleared: string[];
}

export interface QuotaPartition {
  /** Paths named by at least one quota rule */
  explicit: Map<string, QuotaReading>;
  /** Every other observed quota, handled by default quota rules */
  defaults: QuotaReading[];
}

/**
 * Split observed quotas into explicitly covered and default ones.
 * Recomputed every run, so adding or removing a quota rule moves a path
 * between the two classes immediately.
 */
export function partitionQuotas(quotas: readonly QuotaReading[], quotaRules: readonly QuotaRule[]): QuotaPartition {
  const covered = new Set(quotaRules.map((rule) => rule.path));
  const explicit = new Map<string, QuotaReading>();
  const defaults: QuotaReading[] = [];

  for (const quota of quotas) {
    if (covered.has(quota.path)) {
      explicit.set(quota.path, quota);
    } else {
      defaults.push(quota);
    }
  }

  return { explicit, defaults };
}

function priorThreshold(prior: Readonly<Record<string, HistoryEntry>>, key: string): ThresholdEntry | undefined {
  const entry = prior[key];
  return entry?.kind === 'threshold' ? entry : undefined;
}

export function emptyHistory(): HistoryStore {
  return { version: 1, updatedAt: null, entries: {} };
}

export function evaluateRules(
  rules: RuleSet,
  readings: Readings,
  history: HistoryStore,
  now: Date = new Date(),
): EvaluationResult {
  const prior = history.entries;
  const entries: Record<string, HistoryEntry> = {};
  const decisions: AlertDecision[] = [];
  const cleared: string[] = [];
  const failures: RuleFailure[] = [];

  function run(kind: string, name: string, owns: (key: string) => boolean, evaluate: () => RuleResult): void {
    try {
      const result = evaluate();
      Object.assign(entries, result.entries);
      decisions.push(...result.decisions);
      cleared.push(...result.cleared);
    } catch (err) {
      failures.push({ kind, rule: name, error: err instanceof Error ? err.message : String(err) });
      for (const [key, entry] of Object.entries(prior)) {
        if (owns(key)) entries[key] = entry;
      }
    }
  }

  // Capacity
  for (const rule of rules.capacityRules) {
    const key = capacityKey(rule.name);
    run(rule.kind, rule.name, (k) => k === key, () => {
      const result: RuleResult = { decisions: [], entries: {}, cleared: [] };
      const capacity = readings.capacity;
      const outcome = evaluateThreshold(rule.thresholds, capacity?.usedPercent ?? null, priorThreshold(prior, key), now);

      if (outcome.status === 'cleared') result.cleared.push(key);
      if (outcome.status === 'quiet' || outcome.status === 'cleared') return result;

      result.entries[key] = outcome.entry;
      if ((outcome.status === 'new' || outcome.status === 'escalated') && capacity) {
        result.decisions.push({
          kind: 'capacity',
          key,
          rule,
          threshold: outcome.threshold,
          previousThreshold: outcome.status === 'escalated' ? outcome.previousThreshold : null,
          capacity,
        });
      }
      return result;
    });
  }

  const { explicit, defaults } = partitionQuotas(readings.quotas, rules.quotaRules);

  // Explicit quota rules: one condition each, missing quota == not alerting
  for (const rule of rules.quotaRules) {
    const key = quotaKey(rule.name, rule.path);
    run(rule.kind, rule.name, (k) => k === key, () => {
      const result: RuleResult = { decisions: [], entries: {}, cleared: [] };
      const quota = explicit.get(rule.path);
      const outcome = evaluateThreshold(rule.thresholds, quota?.usedPercent ?? null, priorThreshold(prior, key), now);

      if (outcome.status === 'cleared') result.cleared.push(key);
      if (outcome.status === 'quiet' || outcome.status === 'cleared') return result;

      result.entries[key] = outcome.entry;
      if ((outcome.status === 'new' || outcome.status === 'escalated') && quota) {
        result.decisions.push({
          kind: 'quota',
          key,
          rule,
          threshold: outcome.threshold,
          previousThreshold: outcome.status === 'escalated' ? outcome.previousThreshold : null,
          quota,
        });
      }
      return result;
    });
  }

  // Default quota rules: one condition per uncovered path
  for (const rule of rules.defaultQuotaRules) {
    const prefix = rulePrefix('default-quota', rule.name);
    run(rule.kind, rule.name, (k) => k.startsWith(prefix), () => {
      const result: RuleResult = { decisions: [], entries: {}, cleared: [] };

      for (const quota of defaults) {
        const key = defaultQuotaKey(rule.name, quota.path);
        const outcome = evaluateThreshold(rule.thresholds, quota.usedPercent, priorThreshold(prior, key), now);
        if (outcome.status === 'quiet' || outcome.status === 'cleared') continue;

        result.entries[key] = outcome.entry;
        if (outcome.status === 'new' || outcome.status === 'escalated') {
          result.decisions.push({
            kind: 'quota',
            key,
            rule,
            threshold: outcome.threshold,
            previousThreshold: outcome.status === 'escalated' ? outcome.previousThreshold : null,
            quota,
          });
        }
      }

      // Paths that vanished, became explicit or dropped below every threshold
      result.cleared.push(
        ...Object.keys(prior).filter((k) => k.startsWith(prefix) && !(k in result.entries)),
      );
      return result;
    });
  }

  // Replication
  for (const rule of rules.replicationRules) {
    const prefix = rulePrefix('replication', rule.name);
    run(rule.kind, rule.name, (k) => k.startsWith(prefix), () => {
      const outcome = evaluateReplication(rule.name, readings.relationships, prior, now);
      return {
        decisions:
          outcome.triggered.length > 0
            ? [{ kind: 'replication', rule, triggered: outcome.triggered, erroring: outcome.erroring }]
            : [],
        entries: outcome.entries,
        cleared: outcome.cleared,
      };
    });
  }

  return {
    decisions,
    history: { version: 1, updatedAt: now.toISOString(), entries },
    cleared,
    failures,
  };
}
