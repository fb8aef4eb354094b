/**
 * Builders shared by the engine, history and reporter tests.
 */

import type {
  CapacityRule,
  DefaultQuotaRule,
  QuotaRule,
  ReplicationRule,
  RuleSet,
} from '../rules/types.js';
import type { QuotaReading, Readings, RelationshipReading } from '../monitor/types.js';

export function quotaRule(overrides: Partial<QuotaRule> = {}): QuotaRule {
  return {
    kind: 'quota',
    name: 'warn',
    path: '/eng/',
    thresholds: [50, 75, 90],
    mailTo: ['ops@example.test'],
    customMessage: '',
    includeCapacity: false,
    ...overrides,
  };
}

export function defaultQuotaRule(overrides: Partial<DefaultQuotaRule> = {}): DefaultQuotaRule {
  return {
    kind: 'default-quota',
    name: 'default',
    thresholds: [80],
    mailTo: ['ops@example.test'],
    customMessage: '',
    includeCapacity: false,
    ...overrides,
  };
}

export function capacityRule(overrides: Partial<CapacityRule> = {}): CapacityRule {
  return {
    kind: 'capacity',
    name: 'cluster',
    thresholds: [80, 90],
    mailTo: ['ops@example.test'],
    customMessage: '',
    ...overrides,
  };
}

export function replicationRule(overrides: Partial<ReplicationRule> = {}): ReplicationRule {
  return {
    kind: 'replication',
    name: 'repl',
    mailTo: ['ops@example.test'],
    customMessage: '',
    ...overrides,
  };
}

export function ruleSet(overrides: Partial<RuleSet> = {}): RuleSet {
  return {
    quotaRules: [],
    defaultQuotaRules: [],
    capacityRules: [],
    replicationRules: [],
    ...overrides,
  };
}

/** Quota reading with a 1 TB limit at the given percentage. */
export function quota(path: string, usedPercent: number): QuotaReading {
  const limitBytes = 1_000_000_000_000;
  return { path, usedBytes: Math.round((limitBytes * usedPercent) / 100), limitBytes, usedPercent };
}

export function relationship(overrides: Partial<RelationshipReading> = {}): RelationshipReading {
  return {
    id: 'rel-1',
    role: 'source',
    sourceClusterName: 'east',
    sourceRootPath: '/data/',
    targetClusterName: 'west',
    targetRootPath: '/backup/',
    recoveryPoint: '2026-10-18T00:00:00Z',
    error: null,
    ...overrides,
  };
}

export function readings(overrides: Partial<Readings> = {}): Readings {
  return { capacity: null, quotas: [], relationships: [], ...overrides };
}
