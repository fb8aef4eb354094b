// ---------------------------------------------------------------------------
// Alerting domain types: readings, history, decisions
// ---------------------------------------------------------------------------

import type {
  CapacityRule,
  DefaultQuotaRule,
  QuotaRule,
  ReplicationRule,
} from '../rules/types.js';

// ----------------------------------------------------------------- Readings

export interface CapacityReading {
  usedBytes: number;
  totalBytes: number;
  /** Rounded to two decimals */
  usedPercent: number;
}

export interface QuotaReading {
  /** Directory path, always with a trailing slash */
  path: string;
  usedBytes: number;
  limitBytes: number;
  usedPercent: number;
}

export type RelationshipRole = 'source' | 'target';

export interface RelationshipReading {
  id: string;
  role: RelationshipRole;
  sourceClusterName: string;
  sourceRootPath: string;
  targetClusterName: string;
  targetRootPath: string;
  recoveryPoint: string | null;
  /** Error from the last replication job, null when healthy */
  error: string | null;
}

/**
 * One run's snapshot of the cluster. A reading that could not be fetched is
 * null (capacity) or simply absent (quotas, relationships).
 */
export interface Readings {
  capacity: CapacityReading | null;
  quotas: QuotaReading[];
  relationships: RelationshipReading[];
}

/**
 * Read-only view of the cluster. Each call may fail independently; the
 * caller degrades a failed call to "reading unavailable".
 */
export interface MetricSource {
  getCapacityUsage(): Promise<{ usedBytes: number; totalBytes: number }>;
  listQuotaUsage(): Promise<Array<{ path: string; usedBytes: number; limitBytes: number }>>;
  listReplicationRelationships(): Promise<RelationshipReading[]>;
}

// ------------------------------------------------------------------ History

export interface ThresholdEntry {
  kind: 'threshold';
  /** Highest threshold alerted on */
  threshold: number;
  /** ISO-8601 */
  alertedAt: string;
}

export interface ReplicationEntry {
  kind: 'replication';
  /** Recovery point and error detail the alert was sent for */
  signature: string;
  alertedAt: string;
}

export type HistoryEntry = ThresholdEntry | ReplicationEntry;

/**
 * Conditions that were alerting as of the last run, keyed by condition
 * identity (see ./keys.ts).
 */
export interface HistoryStore {
  version: 1;
  updatedAt: string | null;
  entries: Readonly<Record<string, HistoryEntry>>;
}

// ---------------------------------------------------------------- Decisions

interface ThresholdDecisionBase {
  key: string;
  threshold: number;
  /** Set when this decision escalates an earlier alert */
  previousThreshold: number | null;
}

export interface QuotaAlertDecision extends ThresholdDecisionBase {
  kind: 'quota';
  rule: QuotaRule | DefaultQuotaRule;
  quota: QuotaReading;
}

export interface CapacityAlertDecision extends ThresholdDecisionBase {
  kind: 'capacity';
  rule: CapacityRule;
  capacity: CapacityReading;
}

export interface ReplicationAlertDecision {
  kind: 'replication';
  rule: ReplicationRule;
  /** Relationships that are newly erroring or whose error changed */
  triggered: RelationshipReading[];
  /** Every relationship currently reporting an error */
  erroring: RelationshipReading[];
}

export type AlertDecision = QuotaAlertDecision | CapacityAlertDecision | ReplicationAlertDecision;

export interface RuleFailure {
  kind: string;
  rule: string;
  error: string;
}

export interface EvaluationResult {
  decisions: AlertDecision[];
  history: HistoryStore;
  /** Keys of conditions that stopped alerting this run */
  cleared: string[];
  failures: RuleFailure[];
}
