// ---------------------------------------------------------------------------
// Validated rule set -- the typed form of the JSON rule document
// ---------------------------------------------------------------------------

export interface ClusterSettings {
  clusterName: string;
  address: string;
  restPort: number;
  username: string;
  password: string;
}

export interface EmailSettings {
  senderAddress: string;
  serverAddress: string;
}

interface ThresholdRuleBase {
  name: string;
  /** Distinct percentages in ascending order */
  thresholds: number[];
  mailTo: string[];
  customMessage: string;
}

/** Watches one named directory quota. */
export interface QuotaRule extends ThresholdRuleBase {
  kind: 'quota';
  /** Normalised with a trailing slash */
  path: string;
  includeCapacity: boolean;
}

/** Applies to every observed quota that no QuotaRule names. */
export interface DefaultQuotaRule extends ThresholdRuleBase {
  kind: 'default-quota';
  includeCapacity: boolean;
}

export interface CapacityRule extends ThresholdRuleBase {
  kind: 'capacity';
}

export interface ReplicationRule {
  kind: 'replication';
  name: string;
  mailTo: string[];
  customMessage: string;
}

export type ThresholdRule = QuotaRule | DefaultQuotaRule | CapacityRule;
export type Rule = ThresholdRule | ReplicationRule;

export interface RuleSet {
  quotaRules: QuotaRule[];
  defaultQuotaRules: DefaultQuotaRule[];
  capacityRules: CapacityRule[];
  replicationRules: ReplicationRule[];
}

export interface AlertsConfig {
  cluster: ClusterSettings;
  email: EmailSettings;
  rules: RuleSet;
}
