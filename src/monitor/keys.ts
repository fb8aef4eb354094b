/**
 * Condition identities used as history keys. Keys are plain strings so the
 * history file stays readable:
 *
 *   capacity:<rule>
 *   quota:<rule>@<path>
 *   default-quota:<rule>@<path>
 *   replication:<rule>@<role>:<relationship id>
 *
 * The rule name is percent-encoded, so it never contains "@" and one rule's
 * prefix cannot match another rule's keys.
 */

import type { RelationshipReading } from './types.js';

function ruleId(rule: string): string {
  return encodeURIComponent(rule);
}

export function capacityKey(rule: string): string {
  return `capacity:${ruleId(rule)}`;
}

export function quotaKey(rule: string, path: string): string {
  return `quota:${ruleId(rule)}@${path}`;
}

export function defaultQuotaKey(rule: string, path: string): string {
  return `default-quota:${ruleId(rule)}@${path}`;
}

export function replicationKey(rule: string, relationship: Pick<RelationshipReading, 'role' | 'id'>): string {
  return `replication:${ruleId(rule)}@${relationship.role}:${relationship.id}`;
}

/** Prefix shared by every key a replication or default quota rule owns. */
export function rulePrefix(kind: 'default-quota' | 'replication', rule: string): string {
  return `${kind}:${ruleId(rule)}@`;
}
