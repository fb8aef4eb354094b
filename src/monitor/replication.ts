/**
 * Replication state tracking -- remembers which relationship errors have
 * been alerted on.
 *
 * A relationship alerts when it starts erroring, and again whenever its
 * error signature (recovery point + last error) changes while it is still
 * erroring. A healthy or vanished relationship forgets its entry, so the
 * next error alerts afresh.
 */

import { replicationKey, rulePrefix } from './keys.js';
import type { HistoryEntry, RelationshipReading, ReplicationEntry } from './types.js';

export interface ReplicationOutcome {
  /** Erroring relationships that need an alert this run */
  triggered: RelationshipReading[];
  /** Every erroring relationship */
  erroring: RelationshipReading[];
  /** Entries to persist for this rule */
  entries: Record<string, ReplicationEntry>;
  /** Keys of entries dropped because the relationship recovered */
  cleared: string[];
}

export function relationshipSignature(relationship: RelationshipReading): string {
  return `${relationship.recoveryPoint ?? 'no recovery point'} | ${relationship.error ?? ''}`;
}

export function evaluateReplication(
  ruleName: string,
  relationships: readonly RelationshipReading[],
  prior: Readonly<Record<string, HistoryEntry>>,
  now: Date,
): ReplicationOutcome {
  const triggered: RelationshipReading[] = [];
  const erroring: RelationshipReading[] = [];
  const entries: Record<string, ReplicationEntry> = {};

  for (const relationship of relationships) {
    if (relationship.error === null) continue;
    erroring.push(relationship);

    const key = replicationKey(ruleName, relationship);
    const signature = relationshipSignature(relationship);
    const previous = prior[key];

    if (previous?.kind === 'replication' && previous.signature === signature) {
      entries[key] = previous;
      continue;
    }

    triggered.push(relationship);
    entries[key] = { kind: 'replication', signature, alertedAt: now.toISOString() };
  }

  const prefix = rulePrefix('replication', ruleName);
  const cleared = Object.keys(prior).filter((key) => key.startsWith(prefix) && !(key in entries));

  return { triggered, erroring, entries, cleared };
}
