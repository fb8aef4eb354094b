/**
 * Alert message formatting.
 *
 * Turns an alert decision into an HTML email (subject + body + recipients).
 * Paragraphs are separated with <br><br>; values read from the cluster are
 * HTML-escaped, while a rule's custom message is inserted as written so it
 * may carry its own markup.
 */

import { escapeHtml, formatAlertTimestamp, humanizeBytes } from '../utils/format.js';
import type {
  AlertDecision,
  CapacityAlertDecision,
  CapacityReading,
  QuotaAlertDecision,
  RelationshipReading,
  ReplicationAlertDecision,
} from './types.js';

export interface AlertMessage {
  recipients: string[];
  subject: string;
  html: string;
}

export interface ReportContext {
  clusterName: string;
  /** Cluster capacity for quota rules with includeCapacity */
  capacity: CapacityReading | null;
  sentAt: Date;
}

const PARAGRAPH = '<br><br>';

function escalationNote(previousThreshold: number | null): string {
  return previousThreshold === null ? '' : ` It was previously alerted at ${previousThreshold}%.`;
}

function finish(paragraphs: string[], customMessage: string, sentAt: Date): string {
  const all = [...paragraphs];
  if (customMessage) all.push(customMessage);
  all.push(`Alert sent on ${formatAlertTimestamp(sentAt)}`);
  return all.join(PARAGRAPH);
}

// ---------------------------------------------------------------------------
// Per-kind formatters
// ---------------------------------------------------------------------------

export function formatQuotaAlert(decision: QuotaAlertDecision, ctx: ReportContext): AlertMessage {
  const { quota, rule } = decision;
  const path = escapeHtml(quota.path);

  const paragraphs = [
    `The quota on directory path "${path}" has exceeded the usage threshold of ${decision.threshold}%.` +
      escalationNote(decision.previousThreshold),
    `Current quota usage is ${humanizeBytes(quota.usedBytes)} out of ${humanizeBytes(quota.limitBytes)} ` +
      `(${quota.usedPercent}% full).`,
  ];

  if (rule.includeCapacity && ctx.capacity) {
    paragraphs.push(`Cluster total capacity: ${humanizeBytes(ctx.capacity.totalBytes)}`);
  }

  return {
    recipients: rule.mailTo,
    subject: `${ctx.clusterName}: Soft quota alert on path ${quota.path}`,
    html: finish(paragraphs, rule.customMessage, ctx.sentAt),
  };
}

export function formatCapacityAlert(decision: CapacityAlertDecision, ctx: ReportContext): AlertMessage {
  const { capacity, rule } = decision;

  const paragraphs = [
    `The cluster "${escapeHtml(ctx.clusterName)}" has exceeded its usage threshold of ${decision.threshold}%.` +
      escalationNote(decision.previousThreshold),
    `Current usage is ${humanizeBytes(capacity.usedBytes)} out of ${humanizeBytes(capacity.totalBytes)} ` +
      `(${capacity.usedPercent}% full).`,
  ];

  return {
    recipients: rule.mailTo,
    subject: `${ctx.clusterName}: Cluster capacity alert. Usage has exceeded ${decision.threshold}%`,
    html: finish(paragraphs, rule.customMessage, ctx.sentAt),
  };
}

function describeRelationship(r: RelationshipReading): string {
  return [
    `Source cluster name: ${escapeHtml(r.sourceClusterName)}`,
    `Source replication root path: ${escapeHtml(r.sourceRootPath)}`,
    `Target cluster name: ${escapeHtml(r.targetClusterName)}`,
    `Target replication root path: ${escapeHtml(r.targetRootPath)}`,
    `Recovery point: ${escapeHtml(r.recoveryPoint ?? 'none')}`,
    `Error from last replication job: ${escapeHtml(r.error ?? '')}`,
  ].join('<br>');
}

export function formatReplicationAlert(decision: ReplicationAlertDecision, ctx: ReportContext): AlertMessage {
  const triggered = new Set(decision.triggered);
  const stillErroring = decision.erroring.filter((r) => !triggered.has(r));

  const paragraphs = [
    'The following replication relationships have reported an error:',
    ...decision.triggered.map(describeRelationship),
  ];

  if (stillErroring.length > 0) {
    paragraphs.push(
      'These relationships were reported earlier and are still erroring:',
      ...stillErroring.map(describeRelationship),
    );
  }

  return {
    recipients: decision.rule.mailTo,
    subject: `${ctx.clusterName}: Relationship error alert.`,
    html: finish(paragraphs, decision.rule.customMessage, ctx.sentAt),
  };
}

export function formatAlert(decision: AlertDecision, ctx: ReportContext): AlertMessage {
  switch (decision.kind) {
    case 'quota':
      return formatQuotaAlert(decision, ctx);
    case 'capacity':
      return formatCapacityAlert(decision, ctx);
    case 'replication':
      return formatReplicationAlert(decision, ctx);
  }
}

/** One-line description of a decision for the run log. */
export function describeDecision(decision: AlertDecision): string {
  switch (decision.kind) {
    case 'quota': {
      const verb = decision.previousThreshold === null ? 'exceeds' : 'escalated to';
      return `Quota "${decision.quota.path}" ${verb} threshold of ${decision.threshold}% ` +
        `(usage ${decision.quota.usedPercent}%) for ${decision.rule.kind} rule "${decision.rule.name}"`;
    }
    case 'capacity': {
      const verb = decision.previousThreshold === null ? 'exceeds' : 'escalated to';
      return `Cluster usage of ${decision.capacity.usedPercent}% ${verb} threshold of ${decision.threshold}% ` +
        `for capacity rule "${decision.rule.name}"`;
    }
    case 'replication':
      return `${decision.triggered.length} replication relationship(s) reported a new error ` +
        `for replication rule "${decision.rule.name}"`;
  }
}
