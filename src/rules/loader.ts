import fs from 'node:fs';
import type { ZodIssue } from 'zod';
import { config } from '../config.js';
import { ConfigError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { normalizeQuotaPath, ruleDocumentSchema, type RuleDocument } from './schema.js';
import type { AlertsConfig, QuotaRule, RuleSet } from './types.js';

const log = createLogger('Rules');

export interface LoadRulesOptions {
  /** Wins over cluster_settings.password when non-empty */
  passwordOverride?: string;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(document)';
  return `${where}: ${issue.message}`;
}

function readDocument(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(`Configuration file "${file}" does not exist`);
    }
    throw new ConfigError(`Configuration file "${file}" could not be read: ${errorMessage(err)}`);
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON file: ${file}. Error: ${errorMessage(err)}`);
  }
}

function buildRuleSet(doc: RuleDocument): RuleSet {
  const quotaRules: QuotaRule[] = [];
  const issues: string[] = [];
  const seenPaths = new Map<string, string>();

  for (const [rawPath, group] of Object.entries(doc.quota_rules)) {
    const path = normalizeQuotaPath(rawPath);
    const clash = seenPaths.get(path);
    if (clash !== undefined) {
      issues.push(`quota_rules.${rawPath}: same directory as quota_rules.${clash}`);
      continue;
    }
    seenPaths.set(path, rawPath);

    for (const [name, rule] of Object.entries(group.rules)) {
      quotaRules.push({
        kind: 'quota',
        name,
        path,
        thresholds: rule.thresholds,
        mailTo: rule.mail_to,
        customMessage: rule.custom_msg,
        includeCapacity: rule.include_capacity,
      });
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid rule document', issues);
  }

  return {
    quotaRules,
    defaultQuotaRules: Object.entries(doc.default_quota_rules.rules).map(([name, rule]) => ({
      kind: 'default-quota' as const,
      name,
      thresholds: rule.thresholds,
      mailTo: rule.mail_to,
      customMessage: rule.custom_msg,
      includeCapacity: rule.include_capacity,
    })),
    capacityRules: Object.entries(doc.capacity_rules).map(([name, rule]) => {
      if (rule.include_capacity !== undefined) {
        log.warn(`capacity rule "${name}" sets include_capacity, which only applies to quota rules; ignoring it`);
      }
      return {
        kind: 'capacity' as const,
        name,
        thresholds: rule.thresholds,
        mailTo: rule.mail_to,
        customMessage: rule.custom_msg,
      };
    }),
    replicationRules: Object.entries(doc.replication_rules).map(([name, rule]) => ({
      kind: 'replication' as const,
      name,
      mailTo: rule.mail_to,
      customMessage: rule.custom_msg,
    })),
  };
}

function warnOnZeroThresholds(rules: RuleSet): void {
  const thresholdRules = [...rules.quotaRules, ...rules.defaultQuotaRules, ...rules.capacityRules];
  for (const rule of thresholdRules) {
    if (rule.thresholds.includes(0)) {
      log.warn(`${rule.kind} rule "${rule.name}" has a threshold of 0 and will match any usage`);
    }
  }
}

/**
 * Parse and validate a rule document that is already in memory.
 * Throws ConfigError listing every offending field.
 */
export function parseRulesConfig(input: unknown, options: LoadRulesOptions = {}): AlertsConfig {
  const parsed = ruleDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid rule document', parsed.error.issues.map(formatIssue));
  }

  const doc = parsed.data;
  const password = options.passwordOverride || doc.cluster_settings.password;
  if (!password) {
    throw new ConfigError('Invalid rule document', [
      'cluster_settings.password: required unless CLUSTER_PASSWORD is set',
    ]);
  }

  const rules = buildRuleSet(doc);
  warnOnZeroThresholds(rules);

  return {
    cluster: {
      clusterName: doc.cluster_settings.cluster_name,
      address: doc.cluster_settings.cluster_address,
      restPort: doc.cluster_settings.rest_port,
      username: doc.cluster_settings.username,
      password,
    },
    email: {
      senderAddress: doc.email_settings.sender_address,
      serverAddress: doc.email_settings.server_address,
    },
    rules,
  };
}

/** Load, parse and validate the rule document at `file`. */
export function loadRulesConfig(
  file: string,
  options: LoadRulesOptions = { passwordOverride: config.clusterPassword },
): AlertsConfig {
  const alertsConfig = parseRulesConfig(readDocument(file), options);
  const { rules } = alertsConfig;
  log.debug(
    `Loaded ${file}: ${rules.quotaRules.length} quota, ${rules.defaultQuotaRules.length} default quota, ` +
      `${rules.capacityRules.length} capacity, ${rules.replicationRules.length} replication rule(s)`,
  );
  return alertsConfig;
}
