/**
 * One alert run: rules -> lock -> history -> readings -> evaluation ->
 * notifications -> history.
 *
 * The rule document is validated before anything else happens, so a bad
 * configuration never leads to partial alerting. Send failures are logged
 * and do not undo the history update: an undelivered condition still counts
 * as alerted. A history write failure is fatal and rethrown after logging.
 */

import { QumuloClient } from '../clients/qumulo.js';
import { config } from '../config.js';
import { createLogger, errorMessage } from '../logger.js';
import { loadRulesConfig } from '../rules/loader.js';
import type { AlertsConfig, ClusterSettings } from '../rules/types.js';
import { evaluateRules } from './engine.js';
import { acquireHistoryLock, loadHistory, saveHistory } from './history.js';
import { DryRunNotifier, SmtpNotifier, type Notifier } from './notifier.js';
import { collectReadings, type ReadingNeeds } from './readings.js';
import { describeDecision, formatAlert } from './reporter.js';
import type { MetricSource } from './types.js';

const log = createLogger('Run');

export interface RunOptions {
  configFile: string;
  historyFile: string;
  /** false for --no-emails: evaluate and log, never send */
  sendEmails: boolean;
}

export interface RunDependencies {
  /** Connects to the cluster; defaults to a logged-in QumuloClient */
  connect?: (cluster: ClusterSettings) => Promise<MetricSource>;
  /** Defaults to SMTP, or to a dry run when sendEmails is false */
  notifier?: Notifier;
  now?: () => Date;
}

export interface RunSummary {
  decisions: number;
  sent: number;
  failedSends: number;
  cleared: number;
  ruleFailures: number;
}

async function connectToCluster(cluster: ClusterSettings): Promise<MetricSource> {
  const client = new QumuloClient({
    host: cluster.address,
    port: cluster.restPort,
    username: cluster.username,
    password: cluster.password,
    timeoutMs: config.restTimeoutMs,
    quotaPageSize: config.quotaPageSize,
  });
  await client.login();
  log.debug(`Logged in to ${client.clusterHost} as ${cluster.username}`);
  return client;
}

function defaultNotifier(alertsConfig: AlertsConfig, sendEmails: boolean): Notifier {
  if (!sendEmails) {
    return new DryRunNotifier(alertsConfig.email.senderAddress);
  }
  return new SmtpNotifier({
    host: alertsConfig.email.serverAddress,
    port: config.smtpPort,
    secure: config.smtpSecure,
    sender: alertsConfig.email.senderAddress,
    user: config.smtpUser || undefined,
    pass: config.smtpPass || undefined,
  });
}

function readingNeeds(alertsConfig: AlertsConfig): ReadingNeeds {
  const { rules } = alertsConfig;
  return {
    capacity: rules.capacityRules.length > 0,
    quotas: rules.quotaRules.length > 0 || rules.defaultQuotaRules.length > 0,
    replication: rules.replicationRules.length > 0,
  };
}

export async function runAlerts(options: RunOptions, deps: RunDependencies = {}): Promise<RunSummary> {
  const alertsConfig = loadRulesConfig(options.configFile);
  const now = deps.now ?? (() => new Date());
  const notifier = deps.notifier ?? defaultNotifier(alertsConfig, options.sendEmails);
  const needs = readingNeeds(alertsConfig);

  const lock = await acquireHistoryLock(options.historyFile, config.historyLockStaleMs);
  try {
    const history = await loadHistory(options.historyFile);

    log.info(`Checking cluster ${alertsConfig.cluster.clusterName} (${alertsConfig.cluster.address})`);
    const source = await (deps.connect ?? connectToCluster)(alertsConfig.cluster);
    const readings = await collectReadings(source, needs);

    const result = evaluateRules(alertsConfig.rules, readings, history, now());

    for (const failure of result.failures) {
      log.error(`Evaluating ${failure.kind} rule "${failure.rule}" failed, keeping its history: ${failure.error}`);
    }
    for (const key of result.cleared) {
      log.info(`Condition cleared: ${key}`);
    }

    let sent = 0;
    let failedSends = 0;
    for (const decision of result.decisions) {
      log.info(describeDecision(decision));
      const message = formatAlert(decision, {
        clusterName: alertsConfig.cluster.clusterName,
        capacity: readings.capacity,
        sentAt: now(),
      });
      try {
        await notifier.send(message);
        sent++;
      } catch (err) {
        failedSends++;
        log.error(`Failed to send "${message.subject}" via ${notifier.name}: ${errorMessage(err)}`);
      }
    }

    try {
      await saveHistory(options.historyFile, result.history);
    } catch (err) {
      log.error(
        `${errorMessage(err)} -- ${result.decisions.length} alert(s) from this run may be repeated on the next run`,
      );
      throw err;
    }

    const summary: RunSummary = {
      decisions: result.decisions.length,
      sent,
      failedSends,
      cleared: result.cleared.length,
      ruleFailures: result.failures.length,
    };
    log.info(
      `Run complete: ${summary.decisions} alert(s), ${summary.sent} sent, ${summary.failedSends} failed, ` +
        `${summary.cleared} cleared`,
    );
    return summary;
  } finally {
    await lock.release().catch((err: unknown) => {
      log.warn(`Could not release ${lock.file}: ${errorMessage(err)}`);
    });
  }
}
