/**
 * Collects one run's readings from the metric source.
 *
 * The three fetches are settled independently -- a failed fetch is logged
 * and degrades only its own reading, never the whole run.
 */

import { createLogger, errorMessage } from '../logger.js';
import { normalizeQuotaPath } from '../rules/schema.js';
import type { CapacityReading, MetricSource, QuotaReading, Readings } from './types.js';

const log = createLogger('Readings');

/** Percentage of `used` over `total`, rounded to two decimals. */
export function usagePercent(used: number, total: number): number {
  return Math.round((used / total) * 100 * 100) / 100;
}

export interface ReadingNeeds {
  capacity: boolean;
  quotas: boolean;
  replication: boolean;
}

/**
 * Fetch the readings the rule set needs. Capacity is fetched for quota rules
 * too, since quota alerts may quote the cluster's total capacity.
 */
export async function collectReadings(source: MetricSource, needs: ReadingNeeds): Promise<Readings> {
  const skipped = Promise.resolve(null);

  const [capacityResult, quotasResult, replicationResult] = await Promise.allSettled([
    needs.capacity || needs.quotas ? source.getCapacityUsage() : skipped,
    needs.quotas ? source.listQuotaUsage() : skipped,
    needs.replication ? source.listReplicationRelationships() : skipped,
  ]);

  const readings: Readings = { capacity: null, quotas: [], relationships: [] };

  if (capacityResult.status === 'fulfilled') {
    const usage = capacityResult.value;
    if (usage && usage.totalBytes > 0) {
      const capacity: CapacityReading = {
        usedBytes: usage.usedBytes,
        totalBytes: usage.totalBytes,
        usedPercent: usagePercent(usage.usedBytes, usage.totalBytes),
      };
      readings.capacity = capacity;
      log.info(`Cluster usage is ${capacity.usedPercent}%`);
    } else if (usage) {
      log.warn('Cluster reported a total capacity of 0 bytes; capacity reading unavailable');
    }
  } else {
    log.warn(`Capacity reading unavailable: ${errorMessage(capacityResult.reason)}`);
  }

  if (quotasResult.status === 'fulfilled') {
    for (const quota of quotasResult.value ?? []) {
      if (quota.limitBytes <= 0) {
        log.warn(`Skipping quota on "${quota.path}": limit is ${quota.limitBytes} bytes`);
        continue;
      }
      const reading: QuotaReading = {
        path: normalizeQuotaPath(quota.path),
        usedBytes: quota.usedBytes,
        limitBytes: quota.limitBytes,
        usedPercent: usagePercent(quota.usedBytes, quota.limitBytes),
      };
      log.debug(`Quota "${reading.path}" is at ${reading.usedPercent}%`);
      readings.quotas.push(reading);
    }
  } else {
    log.warn(`Quota readings unavailable: ${errorMessage(quotasResult.reason)}`);
  }

  if (replicationResult.status === 'fulfilled') {
    readings.relationships = replicationResult.value ?? [];
    const erroring = readings.relationships.filter((r) => r.error !== null).length;
    log.info(`Checked ${readings.relationships.length} replication relationship(s), ${erroring} erroring`);
  } else {
    log.warn(`Replication readings unavailable: ${errorMessage(replicationResult.reason)}`);
  }

  return readings;
}
