import 'dotenv/config';

/**
 * Process settings read from the environment (and `.env`, via dotenv).
 *
 * Everything that describes *what* to watch lives in the rule document passed
 * with `--config`; this object only covers how the process itself behaves.
 */
export const config = {
  // History
  historyFile: process.env.HISTORY_FILE || 'history.json',
  historyLockStaleMs: parseInt(process.env.HISTORY_LOCK_STALE_MS || '600000', 10), // 10 minutes

  // Cluster REST API
  restTimeoutMs: parseInt(process.env.REST_TIMEOUT_MS || '15000', 10),
  quotaPageSize: parseInt(process.env.QUOTA_PAGE_SIZE || '1000', 10),
  // Overrides cluster_settings.password from the rule document when set
  clusterPassword: process.env.CLUSTER_PASSWORD || '',

  // SMTP (server and sender address come from email_settings)
  smtpPort: parseInt(process.env.SMTP_PORT || '25', 10),
  smtpSecure: process.env.SMTP_SECURE === 'true',
  smtpUser: process.env.SMTP_USER || '',
  smtpPass: process.env.SMTP_PASS || '',

  // Logging
  debug: process.env.ALERTS_DEBUG === 'true',
} as const;
