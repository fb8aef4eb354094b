/**
 * Fatal error categories. Anything not listed here is either recovered
 * locally (metric unavailable, unreadable history, send failure) or is a
 * plain Error from a collaborator.
 */

/** The rule document is missing, unparsable or fails validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Another run holds the history lock. */
export class HistoryLockError extends Error {
  constructor(readonly lockFile: string, detail: string) {
    super(`History lock ${lockFile} is held: ${detail}`);
    this.name = 'HistoryLockError';
  }
}

/**
 * The new history could not be persisted. Alerts for this run were already
 * sent, so the next run may repeat them.
 */
export class HistoryWriteError extends Error {
  constructor(readonly historyFile: string, cause: unknown) {
    super(
      `Failed to write alert history ${historyFile}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'HistoryWriteError';
  }
}
