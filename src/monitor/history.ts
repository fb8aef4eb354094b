/**
 * Alert history persistence.
 *
 * The history file is read once at the start of a run and replaced once at
 * the end. Writes go to a temporary file beside the target which is then
 * renamed over it, so a crash mid-write leaves the previous history intact.
 * A lock file guards the whole load-evaluate-persist sequence against
 * overlapping runs.
 */

import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { HistoryLockError, HistoryWriteError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { emptyHistory } from './engine.js';
import type { HistoryStore } from './types.js';

const log = createLogger('History');

const historyEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('threshold'), threshold: z.number(), alertedAt: z.string() }),
  z.object({ kind: z.literal('replication'), signature: z.string(), alertedAt: z.string() }),
]);

const historyFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().nullable().default(null),
  entries: z.record(historyEntrySchema),
});

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

/**
 * Load the history written by the previous run.
 *
 * Never throws: a missing file is a first run, and an unreadable or
 * unrecognised file is logged and replaced by an empty history (every
 * currently alerting condition alerts once more).
 */
export async function loadHistory(file: string): Promise<HistoryStore> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      log.debug(`History file "${file}" does not exist; starting empty`);
    } else {
      log.warn(`History file "${file}" could not be read, starting empty: ${errorMessage(err)}`);
    }
    return emptyHistory();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    log.warn(`History file "${file}" is not valid JSON, starting empty: ${errorMessage(err)}`);
    return emptyHistory();
  }

  const parsed = historyFileSchema.safeParse(json);
  if (!parsed.success) {
    log.warn(`History file "${file}" has an unrecognised format, starting empty`);
    return emptyHistory();
  }

  log.debug(`Loaded ${Object.keys(parsed.data.entries).length} history entries from ${file}`);
  return parsed.data;
}

/**
 * Atomically replace the history file. Throws HistoryWriteError on any
 * failure; the previous file is left untouched in that case.
 */
export async function saveHistory(file: string, history: HistoryStore): Promise<void> {
  const tmpPath = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  const body = JSON.stringify(history, null, 2) + '\n';

  try {
    const handle = await fs.open(tmpPath, 'w');
    try {
      await handle.writeFile(body, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, file);
  } catch (err) {
    await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn(`Could not remove temporary history file ${tmpPath}: ${errorMessage(cleanupErr)}`);
    });
    throw new HistoryWriteError(file, err);
  }

  log.debug(`Wrote ${Object.keys(history.entries).length} history entries to ${file}`);
}

// ---------------------------------------------------------------------------
// Lock
// ---------------------------------------------------------------------------

export interface HistoryLock {
  file: string;
  release: () => Promise<void>;
}

const lockFileSchema = z.object({ pid: z.number(), acquiredAt: z.string(), token: z.string().optional() });

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

async function readLock(lockFile: string): Promise<string | null> {
  return fs.readFile(lockFile, 'utf-8').catch(() => null);
}

function describeHolder(raw: string | null): string {
  const parsed = lockFileSchema.safeParse(parseJson(raw ?? ''));
  return parsed.success ? `pid ${parsed.data.pid} since ${parsed.data.acquiredAt}` : 'unknown process';
}

async function lockAgeMs(lockFile: string): Promise<number> {
  // A lock that disappeared in the meantime counts as stale
  const stat = await fs.stat(lockFile).catch(() => null);
  return stat ? Date.now() - stat.mtimeMs : Number.POSITIVE_INFINITY;
}

/**
 * Take the exclusive lock for `historyFile`. A lock older than `staleMs` is
 * assumed to belong to a crashed run and is taken over, but only if its
 * contents are still the ones inspected. Releasing removes the lock only
 * while it still carries this run's token.
 */
export async function acquireHistoryLock(historyFile: string, staleMs: number): Promise<HistoryLock> {
  const lockFile = `${historyFile}.lock`;
  const contents = JSON.stringify({
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
    token: crypto.randomUUID(),
  });

  const release = async (): Promise<void> => {
    const current = await readLock(lockFile);
    if (current !== contents) {
      log.warn(`Not removing ${lockFile}: it now belongs to ${describeHolder(current)}`);
      return;
    }
    await fs.rm(lockFile, { force: true });
    log.debug(`Released ${lockFile}`);
  };

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.writeFile(lockFile, contents, { flag: 'wx' });
      log.debug(`Acquired ${lockFile}`);
      return { file: lockFile, release };
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'EEXIST') {
        throw new HistoryLockError(lockFile, errorMessage(err));
      }

      const inspected = await readLock(lockFile);
      const holder = describeHolder(inspected);
      const ageMs = await lockAgeMs(lockFile);
      if (ageMs < staleMs || attempt > 0) {
        throw new HistoryLockError(lockFile, `held by ${holder}`);
      }
      if ((await readLock(lockFile)) !== inspected) {
        throw new HistoryLockError(lockFile, `changed hands while taking over from ${holder}`);
      }
      log.warn(`Taking over stale lock ${lockFile} (${holder}, ${Math.round(ageMs / 1000)}s old)`);
      await fs.rm(lockFile, { force: true });
    }
  }

  throw new HistoryLockError(lockFile, 'could not be acquired');
}
