/**
 * Tests for history persistence and the history lock.
 * Uses a throwaway directory under the OS temp dir.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HistoryLockError, HistoryWriteError } from '../errors.js';
import { emptyHistory, evaluateRules } from '../monitor/engine.js';
import { acquireHistoryLock, loadHistory, saveHistory } from '../monitor/history.js';
import type { HistoryStore } from '../monitor/types.js';
import { quota, quotaRule, readings, relationship, replicationRule, ruleSet } from './helpers.js';

const NOW = new Date('2026-10-19T12:00:00.000Z');

let dir: string;
let historyFile: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'history-test-'));
  historyFile = path.join(dir, 'history.json');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const sample: HistoryStore = {
  version: 1,
  updatedAt: '2026-10-19T12:00:00.000Z',
  entries: {
    'quota:warn@/eng/': { kind: 'threshold', threshold: 95, alertedAt: '2026-10-19T12:00:00.000Z' },
    'replication:repl@source:rel-1': {
      kind: 'replication',
      signature: '2026-10-18T00:00:00Z | disk full',
      alertedAt: '2026-10-19T12:00:00.000Z',
    },
  },
};

describe('loadHistory', () => {
  it('starts empty when the file does not exist', async () => {
    expect(await loadHistory(historyFile)).toEqual(emptyHistory());
  });

  it('starts empty when the file is not JSON', async () => {
    await fs.writeFile(historyFile, 'not json');
    expect(await loadHistory(historyFile)).toEqual(emptyHistory());
  });

  it('starts empty when the file has an unrecognised shape', async () => {
    await fs.writeFile(historyFile, JSON.stringify({ quotas: {}, capacity: {}, replication: {} }));
    expect(await loadHistory(historyFile)).toEqual(emptyHistory());
  });
});

describe('saveHistory', () => {
  it('round-trips a history store', async () => {
    await saveHistory(historyFile, sample);
    expect(await loadHistory(historyFile)).toEqual(sample);
  });

  it('replaces the previous file and leaves no temporary file behind', async () => {
    await saveHistory(historyFile, sample);
    await saveHistory(historyFile, emptyHistory());

    expect(await fs.readdir(dir)).toEqual(['history.json']);
    expect(await loadHistory(historyFile)).toEqual(emptyHistory());
  });

  it('writes human-readable JSON', async () => {
    await saveHistory(historyFile, emptyHistory());
    expect(await fs.readFile(historyFile, 'utf-8')).toBe(
      '{\n  "version": 1,\n  "updatedAt": null,\n  "entries": {}\n}\n',
    );
  });

  it('throws HistoryWriteError and keeps the old file when the target cannot be replaced', async () => {
    const target = path.join(dir, 'occupied');
    await fs.mkdir(target);

    await expect(saveHistory(target, sample)).rejects.toBeInstanceOf(HistoryWriteError);
    expect((await fs.readdir(dir)).sort()).toEqual(['occupied']);
  });

  it('reproduces the same decisions after a save and reload', async () => {
    const rules = ruleSet({ quotaRules: [quotaRule()], replicationRules: [replicationRule()] });
    const current = readings({
      quotas: [quota('/eng/', 80)],
      relationships: [relationship({ error: 'disk full' })],
    });

    const first = evaluateRules(rules, current, emptyHistory(), NOW);
    await saveHistory(historyFile, first.history);
    const second = evaluateRules(rules, current, await loadHistory(historyFile), NOW);

    expect(first.decisions).toHaveLength(2);
    expect(second.decisions).toHaveLength(0);
  });
});

describe('acquireHistoryLock', () => {
  it('is exclusive until released', async () => {
    const lock = await acquireHistoryLock(historyFile, 60_000);
    expect(lock.file).toBe(`${historyFile}.lock`);

    await expect(acquireHistoryLock(historyFile, 60_000)).rejects.toBeInstanceOf(HistoryLockError);

    await lock.release();
    const again = await acquireHistoryLock(historyFile, 60_000);
    await again.release();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('takes over a stale lock', async () => {
    const lockFile = `${historyFile}.lock`;
    await fs.writeFile(lockFile, JSON.stringify({ pid: 1, acquiredAt: '2026-10-18T00:00:00.000Z' }));
    const old = new Date(Date.now() - 3_600_000);
    await fs.utimes(lockFile, old, old);

    const lock = await acquireHistoryLock(historyFile, 60_000);
    const contents: unknown = JSON.parse(await fs.readFile(lockFile, 'utf-8'));
    expect(contents).toMatchObject({ pid: process.pid });
    await lock.release();
  });

  it('does not let a run that lost its lock release the new holder\'s lock', async () => {
    const lockFile = `${historyFile}.lock`;
    const slow = await acquireHistoryLock(historyFile, 60_000);
    const old = new Date(Date.now() - 3_600_000);
    await fs.utimes(lockFile, old, old);

    const takeover = await acquireHistoryLock(historyFile, 60_000);
    const takeoverContents = await fs.readFile(lockFile, 'utf-8');
    await slow.release();

    expect(await fs.readFile(lockFile, 'utf-8')).toBe(takeoverContents);
    await expect(acquireHistoryLock(historyFile, 60_000)).rejects.toBeInstanceOf(HistoryLockError);

    await takeover.release();
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
