/**
 * Session store tests against a temporary data directory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readFile, rm, utimes, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  SessionStore,
  getFinalCodePath,
  getPatchDiffPath,
  getSessionArtifactsDir,
  getSessionPath,
  getSessionsDir,
} from '../src/artifacts/index.js';
import { RepairOrchestrator } from '../src/orchestrator/index.js';
import { PatchGenerator } from '../src/patch/index.js';
import { DEFAULT_RESOURCE_LIMITS } from '../src/types/index.js';
import type { RepairSession } from '../src/types/index.js';
import { FakeSandboxExecutor, simulatePython } from './fakes.js';

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

async function repairSession(code: string): Promise<RepairSession> {
  const orchestrator = new RepairOrchestrator({
    executor: new FakeSandboxExecutor(simulatePython),
    generator: new PatchGenerator({ inference: null }),
    limits: { ...DEFAULT_RESOURCE_LIMITS },
  });
  return orchestrator.repair(code, 3);
}

describe('SessionStore', () => {
  let dataDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'autopatch-store-'));
    store = new SessionStore(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should save a session with its artifacts and load it back', async () => {
    const session = await repairSession('print(1/0)');

    const path = await store.save(session);

    expect(path).toBe(getSessionPath(dataDir, session.id));
    expect(await store.load(session.id)).toEqual(session);
    expect(await readFile(getFinalCodePath(dataDir, session.id), 'utf-8')).toBe(`${session.finalCode}\n`);
    expect(await readFile(getPatchDiffPath(dataDir, session.id, 0), 'utf-8')).toBe(
      session.patches[0]?.unifiedDiff
    );
  });

  it('should not write a diff for a patch without changes', async () => {
    const session = await repairSession('while True:\n    pass');

    await store.save(session);

    expect(session.patches[0]?.noChange).toBe(true);
    expect(await exists(getPatchDiffPath(dataDir, session.id, 0))).toBe(false);
  });

  it('should return null for unknown or unsafe ids', async () => {
    expect(await store.load('does-not-exist')).toBeNull();
    expect(await store.load('../outside')).toBeNull();
  });

  it('should refuse to save under an unsafe id', async () => {
    const session = await repairSession('print("ok")');
    await expect(store.save({ ...session, id: '../outside' })).rejects.toThrow('Invalid session id: ../outside');
  });

  it('should reject a stored session with an invalid shape', async () => {
    await mkdir(getSessionsDir(dataDir), { recursive: true });
    await writeFile(getSessionPath(dataDir, 'broken'), JSON.stringify({ id: 'broken' }), 'utf-8');

    await expect(store.load('broken')).rejects.toThrow('Stored session broken is invalid');
  });

  it('should list nothing before the first save', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('should list sessions newest first', async () => {
    const older = await repairSession('print("ok")');
    const newer = await repairSession('print(undefined_var)');
    await store.save(older);
    await store.save(newer);
    await utimes(getSessionPath(dataDir, older.id), new Date('2026-01-01'), new Date('2026-01-01'));
    await utimes(getSessionPath(dataDir, newer.id), new Date('2026-02-01'), new Date('2026-02-01'));

    const listed = await store.list();

    expect(listed.map((info) => info.id)).toEqual([newer.id, older.id]);
  });

  it('should prune beyond the retention count', async () => {
    const older = await repairSession('print(1/0)');
    const newer = await repairSession('print("ok")');
    await store.save(older);
    await store.save(newer);
    const now = Date.now() / 1000;
    await utimes(getSessionPath(dataDir, older.id), now - 60, now - 60);

    const removed = await store.prune({ maxCount: 1 });

    expect(removed).toBe(1);
    expect(await store.load(older.id)).toBeNull();
    expect(await exists(getSessionArtifactsDir(dataDir, older.id))).toBe(false);
    expect(await store.load(newer.id)).toEqual(newer);
  });

  it('should prune sessions older than the age limit', async () => {
    const session = await repairSession('print("ok")');
    await store.save(session);
    const fortyDaysAgo = Date.now() / 1000 - 40 * 24 * 60 * 60;
    await utimes(getSessionPath(dataDir, session.id), fortyDaysAgo, fortyDaysAgo);

    expect(await store.prune()).toBe(1);
    expect(await store.list()).toEqual([]);
  });
});
