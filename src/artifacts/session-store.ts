/**
 * Session store.
 * Persists completed repair sessions as JSON, with the final program and one
 * unified diff per patch written beside it as plain files.
 */

import { readdir, rm, stat } from 'node:fs/promises';
import { z } from 'zod';
import { readJson, writeJson, writeText } from './json.js';
import {
  getFinalCodePath,
  getPatchDiffPath,
  getSessionArtifactsDir,
  getSessionPath,
  getSessionsDir,
} from './paths.js';
import { TerminalState, isErrorType } from '../types/index.js';
import type { ErrorType, RepairSession } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('session-store');

const errorTypeSchema = z.custom<ErrorType>(isErrorType);

const executionSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    stdout: z.string(),
    durationSeconds: z.number(),
  }),
  z.object({
    success: z.literal(false),
    stdout: z.string(),
    errorType: errorTypeSchema,
    stackTrace: z.string().nullable(),
    errorMessage: z.string().nullable(),
    exitCode: z.number().nullable(),
    durationSeconds: z.number(),
  }),
]);

const patchSchema = z.object({
  iteration: z.number().int(),
  originalCode: z.string(),
  fixedCode: z.string(),
  unifiedDiff: z.string(),
  lineEdits: z.array(
    z.object({
      kind: z.enum(['replace', 'insert', 'delete']),
      lineNumber: z.number().int(),
      oldText: z.string(),
      newText: z.string(),
    })
  ),
  explanation: z.string(),
  reasoning: z.string(),
  source: z.enum(['ai', 'fallback']),
  generationTimeSeconds: z.number(),
  noChange: z.boolean(),
  fallbackCause: z.enum(['BackendUnavailable', 'BackendTimeout', 'MalformedResponse']).nullable(),
});

export const sessionSchema = z.object({
  id: z.string().min(1),
  originalCode: z.string(),
  finalCode: z.string(),
  executions: z.array(executionSchema),
  patches: z.array(patchSchema),
  totalIterations: z.number().int(),
  terminalState: z.nativeEnum(TerminalState),
  failureReason: z.string().nullable(),
  startedAt: z.string(),
  completedAt: z.string(),
});

/**
 * Session ids are generated by nanoid; anything else could escape the data dir.
 */
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface StoredSessionInfo {
  id: string;
  modifiedAt: Date;
}

export interface RetentionPolicy {
  maxAgeDays: number;
  maxCount: number;
}

const DEFAULT_POLICY: RetentionPolicy = {
  maxAgeDays: 30,
  maxCount: 100,
};

export class SessionStore {
  constructor(private readonly dataDir: string) {}

  /**
   * Write the session and its artifacts. Returns the session file path.
   */
  async save(session: RepairSession): Promise<string> {
    this.assertValidId(session.id);

    const path = getSessionPath(this.dataDir, session.id);
    await writeJson(path, session);
    await writeText(getFinalCodePath(this.dataDir, session.id), ensureTrailingNewline(session.finalCode));

    for (const patch of session.patches) {
      if (patch.unifiedDiff.length > 0) {
        await writeText(getPatchDiffPath(this.dataDir, session.id, patch.iteration), patch.unifiedDiff);
      }
    }

    log.debug({ sessionId: session.id, path }, 'Session saved');
    return path;
  }

  /**
   * Load a stored session, or null when none exists under that id.
   */
  async load(sessionId: string): Promise<RepairSession | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return null;
    }

    const data = await readJson(getSessionPath(this.dataDir, sessionId));
    if (data === null) {
      log.debug({ sessionId }, 'Session not found');
      return null;
    }

    const parsed = sessionSchema.safeParse(data);
    if (!parsed.success) {
      log.error({ sessionId, errors: parsed.error.errors }, 'Stored session is invalid');
      throw new Error(`Stored session ${sessionId} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * Stored sessions, newest first.
   */
  async list(): Promise<StoredSessionInfo[]> {
    const dir = getSessionsDir(this.dataDir);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const sessions: StoredSessionInfo[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      const id = name.slice(0, -'.json'.length);
      const stats = await stat(getSessionPath(this.dataDir, id));
      sessions.push({ id, modifiedAt: stats.mtime });
    }

    return sessions.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
  }

  /**
   * Delete sessions beyond the retention policy. Returns the number removed.
   */
  async prune(policy: Partial<RetentionPolicy> = {}): Promise<number> {
    const p = { ...DEFAULT_POLICY, ...policy };
    const maxAgeMs = p.maxAgeDays * 24 * 60 * 60 * 1000;
    const now = Date.now();

    const sessions = await this.list();
    let removed = 0;

    for (const [index, session] of sessions.entries()) {
      const exceedsCount = index >= p.maxCount;
      const exceedsAge = now - session.modifiedAt.getTime() > maxAgeMs;
      if (!exceedsCount && !exceedsAge) continue;

      await rm(getSessionPath(this.dataDir, session.id), { force: true });
      await rm(getSessionArtifactsDir(this.dataDir, session.id), { recursive: true, force: true });
      removed++;
    }

    if (removed > 0) {
      log.info({ removed }, 'Pruned stored sessions');
    }
    return removed;
  }

  private assertValidId(sessionId: string): void {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new Error(`Invalid session id: ${sessionId}`);
    }
  }
}

function ensureTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}
