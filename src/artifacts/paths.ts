import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';

export function getSessionsDir(dataDir: string): string {
  return join(dataDir, 'sessions');
}

export function getSessionPath(dataDir: string, sessionId: string): string {
  return join(getSessionsDir(dataDir), `${sessionId}.json`);
}

/**
 * Directory holding the plain-text artifacts of one session.
 */
export function getSessionArtifactsDir(dataDir: string, sessionId: string): string {
  return join(getSessionsDir(dataDir), sessionId);
}

export function getFinalCodePath(dataDir: string, sessionId: string): string {
  return join(getSessionArtifactsDir(dataDir, sessionId), 'final.py');
}

export function getPatchDiffPath(dataDir: string, sessionId: string, iteration: number): string {
  return join(getSessionArtifactsDir(dataDir, sessionId), `patch-${iteration}.diff`);
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
