import { readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ensureDir } from './paths.js';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function writeJson<T>(path: string, data: T): Promise<void> {
  await ensureDir(dirname(path));
  const content = JSON.stringify(data, null, 2);
  await writeFile(path, `${content}\n`, 'utf-8');
}

/**
 * Parsed file content, or null when the file does not exist.
 * Callers validate the shape.
 */
export async function readJson(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function writeText(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, content, 'utf-8');
}

export async function readText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}
