/**
 * Diff Engine
 *
 * Line-oriented diff between two versions of a program, rendered both as a
 * unified diff and as a list of line edits that can be replayed onto the
 * original. Pure and deterministic; line endings are normalized to `\n`
 * before comparison.
 */

import type { LineEdit } from '../types/index.js';

/** Context lines around each hunk */
const CONTEXT_LINES = 3;

export interface DiffResult {
  /** Empty when the inputs are identical */
  unifiedDiff: string;
  lineEdits: LineEdit[];
}

export interface DiffEngineOptions {
  fromFile?: string;
  toFile?: string;
  contextLines?: number;
}

type DiffOp =
  | { type: 'equal'; oldIndex: number; newIndex: number; text: string }
  | { type: 'delete'; oldIndex: number; newIndex: number; text: string }
  | { type: 'insert'; oldIndex: number; newIndex: number; text: string };

/**
 * Normalize line endings and split into lines.
 *
 * A trailing newline yields a final empty line, so `join('\n')` restores the
 * normalized text exactly.
 */
export function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

/**
 * Longest-common-subsequence walk over two line arrays.
 *
 * Within each run of changes, deletions are emitted before insertions.
 */
function computeOps(oldLines: string[], newLines: string[]): DiffOp[] {
  // Common prefix and suffix do not need the quadratic table
  let prefix = 0;
  while (
    prefix < oldLines.length &&
    prefix < newLines.length &&
    oldLines[prefix] === newLines[prefix]
  ) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const a = oldLines.slice(prefix, oldLines.length - suffix);
  const b = newLines.slice(prefix, newLines.length - suffix);
  const n = a.length;
  const m = b.length;

  // lcs[i][j] = LCS length of a[i..] and b[j..]
  const lcs: Uint32Array[] = [];
  for (let i = 0; i <= n; i++) {
    lcs.push(new Uint32Array(m + 1));
  }
  for (let i = n - 1; i >= 0; i--) {
    const row = lcs[i] ?? new Uint32Array(m + 1);
    const below = lcs[i + 1] ?? new Uint32Array(m + 1);
    for (let j = m - 1; j >= 0; j--) {
      row[j] = a[i] === b[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const ops: DiffOp[] = [];
  for (let k = 0; k < prefix; k++) {
    ops.push({ type: 'equal', oldIndex: k, newIndex: k, text: oldLines[k] ?? '' });
  }

  let i = 0;
  let j = 0;
  let pendingDeletes: DiffOp[] = [];
  let pendingInserts: DiffOp[] = [];
  const flush = (): void => {
    ops.push(...pendingDeletes, ...pendingInserts);
    pendingDeletes = [];
    pendingInserts = [];
  };

  while (i < n || j < m) {
    const oldText = a[i];
    const newText = b[j];
    if (i < n && j < m && oldText === newText) {
      flush();
      ops.push({ type: 'equal', oldIndex: prefix + i, newIndex: prefix + j, text: oldText ?? '' });
      i++;
      j++;
    } else if (j >= m || (i < n && (lcs[i + 1]?.[j] ?? 0) >= (lcs[i]?.[j + 1] ?? 0))) {
      pendingDeletes.push({ type: 'delete', oldIndex: prefix + i, newIndex: prefix + j, text: oldText ?? '' });
      i++;
    } else {
      pendingInserts.push({ type: 'insert', oldIndex: prefix + i, newIndex: prefix + j, text: newText ?? '' });
      j++;
    }
  }
  flush();

  for (let k = 0; k < suffix; k++) {
    const oldIndex = oldLines.length - suffix + k;
    const newIndex = newLines.length - suffix + k;
    ops.push({ type: 'equal', oldIndex, newIndex, text: oldLines[oldIndex] ?? '' });
  }

  return ops;
}

/**
 * Derive line edits from the op list, one per changed line.
 */
function buildLineEdits(ops: DiffOp[]): LineEdit[] {
  const edits: LineEdit[] = [];
  let index = 0;

  while (index < ops.length) {
    const op = ops[index];
    if (!op || op.type === 'equal') {
      index++;
      continue;
    }

    const deletes: DiffOp[] = [];
    const inserts: DiffOp[] = [];
    while (index < ops.length) {
      const current = ops[index];
      if (!current || current.type === 'equal') break;
      if (current.type === 'delete') deletes.push(current);
      else inserts.push(current);
      index++;
    }

    const paired = Math.min(deletes.length, inserts.length);
    for (let k = 0; k < paired; k++) {
      const removed = deletes[k];
      const added = inserts[k];
      if (!removed || !added) continue;
      edits.push({
        kind: 'replace',
        lineNumber: removed.oldIndex + 1,
        oldText: removed.text,
        newText: added.text,
      });
    }

    for (const removed of deletes.slice(paired)) {
      edits.push({ kind: 'delete', lineNumber: removed.oldIndex + 1, oldText: removed.text, newText: '' });
    }

    // Remaining insertions sit before the first original line after the block
    const blockEnd = op.oldIndex + deletes.length;
    for (const added of inserts.slice(paired)) {
      edits.push({ kind: 'insert', lineNumber: blockEnd + 1, oldText: '', newText: added.text });
    }
  }

  return edits;
}

function formatRange(start: number, length: number): string {
  // 1-based start; an empty range points at the line before it
  const beginning = length === 0 ? start : start + 1;
  return length === 1 ? `${beginning}` : `${beginning},${length}`;
}

/**
 * Render the op list as unified diff hunks.
 */
function buildUnifiedDiff(
  ops: DiffOp[],
  fromFile: string,
  toFile: string,
  context: number
): string {
  const changeIndexes: number[] = [];
  ops.forEach((op, idx) => {
    if (op.type !== 'equal') changeIndexes.push(idx);
  });

  if (changeIndexes.length === 0) {
    return '';
  }

  // Group changes whose separating context would overlap
  const groups: Array<{ start: number; end: number }> = [];
  for (const idx of changeIndexes) {
    const last = groups[groups.length - 1];
    if (last && idx - last.end <= context * 2 + 1) {
      last.end = idx;
    } else {
      groups.push({ start: idx, end: idx });
    }
  }

  const out: string[] = [`--- ${fromFile}`, `+++ ${toFile}`];

  for (const group of groups) {
    const from = Math.max(0, group.start - context);
    const to = Math.min(ops.length - 1, group.end + context);
    const hunk = ops.slice(from, to + 1);
    const first = hunk[0];
    if (!first) continue;

    const oldLength = hunk.filter((op) => op.type !== 'insert').length;
    const newLength = hunk.filter((op) => op.type !== 'delete').length;

    out.push(`@@ -${formatRange(first.oldIndex, oldLength)} +${formatRange(first.newIndex, newLength)} @@`);
    for (const op of hunk) {
      const marker = op.type === 'equal' ? ' ' : op.type === 'delete' ? '-' : '+';
      out.push(`${marker}${op.text}`);
    }
  }

  return `${out.join('\n')}\n`;
}

/**
 * Computes diffs between an original program and its patched version.
 */
export class DiffEngine {
  private readonly fromFile: string;
  private readonly toFile: string;
  private readonly contextLines: number;

  constructor(options: DiffEngineOptions = {}) {
    this.fromFile = options.fromFile ?? 'original.py';
    this.toFile = options.toFile ?? 'fixed.py';
    this.contextLines = options.contextLines ?? CONTEXT_LINES;
  }

  diff(original: string, fixed: string): DiffResult {
    const ops = computeOps(splitLines(original), splitLines(fixed));
    return {
      unifiedDiff: buildUnifiedDiff(ops, this.fromFile, this.toFile, this.contextLines),
      lineEdits: buildLineEdits(ops),
    };
  }
}

/**
 * Replay line edits onto the original text.
 *
 * Produces the line-ending-normalized form of the text the edits were
 * computed against. Throws when an edit does not match the original.
 */
export function applyLineEdits(original: string, edits: readonly LineEdit[]): string {
  const lines = splitLines(original);
  const result: string[] = [];
  let cursor = 0;

  for (const edit of edits) {
    const target = edit.lineNumber - 1;
    if (target < cursor || target > lines.length) {
      throw new RangeError(`Line edit at line ${edit.lineNumber} is out of order or out of range`);
    }

    while (cursor < target) {
      result.push(lines[cursor] ?? '');
      cursor++;
    }

    if (edit.kind === 'insert') {
      result.push(edit.newText);
      continue;
    }

    if (lines[cursor] !== edit.oldText) {
      throw new Error(`Line edit at line ${edit.lineNumber} does not match the original text`);
    }
    cursor++;

    if (edit.kind === 'replace') {
      result.push(edit.newText);
    }
  }

  while (cursor < lines.length) {
    result.push(lines[cursor] ?? '');
    cursor++;
  }

  return result.join('\n');
}
