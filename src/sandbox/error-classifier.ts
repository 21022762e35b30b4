/**
 * Error Classifier
 *
 * Maps a raw run outcome to the closed ErrorType set by reading the final
 * line of a Python traceback.
 */

import { ErrorType, isErrorType } from '../types/index.js';
import type { RawRunOutcome } from './types.js';

/**
 * Python exception names recognized by the classifier.
 */
const EXCEPTION_MAP: ReadonlyMap<string, ErrorType> = new Map([
  ['ZeroDivisionError', ErrorType.ZERO_DIVISION],
  ['NameError', ErrorType.NAME],
  ['TypeError', ErrorType.TYPE],
  ['ImportError', ErrorType.IMPORT],
  ['ModuleNotFoundError', ErrorType.MODULE_NOT_FOUND],
  ['IndentationError', ErrorType.INDENTATION],
  ['TabError', ErrorType.INDENTATION],
  ['SyntaxError', ErrorType.SYNTAX],
  ['MemoryError', ErrorType.MEMORY],
]);

/**
 * ErrorType for a Python exception name, if it is one of the mapped ones.
 */
export function errorTypeForException(name: string): ErrorType | null {
  const errorType = EXCEPTION_MAP.get(name);
  return isErrorType(errorType) ? errorType : null;
}

const EXCEPTION_LINE = /^([A-Za-z_][\w.]*)(?::\s?(.*))?$/;

export interface Classification {
  errorType: ErrorType;
  errorMessage: string | null;
  stackTrace: string | null;
}

export interface ParsedException {
  name: string;
  message: string | null;
}

/**
 * Find the exception line that ends a traceback.
 */
export function parseExceptionLine(stderr: string): ParsedException | null {
  const lines = stderr.replace(/\r\n?/g, '\n').split('\n');
  const hasTraceback = lines.some(
    (line) => line.startsWith('Traceback (most recent call last)') || line.trimStart().startsWith('File "')
  );

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = (lines[i] ?? '').trimEnd();
    if (!line) continue;

    const match = EXCEPTION_LINE.exec(line);
    if (!match || (!hasTraceback && match[2] === undefined)) {
      return null;
    }

    const qualified = match[1] ?? '';
    const name = qualified.split('.').pop() ?? qualified;
    return { name, message: match[2] ?? null };
  }

  return null;
}

/**
 * Classify a failed run.
 */
export function classifyFailure(outcome: RawRunOutcome, timeoutSeconds: number): Classification {
  if (outcome.timedOut) {
    return {
      errorType: ErrorType.TIMEOUT,
      errorMessage: `Execution exceeded ${timeoutSeconds} seconds. Possible infinite loop detected.`,
      stackTrace: null,
    };
  }

  if (outcome.infrastructureError) {
    return {
      errorType: ErrorType.UNKNOWN,
      errorMessage: 'Sandbox infrastructure failure',
      stackTrace: outcome.infrastructureError,
    };
  }

  const stderr = outcome.stderr.trim();

  if (outcome.oomKilled) {
    return {
      errorType: ErrorType.MEMORY,
      errorMessage: 'Execution exceeded the memory limit',
      stackTrace: stderr || null,
    };
  }

  const parsed = parseExceptionLine(stderr);
  if (parsed) {
    const errorType = errorTypeForException(parsed.name);
    if (errorType) {
      return { errorType, errorMessage: parsed.message, stackTrace: stderr };
    }
  }

  const raw = stderr || outcome.stdout.trim();
  return {
    errorType: ErrorType.UNKNOWN,
    errorMessage: parsed ? `${parsed.name}${parsed.message ? `: ${parsed.message}` : ''}` : null,
    stackTrace: raw || `Process exited with code ${outcome.exitCode ?? 'unknown'}`,
  };
}

/**
 * Last line of the executed program referenced by a traceback (1-based).
 */
export function extractFailingLine(stackTrace: string | null): number | null {
  if (!stackTrace) return null;

  // `python -c` reports the program as "<string>"
  const pattern = /File "<string>", line (\d+)/g;
  let line: number | null = null;
  for (const match of stackTrace.matchAll(pattern)) {
    line = Number(match[1]);
  }
  return line;
}

/**
 * Identifier named by a NameError message.
 */
export function extractUndefinedName(text: string | null): string | null {
  if (!text) return null;
  const match = /name '([A-Za-z_]\w*)' is not defined/.exec(text);
  return match?.[1] ?? null;
}

/**
 * Module named by an ImportError or ModuleNotFoundError message.
 */
export function extractMissingModule(text: string | null): string | null {
  if (!text) return null;
  const notFound = /No module named '([\w.]+)'/.exec(text);
  if (notFound?.[1]) return notFound[1];
  const cannotImport = /cannot import name '\w+' from '([\w.]+)'/.exec(text);
  return cannotImport?.[1] ?? null;
}
