/**
 * Error classification for sandbox failures.
 *
 * A closed set: every failed execution carries exactly one of these, and the
 * fallback rule table is keyed by it.
 */
export const ErrorType = {
  ZERO_DIVISION: 'ZeroDivisionError',
  NAME: 'NameError',
  TYPE: 'TypeError',
  IMPORT: 'ImportError',
  MODULE_NOT_FOUND: 'ModuleNotFoundError',
  INDENTATION: 'IndentationError',
  SYNTAX: 'SyntaxError',
  TIMEOUT: 'TimeoutError',
  MEMORY: 'MemoryError',
  UNKNOWN: 'UnknownError',
} as const;

export type ErrorType = (typeof ErrorType)[keyof typeof ErrorType];

export const ERROR_TYPES: readonly ErrorType[] = Object.values(ErrorType);

/**
 * Human-readable descriptions for each error type.
 */
export const ERROR_TYPE_DESCRIPTIONS: Record<ErrorType, string> = {
  [ErrorType.ZERO_DIVISION]: 'A division or modulo by zero',
  [ErrorType.NAME]: 'A reference to an undefined identifier',
  [ErrorType.TYPE]: 'An operation applied to a value of the wrong type',
  [ErrorType.IMPORT]: 'An import that could not be resolved',
  [ErrorType.MODULE_NOT_FOUND]: 'An import of a module that is not installed',
  [ErrorType.INDENTATION]: 'Inconsistent or unexpected indentation',
  [ErrorType.SYNTAX]: 'Source that does not parse',
  [ErrorType.TIMEOUT]: 'Execution exceeded the wall-clock limit',
  [ErrorType.MEMORY]: 'Execution exceeded the memory limit',
  [ErrorType.UNKNOWN]: 'A failure that could not be classified',
};

export function isErrorType(value: unknown): value is ErrorType {
  return ERROR_TYPES.some((type) => type === value);
}
