/**
 * Custom error types for patch generation.
 */

import type { PatchGenerationFailure } from '../types/index.js';

/**
 * Error raised by an inference backend.
 *
 * `kind` tells the generator why the AI path was abandoned; every kind is
 * absorbed by the fallback rules.
 */
export class InferenceError extends Error {
  readonly name = 'InferenceError';
  readonly kind: PatchGenerationFailure;
  readonly statusCode: number | null;

  constructor(kind: PatchGenerationFailure, message: string, statusCode: number | null = null) {
    super(message);
    this.kind = kind;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, InferenceError.prototype);
  }
}

export function isInferenceError(error: unknown): error is InferenceError {
  return error instanceof InferenceError;
}
