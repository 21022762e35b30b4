/**
 * Patch Generator
 *
 * Produces one PatchRecord per failed execution: first from the inference
 * backend, falling back to the deterministic rule table when the backend is
 * disabled, unreachable, slow, or returns something unusable. `generate`
 * never rejects.
 */

import { applyFallbackRule } from './fallback-rules.js';
import { isInferenceError } from './errors.js';
import type { InferenceClient } from './inference-client.js';
import { buildRepairPrompt } from './prompt.js';
import { normalizeResponse } from './response-normalizer.js';
import { DiffEngine } from '../diff/index.js';
import {
  DEFAULT_RESOURCE_LIMITS,
  PatchGenerationFailure,
} from '../types/index.js';
import type {
  CodeArtifact,
  FailedExecution,
  PatchRecord,
  PatchSource,
  ResourceLimits,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('patch:generator');

export interface PatchGeneratorOptions {
  /** Null disables the AI path; every patch then comes from the rule table */
  inference: InferenceClient | null;
  diffEngine?: DiffEngine;
  /** Limits the prompt describes to the model */
  limits?: ResourceLimits;
}

interface PatchContent {
  fixedCode: string;
  explanation: string;
  reasoning: string;
  source: PatchSource;
  fallbackCause: PatchGenerationFailure | null;
}

/**
 * Line endings, leading blank lines and trailing whitespace do not make two
 * programs different.
 */
function canonicalProgram(code: string): string {
  return code.replace(/\r\n?/g, '\n').replace(/^(?:[ \t]*\n)+/, '').trimEnd();
}

export class PatchGenerator {
  private readonly inference: InferenceClient | null;
  private readonly diffEngine: DiffEngine;
  private readonly limits: ResourceLimits;

  constructor(options: PatchGeneratorOptions) {
    this.inference = options.inference;
    this.diffEngine = options.diffEngine ?? new DiffEngine();
    this.limits = options.limits ?? DEFAULT_RESOURCE_LIMITS;
  }

  get aiEnabled(): boolean {
    return this.inference !== null;
  }

  async generate(
    code: CodeArtifact,
    result: FailedExecution,
    signal?: AbortSignal
  ): Promise<PatchRecord> {
    const startedAt = Date.now();

    if (!this.inference) {
      return this.fallback(code, result, PatchGenerationFailure.BACKEND_UNAVAILABLE, startedAt);
    }

    const prompt = buildRepairPrompt(code, result, this.limits);

    let raw: string;
    try {
      raw = await this.inference.generate(prompt.text, signal);
    } catch (error) {
      const cause = isInferenceError(error) ? error.kind : PatchGenerationFailure.BACKEND_UNAVAILABLE;
      logger.warn(
        { iteration: code.iteration, cause, err: error },
        'Inference failed, applying rule-based fix'
      );
      return this.fallback(code, result, cause, startedAt);
    }

    const normalized = normalizeResponse(raw);
    if (!normalized.ok) {
      logger.warn(
        { iteration: code.iteration, reason: normalized.error.message },
        'Malformed inference response, applying rule-based fix'
      );
      return this.fallback(code, result, PatchGenerationFailure.MALFORMED_RESPONSE, startedAt);
    }

    if (canonicalProgram(normalized.value.fixedCode) === canonicalProgram(code.source)) {
      logger.warn({ iteration: code.iteration }, 'Inference returned the original program unchanged');
      return this.fallback(code, result, PatchGenerationFailure.MALFORMED_RESPONSE, startedAt);
    }

    logger.info(
      { iteration: code.iteration, model: this.inference.model, salvaged: normalized.value.salvaged },
      'AI patch generated'
    );

    return this.buildRecord(code, startedAt, {
      fixedCode: normalized.value.fixedCode,
      explanation: normalized.value.explanation,
      reasoning: normalized.value.reasoning,
      source: 'ai',
      fallbackCause: null,
    });
  }

  /**
   * Build a patch from the rule table.
   *
   * Public so a caller whose own deadline expired can still obtain a patch.
   */
  fallback(
    code: CodeArtifact,
    result: FailedExecution,
    cause: PatchGenerationFailure,
    startedAt: number = Date.now()
  ): PatchRecord {
    const fix = applyFallbackRule(code.source, result);

    logger.debug(
      { iteration: code.iteration, errorType: result.errorType, cause, changed: fix.fixedCode !== code.source },
      'Rule-based fix applied'
    );

    return this.buildRecord(code, startedAt, {
      fixedCode: fix.fixedCode,
      explanation: fix.explanation,
      reasoning: fix.reasoning,
      source: 'fallback',
      fallbackCause: cause,
    });
  }

  private buildRecord(code: CodeArtifact, startedAt: number, content: PatchContent): PatchRecord {
    const noChange = content.fixedCode === code.source;
    const { unifiedDiff, lineEdits } = noChange
      ? { unifiedDiff: '', lineEdits: [] }
      : this.diffEngine.diff(code.source, content.fixedCode);

    return {
      iteration: code.iteration,
      originalCode: code.source,
      fixedCode: content.fixedCode,
      unifiedDiff,
      lineEdits,
      explanation: content.explanation,
      reasoning: content.reasoning,
      source: content.source,
      generationTimeSeconds: (Date.now() - startedAt) / 1000,
      noChange,
      fallbackCause: content.fallbackCause,
    };
  }
}
