/**
 * Inference Client
 *
 * HTTP client for an Ollama-compatible model server. Only the two endpoints
 * the repair loop needs are covered: `/api/generate` for one-shot,
 * non-streaming completions and `/api/tags` for the status check.
 */

import { z } from 'zod';
import { InferenceError } from './errors.js';
import type { InferenceConfig } from '../config/index.js';
import { PatchGenerationFailure } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('patch:inference');

/** Timeout for the lightweight tags request */
const TAGS_TIMEOUT_MS = 5000;

/**
 * Backend that turns a prompt into a raw completion.
 */
export interface InferenceClient {
  readonly model: string;
  /**
   * Returns the completion text. Rejects with an InferenceError.
   */
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
  /**
   * Names of the models the backend serves.
   */
  listModels(): Promise<string[]>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const generateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()),
});

/**
 * Whether a served model name matches the configured one.
 *
 * `llama3` matches `llama3:latest` and any other tag of the same model.
 */
export function matchesModel(served: string, wanted: string): boolean {
  return served === wanted || served.startsWith(`${wanted}:`);
}

/**
 * Client for the Ollama REST API.
 */
export class OllamaInferenceClient implements InferenceClient {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const body = {
      model: this.model,
      prompt,
      stream: false,
      format: 'json',
    };

    const started = Date.now();
    const response = await this.request('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    }, this.timeoutMs, signal);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InferenceError(
        PatchGenerationFailure.MALFORMED_RESPONSE,
        `Inference backend returned a non-JSON body: ${errorMessage(error)}`
      );
    }

    const parsed = generateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError(
        PatchGenerationFailure.MALFORMED_RESPONSE,
        'Inference backend response has no "response" field'
      );
    }

    logger.debug(
      { model: this.model, elapsedMs: Date.now() - started, length: parsed.data.response.length },
      'Completion received'
    );
    return parsed.data.response;
  }

  async listModels(): Promise<string[]> {
    const response = await this.request('/api/tags', { method: 'GET' }, TAGS_TIMEOUT_MS);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InferenceError(
        PatchGenerationFailure.MALFORMED_RESPONSE,
        `Model list is not JSON: ${errorMessage(error)}`
      );
    }

    const parsed = tagsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError(PatchGenerationFailure.MALFORMED_RESPONSE, 'Model list has an unexpected shape');
    }
    return parsed.data.models.map((model) => model.name);
  }

  /**
   * Perform a request bounded by a timeout and an optional caller signal.
   */
  private async request(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const url = `${this.baseUrl}${path}`;
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw new InferenceError(
          PatchGenerationFailure.BACKEND_UNAVAILABLE,
          `Inference backend error: ${response.status} ${response.statusText}`,
          response.status
        );
      }
      return response;
    } catch (error) {
      if (error instanceof InferenceError) throw error;

      if (controller.signal.aborted) {
        const reason = timedOut ? `no response within ${timeoutMs}ms` : 'request cancelled';
        logger.warn({ url, timeoutMs }, 'Inference request aborted');
        throw new InferenceError(PatchGenerationFailure.BACKEND_TIMEOUT, `Inference backend timed out: ${reason}`);
      }

      logger.warn({ url, err: error }, 'Inference backend unreachable');
      throw new InferenceError(
        PatchGenerationFailure.BACKEND_UNAVAILABLE,
        `Cannot connect to inference backend at ${this.baseUrl}: ${errorMessage(error)}`
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the configured backend, or null when inference is disabled.
 */
export function createInferenceClient(config: InferenceConfig): InferenceClient | null {
  if (!config.enabled) {
    return null;
  }
  return new OllamaInferenceClient({
    baseUrl: config.baseUrl,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}
