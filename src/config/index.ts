/**
 * Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import type { ResourceLimits } from '../types/index.js';

const log = createLogger('config');

/**
 * Boolean env values. z.coerce.boolean() would read "false" as true.
 */
const envBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

/**
 * Sandbox configuration schema
 */
const sandboxConfigSchema = z.object({
  /** Image providing the Python interpreter */
  image: z.string().min(1).default('python:3.11-slim'),
  /** Memory cap in megabytes */
  memoryMB: z.coerce.number().int().min(16).max(8192).default(128),
  /** Fraction of one CPU core */
  cpuShare: z.coerce.number().min(0.05).max(16).default(0.5),
  /** Wall-clock limit per run */
  timeoutSeconds: z.coerce.number().int().min(1).max(600).default(5),
  /** Network access for the executed program */
  networkEnabled: envBoolean.default(false),
  /** Extra time the orchestrator allows for container setup and teardown */
  graceSeconds: z.coerce.number().int().min(0).max(120).default(10),
  /** Docker daemon socket */
  dockerSocket: z.string().min(1).default('/var/run/docker.sock'),
});

export type SandboxConfig = z.infer<typeof sandboxConfigSchema>;

/**
 * Inference backend configuration schema
 */
const inferenceConfigSchema = z.object({
  enabled: envBoolean.default(true),
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('llama3'),
  timeoutMs: z.coerce.number().int().min(1000).max(600000).default(30000),
});

export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;

/**
 * Configuration schema with validation
 */
export const configSchema = z.object({
  maxIterations: z.coerce.number().int().min(1).max(10).default(3),
  dataDir: z.string().min(1).default(join(homedir(), '.autopatch')),
  sandbox: sandboxConfigSchema,
  inference: inferenceConfigSchema,
});

export type AutopatchConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AutopatchConfig {
  const raw = {
    maxIterations: env.AUTOPATCH_MAX_ITERATIONS,
    dataDir: env.AUTOPATCH_DATA_DIR,
    sandbox: {
      image: env.AUTOPATCH_SANDBOX_IMAGE,
      memoryMB: env.AUTOPATCH_SANDBOX_MEMORY_MB,
      cpuShare: env.AUTOPATCH_SANDBOX_CPU_SHARE,
      timeoutSeconds: env.AUTOPATCH_SANDBOX_TIMEOUT_SECONDS,
      networkEnabled: env.AUTOPATCH_SANDBOX_NETWORK_ENABLED?.toLowerCase(),
      graceSeconds: env.AUTOPATCH_SANDBOX_GRACE_SECONDS,
      dockerSocket: env.AUTOPATCH_DOCKER_SOCKET,
    },
    inference: {
      enabled: env.AUTOPATCH_INFERENCE_ENABLED?.toLowerCase(),
      baseUrl: env.AUTOPATCH_INFERENCE_URL,
      model: env.AUTOPATCH_INFERENCE_MODEL,
      timeoutMs: env.AUTOPATCH_INFERENCE_TIMEOUT_MS,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      maxIterations: result.data.maxIterations,
      image: result.data.sandbox.image,
      memoryMB: result.data.sandbox.memoryMB,
      timeoutSeconds: result.data.sandbox.timeoutSeconds,
      networkEnabled: result.data.sandbox.networkEnabled,
      inferenceEnabled: result.data.inference.enabled,
      model: result.data.inference.model,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Resource limits handed to the sandbox executor.
 */
export function toResourceLimits(sandbox: SandboxConfig): ResourceLimits {
  return {
    memoryBytes: sandbox.memoryMB * 1024 * 1024,
    cpuShare: sandbox.cpuShare,
    networkEnabled: sandbox.networkEnabled,
    timeoutSeconds: sandbox.timeoutSeconds,
  };
}
