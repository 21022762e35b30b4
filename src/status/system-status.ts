/**
 * System status.
 * Readiness checks for the two external dependencies of a repair: the Docker
 * daemon with its sandbox image, and the inference backend with its model.
 */

import { matchesModel, type InferenceClient } from '../patch/inference-client.js';

export interface ComponentCheck {
  name: string;
  healthy: boolean;
  message: string;
  latencyMs: number;
}

export interface ReadinessResponse {
  ready: boolean;
  checks: ComponentCheck[];
  timestamp: string;
}

/**
 * What the sandbox check needs from an executor.
 */
export interface SandboxStatusSource {
  isAvailable(): Promise<boolean>;
  isImagePresent(): Promise<boolean>;
  getImage(): string;
}

export interface StatusDependencies {
  sandbox: SandboxStatusSource;
  /** Null when inference is disabled */
  inference: InferenceClient | null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check Docker reachability and sandbox image presence
 */
export async function checkSandbox(sandbox: SandboxStatusSource): Promise<ComponentCheck> {
  const start = Date.now();
  const image = sandbox.getImage();

  try {
    if (!(await sandbox.isAvailable())) {
      return {
        name: 'sandbox',
        healthy: false,
        message: 'Docker daemon is not running or not accessible',
        latencyMs: Date.now() - start,
      };
    }

    const present = await sandbox.isImagePresent();
    return {
      name: 'sandbox',
      healthy: true,
      message: present
        ? `Docker ready (image: ${image})`
        : `Docker ready; image ${image} will be pulled on first run`,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    return {
      name: 'sandbox',
      healthy: false,
      message: `Sandbox check failed: ${describeError(error)}`,
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Check the inference backend serves the configured model
 */
export async function checkInference(inference: InferenceClient | null): Promise<ComponentCheck> {
  const start = Date.now();

  if (!inference) {
    return {
      name: 'inference',
      healthy: true,
      message: 'Inference disabled; rule-based fixes only',
      latencyMs: 0,
    };
  }

  try {
    const models = await inference.listModels();
    const found = models.some((model) => matchesModel(model, inference.model));
    return {
      name: 'inference',
      healthy: found,
      message: found
        ? `Model ${inference.model} available`
        : `Backend reachable but model ${inference.model} is not installed`,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    return {
      name: 'inference',
      healthy: false,
      message: describeError(error),
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Run all readiness checks. Never rejects.
 */
export async function checkSystemStatus(deps: StatusDependencies): Promise<ReadinessResponse> {
  const checks = await Promise.all([checkSandbox(deps.sandbox), checkInference(deps.inference)]);

  return {
    ready: checks.every((check) => check.healthy),
    checks,
    timestamp: new Date().toISOString(),
  };
}
