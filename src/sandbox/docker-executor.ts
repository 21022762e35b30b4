/**
 * Docker Sandbox Executor
 *
 * Runs one Python program per call in a fresh, hardened container and
 * classifies the outcome. The container is force-removed after every run,
 * so no files, environment or processes survive into the next iteration.
 */

import type { ContainerCreateOptions } from 'dockerode';
import { DockerClient } from './docker-client.js';
import { classifyFailure } from './error-classifier.js';
import type { RawRunOutcome, SandboxExecutor } from './types.js';
import type { SandboxConfig } from '../config/index.js';
import type { CodeArtifact, ExecutionResult, ResourceLimits } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { withDeadline, DeadlineExceededError } from '../utils/deadline.js';

const logger = createLogger('sandbox:docker');

/**
 * Label used to identify sandbox containers.
 */
export const SANDBOX_LABEL = 'autopatch.sandbox';

/**
 * Default image providing the interpreter.
 */
export const DEFAULT_SANDBOX_IMAGE = 'python:3.11-slim';

/**
 * Unprivileged uid:gid present in the slim Python images ("nobody").
 */
const SANDBOX_USER = '65534:65534';

const PIDS_LIMIT = 64;

/**
 * Outcome of a run stopped before it finished, by the time limit or the caller.
 */
const STOPPED_OUTCOME: Readonly<RawRunOutcome> = Object.freeze({
  exitCode: null,
  stdout: '',
  stderr: '',
  timedOut: true,
  oomKilled: false,
  infrastructureError: null,
});

export interface DockerSandboxExecutorOptions {
  image?: string;
  /** Defaults to a client on the standard socket */
  client?: DockerClient;
}

/**
 * Docker-based sandbox executor.
 */
export class DockerSandboxExecutor implements SandboxExecutor {
  readonly name = 'docker';

  private readonly client: DockerClient;
  private readonly image: string;
  private imagePullPromise: Promise<void> | null = null;

  constructor(options: DockerSandboxExecutorOptions = {}) {
    this.client = options.client ?? new DockerClient();
    this.image = options.image ?? DEFAULT_SANDBOX_IMAGE;
  }

  async isAvailable(): Promise<boolean> {
    return this.client.isAvailable();
  }

  /**
   * Whether the configured image is present locally.
   */
  async isImagePresent(): Promise<boolean> {
    return this.client.isImagePresent(this.image);
  }

  getImage(): string {
    return this.image;
  }

  /**
   * Pull the image if it is missing.
   */
  async prepare(): Promise<void> {
    await this.ensureImage();
  }

  async execute(code: CodeArtifact, limits: ResourceLimits, signal?: AbortSignal): Promise<ExecutionResult> {
    const startTime = Date.now();
    const outcome = await this.run(code.source, limits, signal);
    const durationSeconds = (Date.now() - startTime) / 1000;

    if (
      !outcome.timedOut &&
      !outcome.oomKilled &&
      outcome.infrastructureError === null &&
      outcome.exitCode === 0
    ) {
      logger.debug({ iteration: code.iteration, durationSeconds }, 'Program exited cleanly');
      return { success: true, stdout: outcome.stdout, durationSeconds };
    }

    const classification = classifyFailure(outcome, limits.timeoutSeconds);
    logger.debug(
      {
        iteration: code.iteration,
        errorType: classification.errorType,
        exitCode: outcome.exitCode,
        durationSeconds,
      },
      'Program failed'
    );

    return {
      success: false,
      // Output of a killed run is not reliable
      stdout: outcome.timedOut ? '' : outcome.stdout,
      errorType: classification.errorType,
      errorMessage: classification.errorMessage,
      stackTrace: classification.stackTrace,
      exitCode: outcome.exitCode,
      durationSeconds,
    };
  }

  /**
   * Remove sandbox containers left behind by an interrupted process.
   */
  async cleanup(): Promise<number> {
    const containers = await this.client.listContainersByLabel(SANDBOX_LABEL);
    let removed = 0;

    for (const containerInfo of containers) {
      try {
        await this.client.removeContainer(containerInfo.Id, true);
        removed++;
      } catch (error) {
        logger.error({ containerId: containerInfo.Id, err: error }, 'Failed to remove orphaned container');
      }
    }

    if (removed > 0) {
      logger.info({ removed }, 'Removed orphaned sandbox containers');
    }
    return removed;
  }

  private async run(source: string, limits: ResourceLimits, signal?: AbortSignal): Promise<RawRunOutcome> {
    let containerId: string | null = null;
    let onAbort: (() => void) | null = null;

    try {
      await this.ensureImage();
      if (signal?.aborted) return STOPPED_OUTCOME;

      const container = await this.client.createContainer(this.buildContainerOptions(source, limits));
      const id = container.id;
      containerId = id;
      if (signal?.aborted) return STOPPED_OUTCOME;

      await this.client.startContainer(id);
      if (signal?.aborted) {
        await this.stopContainer(id);
        return STOPPED_OUTCOME;
      }

      const abortRun = (): void => {
        logger.warn({ containerId: id }, 'Run abandoned by caller, killing container');
        void this.stopContainer(id);
      };
      onAbort = abortRun;
      signal?.addEventListener('abort', abortRun, { once: true });

      let exitCode: number | null;
      try {
        exitCode = await withDeadline(
          this.client.waitContainer(id),
          limits.timeoutSeconds * 1000,
          'sandbox run'
        );
      } catch (error) {
        if (!(error instanceof DeadlineExceededError)) throw error;

        logger.warn({ containerId: id, timeoutSeconds: limits.timeoutSeconds }, 'Run timed out, killing container');
        await this.stopContainer(id);
        return STOPPED_OUTCOME;
      }

      if (signal?.aborted) return STOPPED_OUTCOME;

      const logs = await this.client.getContainerLogs(id);
      const info = await this.client.inspectContainer(id);

      return {
        exitCode: exitCode ?? info.State.ExitCode,
        stdout: logs.stdout,
        stderr: logs.stderr,
        timedOut: false,
        oomKilled: info.State.OOMKilled,
        infrastructureError: null,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, image: this.image }, 'Sandbox run failed');
      return {
        exitCode: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        oomKilled: false,
        infrastructureError: `Docker Error: ${message}`,
      };
    } finally {
      if (onAbort) signal?.removeEventListener('abort', onAbort);
      if (containerId) {
        await this.client.removeContainer(containerId, true).catch((err: unknown) => {
          logger.error({ containerId, err }, 'Failed to remove sandbox container');
        });
      }
    }
  }

  /**
   * Kill a container; failures are logged, removal still follows.
   */
  private async stopContainer(containerId: string): Promise<void> {
    await this.client.killContainer(containerId).catch((err: unknown) => {
      logger.error({ containerId, err }, 'Failed to kill sandbox container');
    });
  }

  /**
   * Pull the image once; later runs reuse the same promise.
   */
  private async ensureImage(): Promise<void> {
    if (!this.imagePullPromise) {
      this.imagePullPromise = this.client.pullImage(this.image).catch((error: unknown) => {
        this.imagePullPromise = null;
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Image '${this.image}' is not available: ${message}`);
      });
    }
    await this.imagePullPromise;
  }

  private buildContainerOptions(source: string, limits: ResourceLimits): ContainerCreateOptions {
    return {
      Image: this.image,
      Cmd: ['python', '-u', '-c', source],
      WorkingDir: '/tmp',
      User: SANDBOX_USER,
      Env: ['PYTHONDONTWRITEBYTECODE=1', 'PYTHONIOENCODING=utf-8', 'NO_COLOR=1'],
      Tty: false,
      NetworkDisabled: !limits.networkEnabled,
      Labels: {
        [SANDBOX_LABEL]: 'true',
        'autopatch.sandbox.created': new Date().toISOString(),
      },
      HostConfig: {
        NetworkMode: limits.networkEnabled ? 'bridge' : 'none',
        // Memory and swap at the same value: no swap beyond the cap
        Memory: limits.memoryBytes,
        MemorySwap: limits.memoryBytes,
        NanoCpus: Math.round(limits.cpuShare * 1e9),
        PidsLimit: PIDS_LIMIT,
        SecurityOpt: ['no-new-privileges'],
        CapDrop: ['ALL'],
        ReadonlyRootfs: true,
        Tmpfs: {
          '/tmp': 'rw,noexec,nosuid,size=16m',
        },
      },
    };
  }
}

/**
 * Executor for the configured image and Docker socket.
 */
export function createDockerSandboxExecutor(config: SandboxConfig): DockerSandboxExecutor {
  return new DockerSandboxExecutor({
    image: config.image,
    client: new DockerClient(config.dockerSocket),
  });
}
