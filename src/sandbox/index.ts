/**
 * Sandbox Module
 *
 * Isolated, resource-bounded execution of untrusted programs.
 */

export type { SandboxExecutor, RawRunOutcome } from './types.js';

export {
  DockerSandboxExecutor,
  createDockerSandboxExecutor,
  DEFAULT_SANDBOX_IMAGE,
  SANDBOX_LABEL,
  type DockerSandboxExecutorOptions,
} from './docker-executor.js';

export {
  DockerClient,
  DEFAULT_DOCKER_SOCKET,
  demuxDockerStream,
  getDockerStatusCode,
  type ContainerLogs,
  type DockerVersionInfo,
} from './docker-client.js';

export {
  classifyFailure,
  errorTypeForException,
  parseExceptionLine,
  extractFailingLine,
  extractUndefinedName,
  extractMissingModule,
  type Classification,
  type ParsedException,
} from './error-classifier.js';
