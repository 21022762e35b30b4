/**
 * Docker Client
 *
 * Wrapper around dockerode for Docker daemon communication.
 * Provides health checks, image management and the container operations
 * used by a single sandbox run.
 */

import Docker from 'dockerode';
import type { Container, ContainerCreateOptions, ContainerInspectInfo } from 'dockerode';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sandbox:docker-client');

/**
 * Docker version information.
 */
export interface DockerVersionInfo {
  version: string;
  apiVersion: string;
  os: string;
  arch: string;
}

/**
 * Demultiplexed container output.
 */
export interface ContainerLogs {
  stdout: string;
  stderr: string;
}

/**
 * Minimum required Docker API version.
 */
const MIN_API_VERSION = '1.40'; // Docker 19.03+

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

/**
 * HTTP status carried by dockerode errors.
 */
export function getDockerStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const statusCode = error.statusCode;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}

/**
 * Split a non-TTY Docker log stream into stdout and stderr.
 *
 * Each frame has an 8-byte header: [type, 0, 0, 0, size (uint32 BE)].
 */
export function demuxDockerStream(data: Buffer): ContainerLogs {
  let stdout = '';
  let stderr = '';
  let offset = 0;

  while (offset + 8 <= data.length) {
    const type = data.readUInt8(offset);
    const size = data.readUInt32BE(offset + 4);

    if (offset + 8 + size > data.length) break;

    const payload = data.subarray(offset + 8, offset + 8 + size).toString('utf-8');

    if (type === 1) {
      stdout += payload;
    } else if (type === 2) {
      stderr += payload;
    }

    offset += 8 + size;
  }

  return { stdout, stderr };
}

/**
 * Docker client for sandbox container operations.
 */
export class DockerClient {
  private readonly docker: Docker;
  private versionInfo: DockerVersionInfo | null = null;

  constructor(socketPath: string = DEFAULT_DOCKER_SOCKET) {
    this.docker = new Docker({ socketPath });
  }

  /**
   * Check if Docker daemon is reachable and meets version requirements.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.docker.ping();

      const info = await this.docker.version();
      this.versionInfo = {
        version: info.Version ?? 'unknown',
        apiVersion: info.ApiVersion ?? 'unknown',
        os: info.Os ?? 'unknown',
        arch: info.Arch ?? 'unknown',
      };

      const apiVersion = parseFloat(this.versionInfo.apiVersion);
      const minRequired = parseFloat(MIN_API_VERSION);

      if (apiVersion < minRequired) {
        logger.warn(
          {
            apiVersion: this.versionInfo.apiVersion,
            required: MIN_API_VERSION,
          },
          'Docker API version too old'
        );
        return false;
      }

      logger.debug(
        {
          version: this.versionInfo.version,
          apiVersion: this.versionInfo.apiVersion,
        },
        'Docker daemon available'
      );
      return true;
    } catch (error) {
      logger.debug({ err: error }, 'Docker daemon not available');
      return false;
    }
  }

  /**
   * Version information from the last successful availability check.
   */
  getVersionInfo(): DockerVersionInfo | null {
    return this.versionInfo;
  }

  /**
   * Check whether an image is present locally.
   */
  async isImagePresent(image: string): Promise<boolean> {
    const images = await this.docker.listImages({
      filters: { reference: [image] },
    });
    return images.length > 0;
  }

  /**
   * Pull a Docker image if not present locally.
   */
  async pullImage(image: string): Promise<void> {
    try {
      if (await this.isImagePresent(image)) {
        logger.debug({ image }, 'Image already present');
        return;
      }

      logger.info({ image }, 'Pulling image');

      const stream = await this.docker.pull(image);

      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: Error | null) => {
            if (err) {
              reject(err);
            } else {
              resolve();
            }
          },
          (event: { status?: string }) => {
            logger.debug({ image, status: event.status }, 'Pull progress');
          }
        );
      });

      logger.info({ image }, 'Image pulled successfully');
    } catch (error) {
      logger.error({ image, err: error }, 'Failed to pull image');
      throw error;
    }
  }

  /**
   * Create a new container.
   */
  async createContainer(options: ContainerCreateOptions): Promise<Container> {
    try {
      const container = await this.docker.createContainer(options);
      logger.debug({ containerId: container.id, image: options.Image }, 'Container created');
      return container;
    } catch (error) {
      logger.error({ err: error, image: options.Image }, 'Failed to create container');
      throw error;
    }
  }

  /**
   * Start a container.
   */
  async startContainer(containerId: string): Promise<void> {
    const container = this.docker.getContainer(containerId);
    await container.start();
    logger.debug({ containerId }, 'Container started');
  }

  /**
   * Wait for a container to exit and return its status code.
   */
  async waitContainer(containerId: string): Promise<number | null> {
    const container = this.docker.getContainer(containerId);
    const result: unknown = await container.wait();

    if (typeof result === 'object' && result !== null && 'StatusCode' in result) {
      const statusCode = result.StatusCode;
      return typeof statusCode === 'number' ? statusCode : null;
    }
    return null;
  }

  /**
   * Kill a running container.
   */
  async killContainer(containerId: string): Promise<void> {
    try {
      const container = this.docker.getContainer(containerId);
      await container.kill();
      logger.debug({ containerId }, 'Container killed');
    } catch (error) {
      // 409: container is not running any more
      const statusCode = getDockerStatusCode(error);
      if (statusCode === 304 || statusCode === 409) {
        logger.debug({ containerId }, 'Container already stopped');
        return;
      }
      throw error;
    }
  }

  /**
   * Read everything a stopped container wrote to stdout and stderr.
   */
  async getContainerLogs(containerId: string): Promise<ContainerLogs> {
    const container = this.docker.getContainer(containerId);
    const buffer = await container.logs({ stdout: true, stderr: true, follow: false });
    return demuxDockerStream(buffer);
  }

  /**
   * Inspect a container.
   */
  async inspectContainer(containerId: string): Promise<ContainerInspectInfo> {
    const container = this.docker.getContainer(containerId);
    return container.inspect();
  }

  /**
   * Remove a container and its anonymous volumes.
   */
  async removeContainer(containerId: string, force = false): Promise<void> {
    try {
      const container = this.docker.getContainer(containerId);
      await container.remove({ force, v: true });
      logger.debug({ containerId, force }, 'Container removed');
    } catch (error) {
      if (getDockerStatusCode(error) === 404) {
        logger.debug({ containerId }, 'Container already removed');
        return;
      }
      logger.error({ containerId, err: error }, 'Failed to remove container');
      throw error;
    }
  }

  /**
   * List containers with a specific label.
   */
  async listContainersByLabel(label: string): Promise<Docker.ContainerInfo[]> {
    return this.docker.listContainers({
      all: true,
      filters: { label: [label] },
    });
  }
}
