import type {CreateContainerRequest, ImageSummary} from './types.js'

/**
 * Abstract interface to a container runtime.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 *
 * Operations map one-to-one on the container lifecycle so that the caller
 * decides ordering: create, start, follow logs, wait, and (optionally) remove
 * after the outputs have been collected.
 */
export abstract class ContainerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the executor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Lists local images whose repository is `name`.
   */
  abstract listImages(name: string): Promise<ImageSummary[]>

  /**
   * Creates (without starting) a container.
   * @returns Container ID
   */
  abstract create(request: CreateContainerRequest): Promise<string>

  abstract start(containerId: string): Promise<void>

  /**
   * Follows the container's standard output, one line at a time, until the
   * container stops. Iterating again reconnects from the start of the log.
   */
  abstract logs(containerId: string): AsyncIterable<string>

  /**
   * Blocks until the container stops.
   * @returns Exit code
   */
  abstract wait(containerId: string): Promise<number>

  /**
   * Removes a stopped container together with its anonymous volumes.
   */
  abstract remove(containerId: string): Promise<void>
}
