import type {BindMount, ContainerExecutor} from '../engine/index.js'
import type {Job} from '../types.js'
import type {Logger} from './logger.js'
import {formatCommand, formatDuration} from './utils.js'

export type LaunchRequest = {
  job: Job;
  /** Local image ID returned by the image resolver */
  imageId: string;
  cmd: string[];
  mounts: BindMount[];
}

/**
 * Drives one job container through its lifecycle on a {@link ContainerExecutor}.
 *
 * A non-zero exit code is a normal outcome, returned rather than thrown.
 * Removal is separate so the caller can collect outputs first.
 */
export class ContainerRunner {
  private readonly log: Logger

  constructor(
    private readonly executor: ContainerExecutor,
    logger: Logger
  ) {
    this.log = logger.child({module: 'container-runner'})
  }

  /**
   * Creates the job container.
   * @returns Container ID
   */
  async launch(request: LaunchRequest): Promise<string> {
    const {job, imageId, cmd, mounts} = request
    this.log.debug({mounts}, `creating ${job.app.id} container, command: ${formatCommand(cmd)}`)
    return this.executor.create({
      image: imageId,
      cmd,
      mounts,
      labels: {'job-engine.job': job.id}
    })
  }

  /**
   * Starts the container, relays its stdout at debug level and waits for it to stop.
   * @returns Exit code
   */
  async execute(containerId: string): Promise<number> {
    const startedAt = Date.now()
    this.log.debug(`starting container ${containerId}`)
    await this.executor.start(containerId)

    await this.relayLogs(containerId)

    const exitCode = await this.executor.wait(containerId)
    this.log.debug(`container ${containerId} exited with code ${exitCode} after ${formatDuration(Date.now() - startedAt)}`)
    return exitCode
  }

  /**
   * Removes the container. Failures are logged, not thrown.
   */
  async remove(containerId: string): Promise<void> {
    this.log.debug(`removing container: ${containerId}`)
    try {
      await this.executor.remove(containerId)
    } catch (error) {
      this.log.warn({err: error}, `container ${containerId} could not be removed`)
    }
  }

  private async relayLogs(containerId: string): Promise<void> {
    try {
      for await (const line of this.executor.logs(containerId)) {
        this.log.debug({containerId}, line)
      }
    } catch (error) {
      this.log.warn({err: error}, `log stream of container ${containerId} interrupted`)
    }
  }
}
