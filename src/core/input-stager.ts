import {createWriteStream} from 'node:fs'
import {basename, join} from 'node:path'
import {text} from 'node:stream/consumers'
import {pipeline} from 'node:stream/promises'
import type {StagingArea} from '../engine/index.js'
import {InputFetchError, StagingError} from '../errors.js'
import type {Job} from '../types.js'
import type {Logger} from './logger.js'
import {isSuccess, type Coordinator} from './transport.js'

/**
 * Container command line for staged inputs: their base names, in declaration order.
 */
export function deriveCommand(stagedFiles: string[]): string[] {
  return stagedFiles.map(file => basename(file))
}

/**
 * Downloads every declared input of a job into the staging area's `input/`.
 *
 * Inputs are fetched one by one in declaration order. Any failed fetch aborts
 * the whole stage: a job never runs on incomplete inputs.
 */
export class InputStager {
  private readonly log: Logger

  constructor(
    private readonly coordinator: Coordinator,
    logger: Logger
  ) {
    this.log = logger.child({module: 'input-stager'})
  }

  /**
   * @returns Local paths of the staged files, in declaration order
   * @throws {InputFetchError} If the coordinator refuses an input
   * @throws {StagingError} If an input has no file name or cannot be written
   */
  async stage(job: Job, area: StagingArea): Promise<string[]> {
    this.log.debug(`fetching ${job.inputs.length} input(s)`)
    const files: string[] = []

    for (const input of job.inputs) {
      const download = await this.coordinator.download(input.url, input.payload)

      if (!isSuccess(download.status)) {
        const detail = await text(download.content)
        this.log.debug({route: input.url, detail}, 'input fetch refused')
        throw new InputFetchError(input.url, download.status, download.reason)
      }

      if (!download.filename) {
        download.content.destroy()
        throw new StagingError(`Input ${input.url} has no attachment filename`)
      }

      const path = join(area.inputPath, download.filename)
      try {
        await pipeline(download.content, createWriteStream(path))
      } catch (error) {
        throw new StagingError(`Cannot write input ${input.url} to ${path}`, {cause: error})
      }

      this.log.debug(`${path} downloaded`)
      files.push(path)
    }

    return files
  }
}
