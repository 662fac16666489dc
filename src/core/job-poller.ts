import {CoordinatorUnavailableError, JobFormatError} from '../errors.js'
import type {Job, JobScope} from '../types.js'
import {describeJob, parseJob} from './job-document.js'
import type {Logger} from './logger.js'
import {isSuccess, type Coordinator, type CoordinatorReply} from './transport.js'

/**
 * Claims the next job from the coordinator.
 *
 * Absence of work is a normal outcome: a non-success status, a body that
 * is not a job, or an unreachable coordinator all yield `undefined`.
 * There is no retry here; the engine's idle delay is the retry.
 */
export class JobPoller {
  private readonly log: Logger

  constructor(
    private readonly coordinator: Coordinator,
    logger: Logger,
    private readonly scope: JobScope = {}
  ) {
    this.log = logger.child({module: 'job-poller'})
  }

  async claim(): Promise<Job | undefined> {
    const payload = {
      group: this.scope.group ?? null,
      project: this.scope.project ?? null
    }

    this.log.debug({payload}, 'requesting job from jobs/next')

    let reply: CoordinatorReply
    try {
      reply = await this.coordinator.get('jobs/next', payload)
    } catch (error) {
      if (error instanceof CoordinatorUnavailableError) {
        this.log.warn({err: error}, 'coordinator unreachable')
        return undefined
      }

      throw error
    }

    if (!isSuccess(reply.status)) {
      this.log.warn(`HTTP ${reply.status}: ${reply.reason}`)
      return undefined
    }

    if (reply.body === '' || reply.body === null || reply.body === undefined) {
      return undefined
    }

    try {
      const job = parseJob(reply.body)
      this.log.info(`JOB ${describeJob(job)} claimed`)
      return job
    } catch (error) {
      if (error instanceof JobFormatError) {
        this.log.warn({err: error}, 'ignoring malformed job document')
        return undefined
      }

      throw error
    }
  }
}
