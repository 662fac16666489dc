import {StatusReportError} from '../errors.js'
import type {JobOutcome} from '../types.js'
import type {Logger} from './logger.js'
import {isSuccess, type Coordinator} from './transport.js'

/**
 * Pushes a job's terminal status and activity to `jobs/<id>`.
 */
export class StatusReporter {
  private readonly log: Logger

  constructor(
    private readonly coordinator: Coordinator,
    logger: Logger
  ) {
    this.log = logger.child({module: 'status-reporter'})
  }

  /**
   * @throws {StatusReportError} If the coordinator rejects the update
   */
  async report(jobId: string, outcome: JobOutcome): Promise<void> {
    this.log.debug('updating job status')
    const reply = await this.coordinator.put(`jobs/${encodeURIComponent(jobId)}`, {
      status: outcome.status,
      activity: outcome.activity
    })

    if (!isSuccess(reply.status)) {
      throw new StatusReportError(jobId, reply.status, reply.reason)
    }
  }
}
