import {basename} from 'node:path'
import {setTimeout} from 'node:timers/promises'
import {type ContainerExecutor, type StagingArea, withStagingArea} from '../engine/index.js'
import type {Job, JobOutcome, JobScope} from '../types.js'
import {ContainerRunner} from './container-runner.js'
import {ImageResolver} from './image-resolver.js'
import {describeJob} from './job-document.js'
import {JobPoller} from './job-poller.js'
import {deriveCommand, InputStager} from './input-stager.js'
import type {Logger} from './logger.js'
import {ResultSubmitter} from './result-submitter.js'
import {StatusReporter} from './status-reporter.js'
import type {Coordinator} from './transport.js'

export type EngineOptions = {
  /** Group/project filter sent with every claim */
  scope?: JobScope;
  /** Parent directory of staging areas (defaults to the OS temp dir) */
  workdir?: string;
  /** Host directory mounted read-only at `/scratch` (default: `/scratch`) */
  scratchPath?: string;
  /** Keep job containers after they ran, for debugging */
  keepContainers?: boolean;
  /** Delay before claiming again when there was no work (default: 10s) */
  idleDelayMs?: number;
}

/**
 * Result of one engine iteration.
 */
export type IterationResult =
  | {kind: 'idle'}
  | {kind: 'processed'; job: Job; outcome: JobOutcome}

/** State passed between the stages of one job. */
type JobContext = {
  job: Job;
  imageId: string;
  area: StagingArea;
}

function failed(activity: string): JobOutcome {
  return {status: 'Failed', activity}
}

/**
 * Claims jobs one at a time and carries each through
 * resolve → stage → execute → collect → submit → report.
 *
 * ## Cancellation
 *
 * `run()` takes an `AbortSignal`. It is checked once per iteration, before the
 * next claim: a job in flight (download, container run, upload, report) always
 * completes first. Only the idle delay between claims is cut short.
 *
 * ## Outcomes
 *
 * Every claimed job is reported exactly once, as the last step:
 * - `Failed` when the image cannot be resolved, the container exits non-zero,
 *   no file is produced, or staging/launch/submission throws
 * - `Done` when the produced files were submitted
 *
 * @example
 * ```typescript
 * const engine = new Engine(coordinator, new DockerCliExecutor(), logger)
 * const controller = new AbortController()
 * process.once('SIGTERM', () => controller.abort())
 * await engine.run(controller.signal)
 * ```
 */
export class Engine {
  static get defaultIdleDelayMs() {
    return 10_000
  }

  private readonly log: Logger
  private readonly poller: JobPoller
  private readonly resolver: ImageResolver
  private readonly stager: InputStager
  private readonly runner: ContainerRunner
  private readonly submitter: ResultSubmitter
  private readonly reporter: StatusReporter
  private readonly idleDelayMs: number
  private readonly scratchPath: string

  constructor(
    coordinator: Coordinator,
    executor: ContainerExecutor,
    logger: Logger,
    private readonly options: EngineOptions = {}
  ) {
    this.log = logger.child({module: 'engine'})
    this.poller = new JobPoller(coordinator, logger, options.scope)
    this.resolver = new ImageResolver(executor, coordinator, logger)
    this.stager = new InputStager(coordinator, logger)
    this.runner = new ContainerRunner(executor, logger)
    this.submitter = new ResultSubmitter(coordinator, logger)
    this.reporter = new StatusReporter(coordinator, logger)
    this.idleDelayMs = options.idleDelayMs ?? Engine.defaultIdleDelayMs
    this.scratchPath = options.scratchPath ?? '/scratch'
  }

  /**
   * Processes jobs until `signal` is aborted.
   * Errors escaping an iteration are logged and followed by the idle delay.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      let result: IterationResult
      try {
        result = await this.runOnce()
      } catch (error) {
        this.log.error({err: error}, 'iteration failed')
        result = {kind: 'idle'}
      }

      if (result.kind === 'idle') {
        await this.idle(signal)
      }
    }

    this.log.info('engine received halt - stopping')
  }

  /**
   * Claims at most one job and processes it to its reported outcome.
   * @throws {StatusReportError} If the final report is rejected
   */
  async runOnce(): Promise<IterationResult> {
    const job = await this.poller.claim()
    if (!job) {
      this.log.info('waiting for work')
      return {kind: 'idle'}
    }

    const outcome = await this.process(job)
    await this.reporter.report(job.id, outcome)
    this.log.info(`JOB ${describeJob(job)}, ${outcome.status} ${outcome.activity}`)
    return {kind: 'processed', job, outcome}
  }

  /**
   * Runs a claimed job and decides its outcome. Never throws.
   */
  async process(job: Job): Promise<JobOutcome> {
    const imageId = await this.resolver.resolve(job)
    if (!imageId) {
      this.log.error('could not load or download app')
      return failed(`could not load or download app ${job.app.id}`)
    }

    try {
      return await withStagingArea(this.options.workdir, async area => this.execute({job, imageId, area}))
    } catch (error) {
      this.log.error({err: error}, `job ${job.id} aborted`)
      return failed(error instanceof Error ? error.message : String(error))
    }
  }

  private async execute({job, imageId, area}: JobContext): Promise<JobOutcome> {
    this.log.debug(`working in ${area.root}`)
    await area.writeMeta('job.json', job.document)

    const inputs = await this.stager.stage(job, area)
    const containerId = await this.runner.launch({
      job,
      imageId,
      cmd: deriveCommand(inputs),
      mounts: area.bindings(this.scratchPath)
    })

    try {
      const exitCode = await this.runner.execute(containerId)
      if (exitCode !== 0) {
        this.log.error(`container had non-zero exit code, ${exitCode}`)
        return failed(`container exited with code ${exitCode}`)
      }

      const outputs = await area.listOutputs()
      if (outputs.length === 0) {
        return failed('no files were generated')
      }

      await this.submitter.submit(job, outputs)
      return {status: 'Done', activity: `generated ${outputs.map(file => basename(file)).join(', ')}`}
    } finally {
      if (!this.options.keepContainers) {
        await this.runner.remove(containerId)
      }
    }
  }

  private async idle(signal?: AbortSignal): Promise<void> {
    try {
      await setTimeout(this.idleDelayMs, undefined, {signal})
    } catch (error) {
      if (!signal?.aborted) {
        throw error
      }
    }
  }
}
