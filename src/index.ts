/**
 * Programmatic entry point.
 *
 * The engine layer provides host-side primitives (staging areas, container
 * executors); the core layer runs the job pipeline against a coordinator.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {CoordinatorClient, DockerCliExecutor, Engine, createLogger} from 'job-engine'
 *
 * const logger = createLogger({level: 'debug'})
 * const coordinator = new CoordinatorClient({apiUrl: 'https://coordinator.example.com/api', engineId: 'worker-1'})
 * const executor = new DockerCliExecutor()
 * await executor.check()
 *
 * const engine = new Engine(coordinator, executor, logger, {keepContainers: true})
 * const result = await engine.runOnce()
 * if (result.kind === 'processed') {
 *   console.log(result.outcome.status, result.outcome.activity)
 * }
 * ```
 */

export {
  StagingArea,
  withStagingArea,
  ContainerExecutor,
  DockerCliExecutor,
  type DockerCliExecutorOptions,
  type BindMount,
  type CreateContainerRequest,
  type ImageSummary
} from './engine/index.js'

export * from './core/index.js'

export type * from './types.js'

export {
  EngineError,
  CoordinatorError,
  CoordinatorUnavailableError,
  JobFormatError,
  InputFetchError,
  SubmissionError,
  StatusReportError,
  DockerError,
  DockerNotAvailableError,
  ContainerLaunchError,
  ContainerCleanupError,
  StagingError,
  ConfigError
} from './errors.js'
