export {Engine, type EngineOptions, type IterationResult} from './engine.js'
export {JobPoller} from './job-poller.js'
export {ImageResolver} from './image-resolver.js'
export {InputStager, deriveCommand} from './input-stager.js'
export {ContainerRunner, type LaunchRequest} from './container-runner.js'
export {ResultSubmitter, buildExpectationTable, type SubmissionManifest, type SubmissionReceipt} from './result-submitter.js'
export {StatusReporter} from './status-reporter.js'
export {
  CoordinatorClient,
  isSuccess,
  parseContentDisposition,
  type Coordinator,
  type CoordinatorClientOptions,
  type CoordinatorDownload,
  type CoordinatorReply,
  type FilePart,
  type MultipartBody
} from './transport.js'
export {parseJob, splitAppRef, describeJob} from './job-document.js'
export {
  resolveConfig,
  loadConfigFile,
  configFromEnv,
  defaultConfigFile,
  type EngineConfig,
  type ConfigSource
} from './config.js'
export {createLogger, isLogLevel, logLevels, type Logger, type LogLevel} from './logger.js'
export {splitFileName, sha1, sha1File, hashChunkSize, formatCommand, formatDuration} from './utils.js'
