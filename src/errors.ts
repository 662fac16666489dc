export class EngineError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'EngineError'
  }
}

// -- Coordinator errors ------------------------------------------------------

export class CoordinatorError extends EngineError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CoordinatorError'
  }
}

export class CoordinatorUnavailableError extends CoordinatorError {
  constructor(route: string, options?: {cause?: unknown}) {
    super('COORDINATOR_UNAVAILABLE', `Coordinator unreachable on ${route}`, options)
    this.name = 'CoordinatorUnavailableError'
  }
}

export class JobFormatError extends CoordinatorError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_JOB', message, options)
    this.name = 'JobFormatError'
  }
}

export class InputFetchError extends CoordinatorError {
  constructor(
    readonly route: string,
    readonly status: number,
    readonly reason: string,
    options?: {cause?: unknown}
  ) {
    super('INPUT_FETCH_FAILED', `Input ${route} could not be fetched: ${status}, ${reason}`, options)
    this.name = 'InputFetchError'
  }
}

export class SubmissionError extends CoordinatorError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('SUBMISSION_FAILED', message, options)
    this.name = 'SubmissionError'
  }
}

export class StatusReportError extends CoordinatorError {
  constructor(
    readonly jobId: string,
    readonly status: number,
    readonly reason: string,
    options?: {cause?: unknown}
  ) {
    super('STATUS_REPORT_FAILED', `Status of job ${jobId} could not be reported: ${status}, ${reason}`, options)
    this.name = 'StatusReportError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends EngineError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }
}

export class ContainerLaunchError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('CONTAINER_LAUNCH_FAILED', `Failed to launch a container from image "${image}"`, options)
    this.name = 'ContainerLaunchError'
  }
}

export class ContainerCleanupError extends DockerError {
  constructor(containerId: string, options?: {cause?: unknown}) {
    super('CONTAINER_CLEANUP_FAILED', `Failed to remove container ${containerId}`, options)
    this.name = 'ContainerCleanupError'
  }
}

// -- Staging errors ----------------------------------------------------------

export class StagingError extends EngineError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigError extends EngineError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}
