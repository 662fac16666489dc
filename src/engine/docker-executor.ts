import process from 'node:process'
import {execa} from 'execa'
import {ContainerCleanupError, ContainerLaunchError, DockerError, DockerNotAvailableError} from '../errors.js'
import {ContainerExecutor} from './executor.js'
import type {CreateContainerRequest, ImageSummary} from './types.js'

export type DockerCliExecutorOptions = {
  /** Docker CLI binary (defaults to `docker` on the PATH) */
  binary?: string;
  /** Daemon address, exported to the CLI as DOCKER_HOST */
  host?: string;
}

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept: host secrets (coordinator
 * certificates, tokens) never reach the CLI.
 */
function dockerCliEnv(host?: string): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  if (host) {
    env.DOCKER_HOST = host
  }

  return env
}

type ImageListLine = {
  ID: string;
  Repository: string;
  Tag: string;
}

function isImageListLine(value: unknown): value is ImageListLine {
  if (typeof value !== 'object' || value === null) {
    return false
  }

  return 'ID' in value && typeof value.ID === 'string'
    && 'Repository' in value && typeof value.Repository === 'string'
    && 'Tag' in value && typeof value.Tag === 'string'
}

function parseJsonLine(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown
  } catch {
    return undefined
  }
}

export class DockerCliExecutor extends ContainerExecutor {
  private readonly binary: string
  private readonly env: Record<string, string>

  constructor(options: DockerCliExecutorOptions = {}) {
    super()
    this.binary = options.binary ?? 'docker'
    this.env = dockerCliEnv(options.host)
  }

  async check(): Promise<void> {
    try {
      await this.docker(['--version'])
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async listImages(name: string): Promise<ImageSummary[]> {
    let stdout: string
    try {
      ({stdout} = await this.docker(['image', 'ls', '--no-trunc', '--format', '{{json .}}', name]))
    } catch (error) {
      throw new DockerError('IMAGE_LIST_FAILED', `Failed to list images named "${name}"`, {cause: error})
    }

    const images = new Map<string, ImageSummary>()
    for (const raw of stdout.split('\n')) {
      if (!raw.trim()) {
        continue
      }

      const line = parseJsonLine(raw)
      if (!isImageListLine(line)) {
        continue
      }

      let image = images.get(line.ID)
      if (!image) {
        image = {id: line.ID, repoTags: []}
        images.set(line.ID, image)
      }

      if (line.Repository !== '<none>' && line.Tag !== '<none>') {
        image.repoTags.push(`${line.Repository}:${line.Tag}`)
      }
    }

    return [...images.values()]
  }

  async create(request: CreateContainerRequest): Promise<string> {
    const args = ['create']

    if (request.labels) {
      for (const [key, value] of Object.entries(request.labels)) {
        args.push('--label', `${key}=${value}`)
      }
    }

    for (const mount of request.mounts) {
      args.push('-v', `${mount.hostPath}:${mount.containerPath}:${mount.readOnly ? 'ro' : 'rw'}`)
    }

    args.push(request.image, ...request.cmd)

    try {
      const {stdout} = await this.docker(args)
      return stdout.trim()
    } catch (error) {
      throw new ContainerLaunchError(request.image, {cause: error})
    }
  }

  async start(containerId: string): Promise<void> {
    try {
      await this.docker(['start', containerId])
    } catch (error) {
      throw new DockerError('CONTAINER_START_FAILED', `Failed to start container ${containerId}`, {cause: error})
    }
  }

  async * logs(containerId: string): AsyncIterable<string> {
    const proc = execa(this.binary, ['logs', '--follow', containerId], {
      env: this.env,
      extendEnv: false,
      stderr: 'ignore',
      reject: false
    })

    let completed = false
    try {
      for await (const line of proc.iterable({from: 'stdout'})) {
        yield line
      }

      const result = await proc
      completed = true
      if (result.failed) {
        throw new DockerError('CONTAINER_LOGS_FAILED', `Failed to follow logs of container ${containerId} (exit code ${result.exitCode ?? 'unknown'})`)
      }
    } finally {
      // Consumer stopped early
      if (!completed) {
        proc.kill()
      }
    }
  }

  async wait(containerId: string): Promise<number> {
    let stdout: string
    try {
      ({stdout} = await this.docker(['wait', containerId]))
    } catch (error) {
      throw new DockerError('CONTAINER_WAIT_FAILED', `Failed to wait for container ${containerId}`, {cause: error})
    }

    const exitCode = Number.parseInt(stdout.trim(), 10)
    if (Number.isNaN(exitCode)) {
      throw new DockerError('CONTAINER_WAIT_FAILED', `Unexpected exit status for container ${containerId}: "${stdout}"`)
    }

    return exitCode
  }

  async remove(containerId: string): Promise<void> {
    try {
      await this.docker(['rm', '--volumes', containerId])
    } catch (error) {
      throw new ContainerCleanupError(containerId, {cause: error})
    }
  }

  private async docker(args: string[]): Promise<{stdout: string}> {
    const {stdout} = await execa(this.binary, args, {env: this.env, extendEnv: false})
    return {stdout}
  }
}
