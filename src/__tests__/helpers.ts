import {mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {Readable} from 'node:stream'
import {createLogger, type Logger} from '../core/logger.js'
import type {Coordinator, CoordinatorDownload, CoordinatorReply, MultipartBody} from '../core/transport.js'
import {ContainerExecutor} from '../engine/executor.js'
import {CoordinatorUnavailableError} from '../errors.js'
import type {CreateContainerRequest, ImageSummary} from '../engine/types.js'
import type {Job} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'job-engine-test-'))
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = createLogger({level: 'silent'})

export type LogEntry = {
  level: number;
  msg: string;
  module?: string;
  [key: string]: unknown;
}

/**
 * Returns a debug-level logger that records every entry for assertions.
 */
export function recordingLogger(): {logger: Logger; entries: LogEntry[]} {
  const entries: LogEntry[] = []
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(line: string) {
        entries.push(JSON.parse(line) as LogEntry)
      }
    }
  })

  return {logger, entries}
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: '42',
    group: 'lab',
    project: {name: 'study'},
    app: {id: 'acme/convert:1.0', name: 'acme/convert', tag: '1.0'},
    inputs: [],
    outputs: [],
    document: {_id: 42},
    ...overrides
  }
}

export type RecordedCall =
  | {method: 'get'; route: string; payload?: unknown}
  | {method: 'put'; route: string; payload: unknown}
  | {method: 'putMultipart'; route: string; body: MultipartBody}
  | {method: 'download'; route: string; payload?: unknown}

export type RecordedUpload = {
  route: string;
  body: MultipartBody;
  /** File part contents, read when the upload was sent */
  contents: Map<string, Buffer>;
}

export type FakeFile = {
  filename?: string;
  content?: string | Buffer;
  status?: number;
  reason?: string;
}

/**
 * In-memory coordinator.
 *
 * - `jobs/next` returns queued job documents one by one, then `''`
 * - `apps` answers `appsStatus`
 * - downloads are served from `files`, keyed by route
 * - `jobs/<id>` updates answer `reportStatus`
 * - multipart uploads answer `uploadStatus`
 */
export class FakeCoordinator implements Coordinator {
  readonly calls: RecordedCall[] = []
  readonly uploads: RecordedUpload[] = []
  readonly files = new Map<string, FakeFile>()
  readonly queue: unknown[] = []
  nextStatus = 200
  appsStatus = 404
  reportStatus = 200
  uploadStatus = 200
  unreachable = false

  async get(route: string, payload?: unknown): Promise<CoordinatorReply> {
    this.calls.push({method: 'get', route, payload})
    this.assertReachable(route)
    if (route === 'jobs/next') {
      return {status: this.nextStatus, reason: this.nextStatus === 200 ? 'OK' : 'Service Unavailable', body: this.queue.shift() ?? ''}
    }

    if (route === 'apps') {
      return {status: this.appsStatus, reason: this.appsStatus === 200 ? 'OK' : 'Not Found', body: ''}
    }

    return {status: 404, reason: 'Not Found', body: ''}
  }

  async put(route: string, payload: unknown): Promise<CoordinatorReply> {
    this.calls.push({method: 'put', route, payload})
    this.assertReachable(route)
    return {status: this.reportStatus, reason: this.reportStatus === 200 ? 'OK' : 'Internal Server Error', body: {acknowledged: true}}
  }

  async putMultipart(route: string, body: MultipartBody): Promise<CoordinatorReply> {
    this.calls.push({method: 'putMultipart', route, body})
    this.assertReachable(route)
    const contents = new Map<string, Buffer>()
    for (const file of body.files) {
      contents.set(file.field, await readFile(file.path))
    }

    this.uploads.push({route, body, contents})
    return {status: this.uploadStatus, reason: this.uploadStatus === 200 ? 'OK' : 'Bad Request', body: {uploaded: body.files.length}}
  }

  async download(route: string, payload?: unknown): Promise<CoordinatorDownload> {
    this.calls.push({method: 'download', route, payload})
    this.assertReachable(route)
    const file = this.files.get(route)
    if (!file) {
      return {status: 404, reason: 'Not Found', content: Readable.from([Buffer.from('no such file')])}
    }

    return {
      status: file.status ?? 200,
      reason: file.reason ?? 'OK',
      filename: file.filename,
      content: Readable.from([Buffer.from(file.content ?? '')])
    }
  }

  routes(method: RecordedCall['method']): string[] {
    return this.calls.filter(call => call.method === method).map(call => call.route)
  }

  private assertReachable(route: string): void {
    if (this.unreachable) {
      throw new CoordinatorUnavailableError(route)
    }
  }
}

/**
 * In-memory container runtime.
 *
 * `behavior` runs when a container starts; it receives the host path of each
 * container mount point so it can write outputs like a real container would.
 */
export class FakeExecutor extends ContainerExecutor {
  readonly created: CreateContainerRequest[] = []
  readonly started: string[] = []
  readonly removed: string[] = []
  images: ImageSummary[] = []
  exitCode = 0
  logLines: string[] = []
  createError?: Error
  behavior?: (mounts: Map<string, string>, request: CreateContainerRequest) => Promise<void>

  async check(): Promise<void> {
    // Always available
  }

  async listImages(name: string): Promise<ImageSummary[]> {
    return this.images.filter(image => image.repoTags.some(tag => tag.startsWith(`${name}:`)))
  }

  async create(request: CreateContainerRequest): Promise<string> {
    if (this.createError) {
      throw this.createError
    }

    this.created.push(request)
    return `container-${this.created.length}`
  }

  async start(containerId: string): Promise<void> {
    this.started.push(containerId)
    const request = this.requestOf(containerId)
    if (this.behavior) {
      const mounts = new Map(request.mounts.map(mount => [mount.containerPath, mount.hostPath]))
      await this.behavior(mounts, request)
    }
  }

  async * logs(_containerId: string): AsyncIterable<string> {
    for (const line of this.logLines) {
      yield line
    }
  }

  async wait(_containerId: string): Promise<number> {
    return this.exitCode
  }

  async remove(containerId: string): Promise<void> {
    this.removed.push(containerId)
  }

  private requestOf(containerId: string): CreateContainerRequest {
    const index = Number(containerId.replace('container-', '')) - 1
    const request = this.created[index]
    if (!request) {
      throw new Error(`unknown container ${containerId}`)
    }

    return request
  }
}

/**
 * Container behavior writing `files` (name → content) into `/output`.
 */
export function writesOutputs(files: Record<string, string>): (mounts: Map<string, string>) => Promise<void> {
  return async mounts => {
    const output = mounts.get('/output')
    if (!output) {
      throw new Error('no /output mount')
    }

    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(output, name), content)
    }
  }
}
