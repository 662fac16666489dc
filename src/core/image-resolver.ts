import type {ContainerExecutor} from '../engine/index.js'
import type {Job} from '../types.js'
import type {Logger} from './logger.js'
import {isSuccess, type Coordinator} from './transport.js'

/**
 * Finds the local image to run for a job's application.
 *
 * A local image tagged with the exact `name:tag` reference wins. Otherwise the
 * coordinator's `apps` route is asked for a build context; building images from
 * it is not supported, so resolution then fails. Failure is reported as
 * `undefined`, never thrown.
 */
export class ImageResolver {
  private readonly log: Logger

  constructor(
    private readonly executor: ContainerExecutor,
    private readonly coordinator: Coordinator,
    logger: Logger
  ) {
    this.log = logger.child({module: 'image-resolver'})
  }

  async resolve(job: Job): Promise<string | undefined> {
    const {app} = job
    this.log.debug(`checking for existing docker image, ${app.id}`)

    const reference = `${app.name}:${app.tag}`
    try {
      const candidates = await this.executor.listImages(app.name)
      const match = candidates.find(image => image.repoTags.includes(reference))
      if (match) {
        this.log.debug(`docker image found. uid ${match.id}`)
        return match.id
      }
    } catch (error) {
      this.log.error({err: error}, `cannot list local images for ${app.name}`)
      return undefined
    }

    this.log.debug('docker image not found, requesting build context from API')
    try {
      const reply = await this.coordinator.get('apps')
      if (isSuccess(reply.status)) {
        this.log.warn(`building ${app.id} from its build context is not supported`)
      } else {
        this.log.debug(`build context unavailable (HTTP ${reply.status}: ${reply.reason})`)
      }
    } catch (error) {
      this.log.warn({err: error}, 'cannot request build context')
    }

    return undefined
  }
}
