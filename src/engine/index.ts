export {StagingArea, withStagingArea} from './staging.js'
export {ContainerExecutor} from './executor.js'
export {DockerCliExecutor, type DockerCliExecutorOptions} from './docker-executor.js'
export type {BindMount, CreateContainerRequest, ImageSummary} from './types.js'
