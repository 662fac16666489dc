/**
 * Bind mount of a host directory into the container.
 */
export type BindMount = {
  /** Absolute path on the host */
  hostPath: string;
  /** Absolute path in the container */
  containerPath: string;
  readOnly: boolean;
}

/**
 * Locally available image, with every `name:tag` reference pointing at it.
 */
export type ImageSummary = {
  id: string;
  repoTags: string[];
}

/**
 * Request to create a container.
 */
export type CreateContainerRequest = {
  /** Image reference or local image ID */
  image: string;
  /** Arguments passed to the image entrypoint */
  cmd: string[];
  mounts: BindMount[];
  /** Labels attached to the container (e.g., `{'job-engine.job': '42'}`) */
  labels?: Record<string, string>;
}
