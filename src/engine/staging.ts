import {mkdir, mkdtemp, readdir, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {StagingError} from '../errors.js'
import type {BindMount} from './types.js'

/**
 * Ephemeral working directory owned by one job iteration.
 *
 * Layout:
 * - **input/**: artifacts downloaded from the coordinator (mounted as `/input`)
 * - **output/**: files produced by the container (mounted as `/output`)
 * - **meta/input/**, **meta/output/**: side-channel metadata (mounted as `/meta`)
 *
 * The area lives for exactly one execute-and-collect phase. Use
 * {@link withStagingArea} so it is removed on every exit path.
 *
 * @example
 * ```typescript
 * const outputs = await withStagingArea(undefined, async area => {
 *   // ... stage inputs, run the container ...
 *   return area.listOutputs()
 * })
 * ```
 */
export class StagingArea {
  /**
   * Creates a fresh staging area with its fixed subdirectories.
   * @param root - Parent directory (defaults to the OS temp dir)
   */
  static async create(root?: string): Promise<StagingArea> {
    const parent = root ?? tmpdir()
    let path: string
    try {
      await mkdir(parent, {recursive: true})
      path = await mkdtemp(join(parent, 'job-'))
    } catch (error) {
      throw new StagingError(`Cannot create staging area under ${parent}`, {cause: error})
    }

    const area = new StagingArea(path)
    try {
      await mkdir(area.inputPath)
      await mkdir(area.outputPath)
      await mkdir(area.metaInputPath, {recursive: true})
      await mkdir(area.metaOutputPath)
    } catch (error) {
      await area.remove()
      throw new StagingError(`Cannot prepare staging area ${path}`, {cause: error})
    }

    return area
  }

  private constructor(readonly root: string) {}

  get inputPath(): string {
    return join(this.root, 'input')
  }

  get outputPath(): string {
    return join(this.root, 'output')
  }

  get metaPath(): string {
    return join(this.root, 'meta')
  }

  get metaInputPath(): string {
    return join(this.metaPath, 'input')
  }

  get metaOutputPath(): string {
    return join(this.metaPath, 'output')
  }

  /**
   * Host-to-container mounts for this area. `/scratch` is always read-only,
   * `/input`, `/output` and `/meta` are always read-write.
   * @param scratchPath - Host directory mounted at `/scratch`
   */
  bindings(scratchPath: string): BindMount[] {
    return [
      {hostPath: scratchPath, containerPath: '/scratch', readOnly: true},
      {hostPath: this.inputPath, containerPath: '/input', readOnly: false},
      {hostPath: this.outputPath, containerPath: '/output', readOnly: false},
      {hostPath: this.metaPath, containerPath: '/meta', readOnly: false}
    ]
  }

  /**
   * Writes a JSON document under `meta/input/`, visible to the container at `/meta/input/<name>`.
   */
  async writeMeta(name: string, document: unknown): Promise<string> {
    const path = join(this.metaInputPath, name)
    await writeFile(path, JSON.stringify(document, null, 2) + '\n', 'utf8')
    return path
  }

  /**
   * Lists the files produced in `output/`: regular files only, dot-files
   * excluded, sorted by name.
   * @returns Absolute paths
   */
  async listOutputs(): Promise<string[]> {
    const entries = await readdir(this.outputPath, {withFileTypes: true})
    return entries
      .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
      .map(entry => entry.name)
      .sort()
      .map(name => join(this.outputPath, name))
  }

  /**
   * Recursively deletes the area. Safe to call more than once.
   */
  async remove(): Promise<void> {
    await rm(this.root, {recursive: true, force: true})
  }
}

/**
 * Runs `fn` inside a fresh staging area and removes the area afterwards,
 * whether `fn` resolves or throws.
 */
export async function withStagingArea<T>(root: string | undefined, fn: (area: StagingArea) => Promise<T>): Promise<T> {
  const area = await StagingArea.create(root)
  try {
    return await fn(area)
  } finally {
    await area.remove()
  }
}
