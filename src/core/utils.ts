import {createHash} from 'node:crypto'
import {createReadStream} from 'node:fs'
import {basename, extname} from 'node:path'

/** Read size used when hashing files. */
export const hashChunkSize = 2 ** 20

const doubleSuffixes = ['.nii.gz']

/**
 * Splits a file name into stem and extension.
 * `.nii.gz` is one extension (`scan.nii.gz` → `scan` + `.nii.gz`);
 * any other name splits on its last suffix, as `path.extname` does.
 */
export function splitFileName(fileName: string): {stem: string; ext: string} {
  const name = basename(fileName)
  for (const suffix of doubleSuffixes) {
    if (name.endsWith(suffix)) {
      return {stem: name.slice(0, -suffix.length), ext: suffix}
    }
  }

  const ext = extname(name)
  return {stem: name.slice(0, name.length - ext.length), ext}
}

export function sha1(content: string | Uint8Array): string {
  return createHash('sha1').update(content).digest('hex')
}

/**
 * SHA-1 hex digest of a file, read in chunks of {@link hashChunkSize} bytes.
 */
export async function sha1File(path: string, chunkSize = hashChunkSize): Promise<string> {
  const hash = createHash('sha1')
  for await (const chunk of createReadStream(path, {highWaterMark: chunkSize})) {
    hash.update(chunk)
  }

  return hash.digest('hex')
}

/**
 * Space-joined form of a command, as shown in logs.
 */
export function formatCommand(cmd: string[]): string {
  return cmd.join(' ')
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}
