import {stat} from 'node:fs/promises'
import {basename} from 'node:path'
import {SubmissionError} from '../errors.js'
import type {IntegrityEntry, Job, OutputArtifactRecord, OutputExpectation} from '../types.js'
import type {Logger} from './logger.js'
import {isSuccess, type Coordinator, type MultipartBody} from './transport.js'
import {sha1, sha1File, splitFileName} from './utils.js'

/**
 * Everything sent with one result submission.
 */
export type SubmissionManifest = {
  /** Upload route (the first declared output expectation) */
  route: string;
  records: OutputArtifactRecord[];
  integrity: IntegrityEntry[];
  /** Serialized `records`, sent as the `metadata` field */
  metadata: string;
  /** Serialized `integrity`, sent as the `sha` field */
  sha: string;
  body: MultipartBody;
}

export type SubmissionReceipt = {
  manifest: SubmissionManifest;
  acknowledgement: unknown;
}

/** Names of the text parts sent after the files. */
const textFields = new Set(['metadata', 'sha'])

/**
 * Keys output expectations by extension. The first expectation declared for an
 * extension wins.
 */
export function buildExpectationTable(outputs: OutputExpectation[]): Map<string, OutputExpectation> {
  const table = new Map<string, OutputExpectation>()
  for (const expectation of outputs) {
    if (!table.has(expectation.payload.fext)) {
      table.set(expectation.payload.fext, expectation)
    }
  }

  return table
}

/**
 * Classifies, hashes and uploads the files a job produced, in one multipart PUT.
 *
 * Each file gets an {@link OutputArtifactRecord} labelled from the expectation
 * matching its extension (`null` labels when none matches; the file is still
 * uploaded). The `sha` field lists every file digest followed by
 * `{metadata: sha1(<metadata field>)}`.
 */
export class ResultSubmitter {
  private readonly log: Logger

  constructor(
    private readonly coordinator: Coordinator,
    logger: Logger
  ) {
    this.log = logger.child({module: 'result-submitter'})
  }

  /**
   * Builds the submission for `files` without sending it.
   * @throws {SubmissionError} If the job declares no output route
   */
  async prepare(job: Job, files: string[]): Promise<SubmissionManifest> {
    const [firstOutput] = job.outputs
    if (!firstOutput) {
      throw new SubmissionError(`Job ${job.id} declares no output route`)
    }

    const table = buildExpectationTable(job.outputs)
    const records: OutputArtifactRecord[] = []
    const integrity: IntegrityEntry[] = []
    const body: MultipartBody = {files: [], fields: []}

    for (const file of files) {
      const fileName = basename(file)
      const {stem, ext} = splitFileName(fileName)
      const digest = await sha1File(file)
      const {size} = await stat(file)

      const labels = table.get(ext)?.payload
      if (labels) {
        this.log.debug({kinds: labels.kinds, state: labels.state, type: labels.type}, `${fileName} matched ${ext}`)
      } else {
        this.log.warn(`${fileName} extension did not match an expected output`)
      }

      records.push({
        name: stem,
        ext,
        kinds: labels?.kinds ?? null,
        state: labels?.state ?? null,
        type: labels?.type ?? null,
        sha1: digest,
        size,
        flavor: 'file'
      })
      integrity.push({name: stem + ext, sha1: digest})
      if (textFields.has(fileName)) {
        this.log.warn(`output file ${fileName} has the same part name as the ${fileName} field`)
      }

      body.files.push({field: fileName, path: file, filename: fileName, contentType: 'application/octet-stream'})
    }

    const metadata = JSON.stringify(records)
    integrity.push({metadata: sha1(metadata)})
    const sha = JSON.stringify(integrity)
    body.fields.push(['metadata', metadata], ['sha', sha])

    return {route: firstOutput.url, records, integrity, metadata, sha, body}
  }

  /**
   * @throws {SubmissionError} If the coordinator rejects the upload
   */
  async submit(job: Job, files: string[]): Promise<SubmissionReceipt> {
    this.log.debug('constructing multipart/form-data upload')
    const manifest = await this.prepare(job, files)
    this.log.info({metadata: manifest.metadata, sha: manifest.sha}, `uploading ${files.length} file(s) to ${manifest.route}`)

    const reply = await this.coordinator.putMultipart(manifest.route, manifest.body)
    if (!isSuccess(reply.status)) {
      throw new SubmissionError(`Submission to ${manifest.route} failed: ${reply.status}, ${reply.reason}`)
    }

    return {manifest, acknowledgement: reply.body}
  }
}
