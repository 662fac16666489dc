import {JobFormatError} from '../errors.js'
import type {AppRef, InputDescriptor, Job, OutputExpectation, OutputLabels} from '../types.js'

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function label(value: unknown): unknown {
  return value === undefined ? null : value
}

/**
 * Splits an application reference into image name and tag.
 * The tag follows the last `:` after the last `/` (a registry port is not a tag);
 * a reference without one gets `latest`.
 */
export function splitAppRef(reference: string): AppRef {
  const slash = reference.lastIndexOf('/')
  const colon = reference.lastIndexOf(':')
  if (colon > slash) {
    return {id: reference, name: reference.slice(0, colon), tag: reference.slice(colon + 1)}
  }

  return {id: reference, name: reference, tag: 'latest'}
}

/**
 * Validates a job document sent by the coordinator and normalizes it.
 *
 * Required: `_id` (string or number), `app._id`, `inputs` and `outputs` arrays.
 * Output labels are kept as sent; missing ones become `null`.
 *
 * @throws {JobFormatError} If the document does not describe a job
 */
export function parseJob(document: unknown): Job {
  if (!isObject(document)) {
    throw new JobFormatError('Job document must be a JSON object')
  }

  const {_id: rawId} = document
  if (typeof rawId !== 'string' && !(typeof rawId === 'number' && Number.isFinite(rawId))) {
    throw new JobFormatError('Job document has no _id')
  }

  const id = String(rawId)

  const {app} = document
  if (!isObject(app) || typeof app._id !== 'string' || !app._id) {
    throw new JobFormatError(`Job ${id}: app._id is required`)
  }

  const {inputs, outputs, project} = document
  if (!Array.isArray(inputs)) {
    throw new JobFormatError(`Job ${id}: inputs must be an array`)
  }

  if (!Array.isArray(outputs)) {
    throw new JobFormatError(`Job ${id}: outputs must be an array`)
  }

  return {
    id,
    group: typeof document.group === 'string' ? document.group : '',
    project: {
      id: isObject(project) && typeof project._id === 'string' ? project._id : undefined,
      name: isObject(project) && typeof project.name === 'string' ? project.name : ''
    },
    app: splitAppRef(app._id),
    inputs: inputs.map((input, index) => parseInput(id, input, index)),
    outputs: outputs.map((output, index) => parseOutput(id, output, index)),
    document
  }
}

function parseInput(jobId: string, input: unknown, index: number): InputDescriptor {
  if (!isObject(input) || typeof input.url !== 'string' || !input.url) {
    throw new JobFormatError(`Job ${jobId}: inputs[${index}].url is required`)
  }

  return {url: input.url, payload: input.payload}
}

function parseOutput(jobId: string, output: unknown, index: number): OutputExpectation {
  if (!isObject(output) || typeof output.url !== 'string' || !output.url) {
    throw new JobFormatError(`Job ${jobId}: outputs[${index}].url is required`)
  }

  const {payload} = output
  if (!isObject(payload) || typeof payload.fext !== 'string') {
    throw new JobFormatError(`Job ${jobId}: outputs[${index}].payload.fext is required`)
  }

  const labels: OutputLabels = {
    fext: payload.fext,
    kinds: label(payload.kinds),
    state: label(payload.state),
    type: label(payload.type)
  }

  return {url: output.url, payload: labels}
}

/**
 * Short description of a job for log lines: `<id> - <app> - <group>/<project>`.
 */
export function describeJob(job: Job): string {
  return `${job.id} - ${job.app.id} - ${job.group}/${job.project.name}`
}
