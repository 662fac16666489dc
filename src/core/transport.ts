import {createReadStream} from 'node:fs'
import {Agent} from 'node:https'
import {basename} from 'node:path'
import type {Readable} from 'node:stream'
import axios, {isAxiosError, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse} from 'axios'
import FormData from 'form-data'
import {CoordinatorUnavailableError} from '../errors.js'

/**
 * Status line and parsed body of a coordinator response.
 * `body` is the decoded JSON value, or the raw text when the body is not JSON.
 */
export type CoordinatorReply = {
  status: number;
  reason: string;
  body: unknown;
}

/**
 * Streamed file response. The stream must be consumed or destroyed by the caller.
 */
export type CoordinatorDownload = {
  status: number;
  reason: string;
  /** Base name taken from `Content-Disposition`, if the header names one */
  filename?: string;
  content: Readable;
}

export type FilePart = {
  field: string;
  path: string;
  filename: string;
  contentType: string;
}

/**
 * Multipart body: file parts first (streamed from disk), then text fields, in order.
 */
export type MultipartBody = {
  files: FilePart[];
  fields: Array<[name: string, value: string]>;
}

/**
 * Authenticated access to the coordinator API. Routes are relative to the API root.
 *
 * Implementations never throw on HTTP status: callers classify the reply.
 * Network-level failures throw {@link CoordinatorUnavailableError}.
 */
export type Coordinator = {
  get(route: string, payload?: unknown): Promise<CoordinatorReply>;
  put(route: string, payload: unknown): Promise<CoordinatorReply>;
  putMultipart(route: string, body: MultipartBody): Promise<CoordinatorReply>;
  download(route: string, payload?: unknown): Promise<CoordinatorDownload>;
}

export type CoordinatorClientOptions = {
  /** API root, e.g. `https://coordinator.example.com/api` */
  apiUrl: string;
  /** Identifier sent in the User-Agent header */
  engineId: string;
  /** PEM bundle holding the client certificate and its key */
  certificate?: string | Buffer;
  /** Verify the coordinator's TLS certificate (default: true) */
  verify?: boolean;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

/**
 * Extracts the file name from a `Content-Disposition: attachment; filename=<name>` header.
 * Only the base name is kept.
 */
export function parseContentDisposition(header: string | undefined): string | undefined {
  if (!header) {
    return undefined
  }

  const match = /filename=(?:"([^"]*)"|([^;]*))/i.exec(header)
  const raw = (match?.[1] ?? match?.[2])?.trim()
  if (!raw) {
    return undefined
  }

  const name = basename(raw.replaceAll('\\', '/'))
  if (!name || name === '.' || name === '..') {
    return undefined
  }

  return name
}

/**
 * Request options sending `payload` as a JSON body. `undefined` sends no body.
 */
function jsonBody(payload: unknown): AxiosRequestConfig {
  if (payload === undefined) {
    return {}
  }

  return {data: JSON.stringify(payload), headers: {'Content-Type': 'application/json'}}
}

/**
 * HTTP client for the coordinator, built on axios.
 *
 * Every request carries `User-Agent: Job Engine <engine-id>`, the client
 * certificate (when configured) and the TLS verification policy.
 */
export class CoordinatorClient implements Coordinator {
  private readonly http: AxiosInstance

  constructor(options: CoordinatorClientOptions) {
    const {certificate} = options
    this.http = axios.create({
      baseURL: options.apiUrl,
      headers: {'User-Agent': `Job Engine ${options.engineId}`},
      httpsAgent: new Agent({
        cert: certificate,
        key: certificate,
        rejectUnauthorized: options.verify ?? true
      }),
      validateStatus: () => true,
      maxBodyLength: Number.POSITIVE_INFINITY,
      maxContentLength: Number.POSITIVE_INFINITY
    })
  }

  async get(route: string, payload?: unknown): Promise<CoordinatorReply> {
    const response = await this.request(route, {method: 'get', ...jsonBody(payload)})
    return toReply(response)
  }

  async put(route: string, payload: unknown): Promise<CoordinatorReply> {
    const response = await this.request(route, {method: 'put', ...jsonBody(payload)})
    return toReply(response)
  }

  async putMultipart(route: string, body: MultipartBody): Promise<CoordinatorReply> {
    const form = new FormData()
    for (const file of body.files) {
      form.append(file.field, createReadStream(file.path), {filename: file.filename, contentType: file.contentType})
    }

    for (const [name, value] of body.fields) {
      form.append(name, value)
    }

    const response = await this.request(route, {method: 'put', data: form, headers: form.getHeaders()})
    return toReply(response)
  }

  async download(route: string, payload?: unknown): Promise<CoordinatorDownload> {
    const response = await this.request<Readable>(route, {method: 'get', ...jsonBody(payload), responseType: 'stream'})
    const disposition = response.headers['content-disposition']
    return {
      status: response.status,
      reason: response.statusText,
      filename: parseContentDisposition(typeof disposition === 'string' ? disposition : undefined),
      content: response.data
    }
  }

  private async request<T = unknown>(route: string, config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    try {
      return await this.http.request<T>({...config, url: route})
    } catch (error) {
      // A request was sent and no response came back
      if (isAxiosError(error) && error.request !== undefined && error.response === undefined) {
        throw new CoordinatorUnavailableError(route, {cause: error})
      }

      throw error
    }
  }
}

function toReply(response: AxiosResponse<unknown>): CoordinatorReply {
  return {status: response.status, reason: response.statusText, body: response.data}
}
