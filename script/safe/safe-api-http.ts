/**
 * JSON transport for the Safe Transaction Service.
 *
 * Status handling: anything below 400 and 422 are decoded; every other
 * status >= 400 is a SERVER_STATUS error. A decoded body matching
 * `{ code, message, arguments }` becomes a SafeApiError whatever its status.
 */

import { consola } from 'consola'

import {
  SafeApiError,
  SafeClientError,
  SafeClientErrorCode,
  getErrorMessage,
} from './safe-errors'
import { errorResponseSchema, type Schema } from './safe-schemas'

export type FetchLike = (
  input: string | URL,
  init?: RequestInit
) => Promise<Response>

type HttpMethod = 'GET' | 'POST'

const API_ERROR_STATUS = 422

interface IRawResponse {
  status: number
  text: string
}

export class SafeApiHttp {
  private readonly fetchFn: FetchLike

  public constructor(fetchFn?: FetchLike) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init))
  }

  /**
   * GET `url` with `query` appended and decode the body with `schema`
   */
  public async get<T>(
    url: URL | string,
    schema: Schema<T>,
    query: Record<string, string> = {}
  ): Promise<T> {
    const target = new URL(url)
    for (const [key, value] of Object.entries(query))
      target.searchParams.set(key, value)

    const raw = await this.send('GET', target)
    return this.decode('GET', target, raw, schema)
  }

  /**
   * POST `body` as JSON and decode the response with `schema`
   */
  public async post<T>(
    url: URL | string,
    body: unknown,
    schema: Schema<T>
  ): Promise<T> {
    const target = new URL(url)
    const raw = await this.send('POST', target, body)
    return this.decode('POST', target, raw, schema)
  }

  /**
   * POST `body` as JSON to an endpoint that answers success with no content
   */
  public async postWithoutContent(
    url: URL | string,
    body: unknown
  ): Promise<void> {
    const target = new URL(url)
    const raw = await this.send('POST', target, body)
    if (raw.text.trim() === '') return

    const json = this.parseJson('POST', target, raw)
    this.throwIfApiError('POST', target, raw, json)
    consola.debug(`POST ${target} answered with content, ignoring it`)
  }

  private async send(
    method: HttpMethod,
    url: URL,
    body?: unknown
  ): Promise<IRawResponse> {
    const init: RequestInit = {
      method,
      headers:
        body === undefined
          ? { accept: 'application/json' }
          : {
              accept: 'application/json',
              'content-type': 'application/json',
            },
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    }

    consola.debug(`Dispatching ${method} ${url}`)

    try {
      const response = await this.fetchFn(url, init)
      if (response.status >= 400 && response.status !== API_ERROR_STATUS) {
        // release the connection; the body is not read
        await response.body?.cancel()
        throw new SafeClientError(
          `Server Error ${response.status} for ${method} ${url}`,
          SafeClientErrorCode.SERVER_STATUS,
          { method, url: url.toString(), status: response.status }
        )
      }
      return { status: response.status, text: await response.text() }
    } catch (error) {
      if (error instanceof SafeClientError) throw error
      throw new SafeClientError(
        `${method} ${url} failed: ${getErrorMessage(error)}`,
        SafeClientErrorCode.TRANSPORT_FAILURE,
        { method, url: url.toString() },
        { cause: error }
      )
    }
  }

  private decode<T>(
    method: HttpMethod,
    url: URL,
    raw: IRawResponse,
    schema: Schema<T>
  ): T {
    const json = this.parseJson(method, url, raw)
    this.throwIfApiError(method, url, raw, json)

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      this.warnUnexpected(method, url, raw)
      throw new SafeClientError(
        `Unexpected response from server for ${method} ${url}: ${parsed.error.message}. Response: ${raw.text}`,
        SafeClientErrorCode.MALFORMED_RESPONSE,
        { method, url: url.toString(), status: raw.status }
      )
    }

    return parsed.data
  }

  private parseJson(method: HttpMethod, url: URL, raw: IRawResponse): unknown {
    try {
      return JSON.parse(raw.text)
    } catch (error) {
      this.warnUnexpected(method, url, raw)
      throw new SafeClientError(
        `Invalid JSON from server for ${method} ${url}: ${getErrorMessage(
          error
        )}. Response: ${raw.text}`,
        SafeClientErrorCode.MALFORMED_RESPONSE,
        { method, url: url.toString(), status: raw.status },
        { cause: error }
      )
    }
  }

  private throwIfApiError(
    method: HttpMethod,
    url: URL,
    raw: IRawResponse,
    json: unknown
  ): void {
    const apiError = errorResponseSchema.safeParse(json)
    if (apiError.success) {
      const { code, message, arguments: args } = apiError.data
      throw new SafeApiError(code, message, args)
    }

    // a 422 always carries a structured error
    if (raw.status === API_ERROR_STATUS) {
      this.warnUnexpected(method, url, raw)
      throw new SafeClientError(
        `Unexpected error body for ${method} ${url}. Response: ${raw.text}`,
        SafeClientErrorCode.MALFORMED_RESPONSE,
        { method, url: url.toString(), status: raw.status }
      )
    }
  }

  private warnUnexpected(method: HttpMethod, url: URL, raw: IRawResponse) {
    consola.warn('Unexpected response from server', {
      method,
      url: url.toString(),
      status: raw.status,
      response: raw.text,
    })
  }
}
