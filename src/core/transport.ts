import { EnvHttpProxyAgent, type Dispatcher } from 'undici'
import { ConfigurationError, TimeoutError } from './errors.ts'
import { USER_AGENT } from './sdk-info.ts'
import type { THttpMethod, TRequestOptions, TTransportResponse } from './types.ts'
import { createTimeoutSignal, resolveFetch } from './utils.ts'

export type TTransportOptions = {
  timeoutInMilliseconds: number
  fetchImplementation?: typeof fetch | undefined
  /**
   * Connection pool used for every request. Defaults to an agent that honours
   * HTTP_PROXY, HTTPS_PROXY and NO_PROXY; that default is closed by {@link Transport.close}.
   */
  dispatcher?: Dispatcher | undefined
}

/**
 * Shared HTTP client for metadata and delivery calls.
 * Performs one attempt per request bounded by the timeout; status classification
 * is left to the caller, which knows what a failure means for its endpoint.
 */
export class Transport {
  private readonly timeoutInMilliseconds: number
  private readonly userAgent: string = USER_AGENT
  private readonly dispatcher: Dispatcher
  private readonly ownsDispatcher: boolean
  private fetchImplementation: typeof fetch | null

  constructor(options: TTransportOptions) {
    this.timeoutInMilliseconds = options.timeoutInMilliseconds
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
    this.ownsDispatcher = options.dispatcher === undefined
    this.dispatcher = options.dispatcher ?? new EnvHttpProxyAgent()
  }

  /**
   * Sends the request and reads the whole response body.
   * Network failures are rethrown as-is; an expired timeout becomes a {@link TimeoutError}.
   */
  async request(
    httpMethod: THttpMethod,
    url: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TTransportResponse> {
    const fetchImplementation = this.fetchImplementation
    if (!fetchImplementation) throw new ConfigurationError('Transport is closed')

    const urlObject: URL = new URL(url)
    if (requestOptions.queryString) {
      for (const [queryKey, queryValue] of Object.entries(requestOptions.queryString)) {
        if (queryValue !== undefined) urlObject.searchParams.set(queryKey, queryValue)
      }
    }

    const { signal, cleanup } = createTimeoutSignal(this.timeoutInMilliseconds)
    try {
      const httpResponse: Response = await fetchImplementation(urlObject, {
        method: httpMethod,
        headers: {
          'user-agent': this.userAgent,
          ...(requestOptions.headers ?? {}),
        },
        body: requestOptions.body,
        signal,
        dispatcher: this.dispatcher,
      } as RequestInit)
      const body = Buffer.from(await httpResponse.arrayBuffer())
      return { status: httpResponse.status, statusText: httpResponse.statusText, body }
    } catch (caughtError) {
      if (signal.aborted) {
        const target = `${urlObject.origin}${urlObject.pathname}`
        throw new TimeoutError(
          `${httpMethod} ${target} timed out after ${this.timeoutInMilliseconds}ms`,
        )
      }
      throw caughtError
    } finally {
      cleanup()
    }
  }

  /**
   * Drops the fetch reference and closes the default dispatcher once its
   * in-flight requests finish. Later requests fail with {@link ConfigurationError}.
   */
  async close(): Promise<void> {
    if (this.fetchImplementation === null) return
    this.fetchImplementation = null
    if (this.ownsDispatcher) await this.dispatcher.close()
  }

  get isClosed(): boolean {
    return this.fetchImplementation === null
  }
}
