import { DeliveryError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'
import type { TTokenProvider, TTransportResponse } from '../../core/types.ts'
import type { TBatch } from './types.ts'

export type TMetricsApiOptions = {
  transport: Transport
  tokenProvider: TTokenProvider
  endpoint: string
  service: string
}

/** Thin HTTP client over the data/write endpoint. One POST per batch, no retries. */
export class MetricsApi {
  private readonly transport: Transport
  private readonly tokenProvider: TTokenProvider
  private readonly endpoint: string
  private readonly service: string

  constructor(options: TMetricsApiOptions) {
    this.transport = options.transport
    this.tokenProvider = options.tokenProvider
    this.endpoint = options.endpoint
    this.service = options.service
  }

  /**
   * Sends the batch to `folderId`.
   * Credential failures propagate before any request is made; everything after
   * that is reported as a {@link DeliveryError}.
   */
  public async publish(batch: TBatch, folderId: string, nowMs: number = Date.now()): Promise<void> {
    const body = `${JSON.stringify(batch)}\n`
    const bearerToken = await this.tokenProvider.ensureValid(nowMs)

    let response: TTransportResponse
    try {
      response = await this.transport.request('POST', this.endpoint, {
        queryString: { folderId, service: this.service },
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${bearerToken}`,
        },
        body,
      })
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      throw new DeliveryError(`failed to write batch: ${detail}`, { cause: error })
    }

    if (response.status < 200 || response.status > 299) {
      throw new DeliveryError(
        `failed to write batch: [${response.status}] ${response.statusText}`,
        { statusCode: response.status, statusText: response.statusText },
      )
    }
  }
}
