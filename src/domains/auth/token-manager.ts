import { MetadataError } from '../../core/errors.ts'
import { logger as defaultLogger } from '../../core/logger.ts'
import type { TLogger, TTokenProvider } from '../../core/types.ts'
import type { MetadataApi } from '../metadata/metadata.api.ts'
import type { TCredential, TMetadataTokenResponse } from './types.ts'

export type TTokenManagerOptions = {
  metadataApi: Pick<MetadataApi, 'fetch'>
  tokenUrl: string
  logger?: TLogger
}

/**
 * Holds the IAM token issued to the instance's service account.
 *
 * Refresh is lazy: the metadata service is only called from {@link ensureValid},
 * when no token is held or the held one has expired. There is no background timer.
 */
export class TokenManager implements TTokenProvider {
  private readonly metadataApi: Pick<MetadataApi, 'fetch'>
  private readonly tokenUrl: string
  private readonly logger: TLogger

  private cachedToken: TCredential | null = null

  constructor(options: TTokenManagerOptions) {
    this.metadataApi = options.metadataApi
    this.tokenUrl = options.tokenUrl
    this.logger = options.logger ?? defaultLogger
  }

  /** Returns a token valid at `nowMs`, refreshing it first when needed. */
  async ensureValid(nowMs: number = Date.now()): Promise<string> {
    if (this.cachedToken && nowMs < this.cachedToken.expiresAtMs) {
      return this.cachedToken.token
    }

    const { accessToken, expiresIn } = await this.fetchToken()
    this.cachedToken = {
      token: accessToken,
      expiresAtMs: nowMs + expiresIn * 1000,
    }
    return this.cachedToken.token
  }

  /** Current credential, if any. Exposed read-only for diagnostics. */
  get credential(): Readonly<TCredential> | null {
    return this.cachedToken
  }

  /** Drops the held token, forcing the next ensureValid() to fetch a fresh one. */
  clear(): void {
    this.cachedToken = null
  }

  private async fetchToken(): Promise<{ accessToken: string; expiresIn: number }> {
    this.logger.debug(`Getting new IAM token in ${this.tokenUrl}`)
    const body = await this.metadataApi.fetch(this.tokenUrl)

    let data: unknown
    try {
      data = JSON.parse(body.toString('utf8'))
    } catch (error) {
      throw new MetadataError(`unable to parse token response from ${this.tokenUrl}`, {
        kind: 'malformed',
        url: this.tokenUrl,
        cause: error,
      })
    }

    if (!isTokenResponse(data) || data.access_token === '' || data.expires_in <= 0) {
      throw new MetadataError(`unable to fetch authentication credentials ${this.tokenUrl}`, {
        kind: 'malformed',
        url: this.tokenUrl,
      })
    }

    return { accessToken: data.access_token, expiresIn: data.expires_in }
  }
}

function isTokenResponse(value: unknown): value is TMetadataTokenResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'expires_in' in value &&
    typeof value.expires_in === 'number' &&
    Number.isInteger(value.expires_in)
  )
}
