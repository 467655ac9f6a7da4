import { MetadataError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'

const METADATA_FLAVOR_HEADER = 'Metadata-Flavor'
const METADATA_FLAVOR = 'Google'

export type TMetadataApiOptions = {
  transport: Transport
}

/**
 * Low-level client for the link-local instance-metadata service.
 * One GET per call, no retries, no caching.
 */
export class MetadataApi {
  private readonly transport: Transport

  constructor(options: TMetadataApiOptions) {
    this.transport = options.transport
  }

  /**
   * Returns the raw response body of `url`.
   * A non-2xx status is a {@link MetadataError}; network failures propagate unchanged.
   */
  async fetch(url: string): Promise<Buffer> {
    const response = await this.transport.request('GET', url, {
      headers: { [METADATA_FLAVOR_HEADER]: METADATA_FLAVOR },
    })

    if (response.status < 200 || response.status >= 300) {
      throw new MetadataError(`unable to fetch instance metadata: [${url}] ${response.status}`, {
        kind: 'unreachable',
        url,
        statusCode: response.status,
      })
    }

    return response.body
  }
}
