import { describe, expect, it } from 'vitest'
import { MetadataError } from '../../../../src/core/errors.ts'
import { Transport } from '../../../../src/core/transport.ts'
import { MetadataApi } from '../../../../src/domains/metadata/metadata.api.ts'
import { createFetchMock, TEST_CONFIG } from '../../../helpers/index.ts'

function createApi() {
  const fetchMock = createFetchMock()
  const transport = new Transport({ timeoutInMilliseconds: 1000, fetchImplementation: fetchMock.fetch })
  return { fetchMock, api: new MetadataApi({ transport }) }
}

describe('MetadataApi', () => {
  const url = TEST_CONFIG.metadataFolderUrl

  it('GETs the URL with the Metadata-Flavor header', async () => {
    const { fetchMock, api } = createApi()
    fetchMock.pushText(TEST_CONFIG.folderId)

    await api.fetch(url)

    const [call] = fetchMock.calls
    expect(call?.url).toBe(url)
    expect(call?.init?.method).toBe('GET')
    expect(call?.headers.get('metadata-flavor')).toBe('Google')
  })

  it('returns the raw body', async () => {
    const { fetchMock, api } = createApi()
    fetchMock.pushText(TEST_CONFIG.folderId)

    const body = await api.fetch(url)

    expect(body.toString('utf8')).toBe(TEST_CONFIG.folderId)
  })

  it.each([404, 500, 503])('rejects status %i with an error naming URL and status', async (status) => {
    const { fetchMock, api } = createApi()
    fetchMock.pushText('nope', { status })

    const error = await api.fetch(url).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(MetadataError)
    expect(error).toMatchObject({ kind: 'unreachable', url, statusCode: status })
    expect(error).toHaveProperty('message', `unable to fetch instance metadata: [${url}] ${status}`)
  })

  it('propagates connection failures unchanged', async () => {
    const { fetchMock, api } = createApi()
    const refused = new TypeError('fetch failed')
    fetchMock.push(refused)

    await expect(api.fetch(url)).rejects.toBe(refused)
  })
})
