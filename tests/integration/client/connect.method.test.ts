import { beforeEach, describe, expect, it } from 'vitest'
import { MetadataError } from '../../../src/core/errors.ts'
import {
  createFetchMock,
  createTestOutput,
  TEST_CONFIG,
  type TFetchMock,
} from '../../helpers/index.ts'

describe('connect() method', () => {
  let fetchMock: TFetchMock

  beforeEach(() => {
    fetchMock = createFetchMock()
  })

  it('fetches the folder id with the metadata header', async () => {
    const { output } = createTestOutput(fetchMock)
    fetchMock.pushText(TEST_CONFIG.folderId)

    await output.connect()

    expect(fetchMock.calls).toHaveLength(1)
    expect(fetchMock.calls[0]?.url).toBe(TEST_CONFIG.metadataFolderUrl)
    expect(fetchMock.calls[0]?.headers.get('metadata-flavor')).toBe('Google')
  })

  it('logs the endpoint and folder id', async () => {
    const { output, logger } = createTestOutput(fetchMock)
    fetchMock.pushText(TEST_CONFIG.folderId)

    await output.connect()

    expect(logger.debug).toHaveBeenCalledWith(
      `Getting folder ID in ${TEST_CONFIG.metadataFolderUrl}`,
    )
    expect(logger.info).toHaveBeenCalledWith(
      `Writing to Yandex.Cloud Monitoring URL: ${TEST_CONFIG.endpoint}`,
    )
    expect(logger.info).toHaveBeenCalledWith(`FolderID: ${TEST_CONFIG.folderId}`)
  })

  it('reuses the folder id on later calls', async () => {
    const { output } = createTestOutput(fetchMock)
    fetchMock.pushText(TEST_CONFIG.folderId)

    await output.connect()
    await output.connect()

    expect(fetchMock.calls).toHaveLength(1)
  })

  it('fails on an empty folder id even though the request succeeded', async () => {
    const { output } = createTestOutput(fetchMock)
    fetchMock.pushText('')

    const error = await output.connect().catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(MetadataError)
    expect(error).toMatchObject({ kind: 'malformed', url: TEST_CONFIG.metadataFolderUrl })
  })

  it('fails when the metadata service answers with an error status', async () => {
    const { output } = createTestOutput(fetchMock)
    fetchMock.pushText('not found', { status: 404 })

    await expect(output.connect()).rejects.toMatchObject({
      kind: 'unreachable',
      statusCode: 404,
    })
  })

  it('propagates a refused connection unchanged', async () => {
    const { output } = createTestOutput(fetchMock)
    const refused = new TypeError('fetch failed')
    fetchMock.push(refused)

    await expect(output.connect()).rejects.toBe(refused)
  })
})
