import { describe, expect, it } from 'vitest'
import {
  DEFAULT_ENDPOINT,
  DEFAULT_METADATA_FOLDER_URL,
  DEFAULT_METADATA_TOKEN_URL,
  MAX_TIMEOUT_MS,
  optionsFromEnv,
  resolveEndpointConfig,
} from '../../../src/core/config.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'

describe('resolveEndpointConfig', () => {
  it('applies the documented defaults', () => {
    expect(resolveEndpointConfig()).toEqual({
      timeoutMs: 20_000,
      endpoint: 'https://monitoring.api.cloud.yandex.net/monitoring/v2/data/write',
      service: 'custom',
      metadataTokenUrl:
        'http://169.254.169.254/computeMetadata/v1/instance/service-accounts/default/token',
      metadataFolderUrl: 'http://169.254.169.254/computeMetadata/v1/instance/vendor/folder-id',
    })
  })

  it('treats empty strings as unset', () => {
    const config = resolveEndpointConfig({ endpoint: '', service: '' })

    expect(config.endpoint).toBe(DEFAULT_ENDPOINT)
    expect(config.service).toBe('custom')
    expect(config.metadataTokenUrl).toBe(DEFAULT_METADATA_TOKEN_URL)
    expect(config.metadataFolderUrl).toBe(DEFAULT_METADATA_FOLDER_URL)
  })

  it('accepts a timeout in milliseconds or as a duration string', () => {
    expect(resolveEndpointConfig({ timeout: 1500 }).timeoutMs).toBe(1500)
    expect(resolveEndpointConfig({ timeout: '1m30s' }).timeoutMs).toBe(90_000)
  })

  it.each([0, -5, '0', '-1s'])('falls back to 20s for non-positive timeout %j', (timeout) => {
    expect(resolveEndpointConfig({ timeout }).timeoutMs).toBe(20_000)
  })

  it('rejects an unparseable timeout', () => {
    expect(() => resolveEndpointConfig({ timeout: 'soon' })).toThrow(ConfigurationError)
  })

  it.each([2_147_483_648, '1000h'])('rejects timeout %j beyond the timer limit', (timeout) => {
    expect(() => resolveEndpointConfig({ timeout })).toThrow(ConfigurationError)
  })

  it('accepts the largest timeout a timer can hold', () => {
    expect(resolveEndpointConfig({ timeout: MAX_TIMEOUT_MS }).timeoutMs).toBe(2_147_483_647)
  })

  it('rejects an invalid endpoint URL', () => {
    expect(() => resolveEndpointConfig({ endpoint: 'monitoring' })).toThrow(
      'Invalid endpoint: "monitoring"',
    )
  })

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveEndpointConfig({ service: 'app' }))).toBe(true)
  })
})

describe('optionsFromEnv', () => {
  it('maps CLOUD_MONITORING_* variables', () => {
    expect(
      optionsFromEnv({
        CLOUD_MONITORING_TIMEOUT: '30s',
        CLOUD_MONITORING_ENDPOINT: 'https://monitoring.example.com/write',
        CLOUD_MONITORING_SERVICE: 'app',
      }),
    ).toEqual({
      timeout: '30s',
      endpoint: 'https://monitoring.example.com/write',
      service: 'app',
    })
  })

  it('leaves unset and empty variables to the defaults', () => {
    expect(optionsFromEnv({ CLOUD_MONITORING_SERVICE: '' })).toEqual({})
  })

  it('reads the test environment loaded from .env.test', () => {
    const config = resolveEndpointConfig(optionsFromEnv())

    expect(config.endpoint).toBe('http://monitoring.test.local/monitoring/v2/data/write')
    expect(config.timeoutMs).toBe(5_000)
  })
})
