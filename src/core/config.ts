import { ConfigurationError } from './errors.ts'
import { parseDuration, validateRequiredStrings, validateUrl } from './utils.ts'

export const DEFAULT_TIMEOUT_MS = 20_000
export const DEFAULT_ENDPOINT = 'https://monitoring.api.cloud.yandex.net/monitoring/v2/data/write'
export const DEFAULT_SERVICE = 'custom'
// The metadata service has no DNS name; only the link-local address is reserved for it.
export const DEFAULT_METADATA_TOKEN_URL =
  'http://169.254.169.254/computeMetadata/v1/instance/service-accounts/default/token'
export const DEFAULT_METADATA_FOLDER_URL =
  'http://169.254.169.254/computeMetadata/v1/instance/vendor/folder-id'

/** User-facing configuration. Every key is optional. */
export type TEndpointOptions = {
  /** Request timeout in milliseconds or as a duration string (`20s`, `1m30s`). @default 20s */
  timeout?: number | string
  /** Ingestion URL. @default Yandex Cloud Monitoring data/write */
  endpoint?: string
  /** Value of the `service` query parameter. @default 'custom' */
  service?: string
  metadataTokenUrl?: string
  metadataFolderUrl?: string
}

export type TEndpointConfig = Readonly<{
  timeoutMs: number
  endpoint: string
  service: string
  metadataTokenUrl: string
  metadataFolderUrl: string
}>

// Largest delay setTimeout honours; anything above fires after 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647

function resolveTimeout(timeout: number | string | undefined): number {
  if (timeout === undefined) return DEFAULT_TIMEOUT_MS

  const timeoutMs = typeof timeout === 'number' ? timeout : parseDuration(timeout)
  if (timeoutMs === null || Number.isNaN(timeoutMs)) {
    throw new ConfigurationError(`timeout must be a duration such as "20s", got "${timeout}"`)
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(`timeout must not exceed ${MAX_TIMEOUT_MS}ms, got "${timeout}"`)
  }
  return timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS
}

/** Applies defaults and validates. The result never changes afterwards. */
export function resolveEndpointConfig(options: TEndpointOptions = {}): TEndpointConfig {
  const config = {
    timeoutMs: resolveTimeout(options.timeout),
    endpoint: options.endpoint || DEFAULT_ENDPOINT,
    service: options.service || DEFAULT_SERVICE,
    metadataTokenUrl: options.metadataTokenUrl || DEFAULT_METADATA_TOKEN_URL,
    metadataFolderUrl: options.metadataFolderUrl || DEFAULT_METADATA_FOLDER_URL,
  }

  validateRequiredStrings(config, ['endpoint', 'service', 'metadataTokenUrl', 'metadataFolderUrl'])
  validateUrl('endpoint', config.endpoint)
  validateUrl('metadataTokenUrl', config.metadataTokenUrl)
  validateUrl('metadataFolderUrl', config.metadataFolderUrl)

  return Object.freeze(config)
}

/** Reads `CLOUD_MONITORING_*` variables. Unset or empty variables are left to the defaults. */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): TEndpointOptions {
  const options: TEndpointOptions = {}
  if (env.CLOUD_MONITORING_TIMEOUT) options.timeout = env.CLOUD_MONITORING_TIMEOUT
  if (env.CLOUD_MONITORING_ENDPOINT) options.endpoint = env.CLOUD_MONITORING_ENDPOINT
  if (env.CLOUD_MONITORING_SERVICE) options.service = env.CLOUD_MONITORING_SERVICE
  return options
}
