// Main client
export { CloudMonitoringOutput } from './client/cloud-monitoring-output.ts'
export type { TCloudMonitoringOptions } from './client/cloud-monitoring-output.ts'

// Building blocks (for hosts wiring their own lifecycle)
export { MetadataApi } from './domains/metadata/metadata.api.ts'
export { FolderFeature } from './domains/metadata/folder.feature.ts'
export { TokenManager } from './domains/auth/token-manager.ts'
export { MetricsApi } from './domains/metrics/metrics.api.ts'
export { translate, replaceReservedLabels } from './domains/metrics/translator.ts'
export { Transport } from './core/transport.ts'
export { InMemoryStatsRegistry } from './core/stats.ts'

// Configuration
export {
  DEFAULT_ENDPOINT,
  DEFAULT_METADATA_FOLDER_URL,
  DEFAULT_METADATA_TOKEN_URL,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT_MS,
  optionsFromEnv,
  resolveEndpointConfig,
} from './core/config.ts'
export type { TEndpointConfig, TEndpointOptions } from './core/config.ts'

// Errors
export { ConfigurationError, DeliveryError, MetadataError, TimeoutError } from './core/errors.ts'
export type { TMetadataErrorKind } from './core/errors.ts'

// Types
export type {
  THostField,
  THostFieldValue,
  THostMetric,
  TLogger,
  TStat,
  TStatsRegistry,
  TTokenProvider,
} from './core/types.ts'

export type {
  TBatch,
  TFieldResult,
  TMetricKind,
  TMetricPoint,
  TSkippedField,
  TTranslation,
} from './domains/metrics/types.ts'
