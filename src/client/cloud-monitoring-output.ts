import type { Dispatcher } from 'undici'
import {
  resolveEndpointConfig,
  type TEndpointConfig,
  type TEndpointOptions,
} from '../core/config.ts'
import { ConfigurationError } from '../core/errors.ts'
import { logger as defaultLogger } from '../core/logger.ts'
import { InMemoryStatsRegistry } from '../core/stats.ts'
import { Transport } from '../core/transport.ts'
import type { THostMetric, TLogger, TStat, TStatsRegistry } from '../core/types.ts'
import { TokenManager } from '../domains/auth/token-manager.ts'
import { FolderFeature } from '../domains/metadata/folder.feature.ts'
import { MetadataApi } from '../domains/metadata/metadata.api.ts'
import { MetricsApi } from '../domains/metrics/metrics.api.ts'
import { translate } from '../domains/metrics/translator.ts'
import type { TBatch, TTranslation } from '../domains/metrics/types.ts'

const STATS_MEASUREMENT = 'yandex_cloud_monitoring'

export type TCloudMonitoringOptions = TEndpointOptions & {
  /** Zone the point timestamps are written in, minutes east of UTC. @default 0 */
  utcOffsetMinutes?: number
  logger?: TLogger
  stats?: TStatsRegistry
  /** Connection pool for all requests. @default agent honouring HTTP(S)_PROXY and NO_PROXY */
  dispatcher?: Dispatcher
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
}

/**
 * Output that publishes host agent metrics to Yandex Cloud Monitoring.
 *
 * Lifecycle mirrors the host agent's output contract: construct (defaults and
 * transport), {@link connect} (folder lookup), {@link write} per flush, {@link close}.
 * Calls are expected to be sequential; there is no internal locking.
 *
 * @example
 * ```typescript
 * const output = new CloudMonitoringOutput({ service: 'custom', timeout: '20s' })
 * await output.connect()
 * await output.write(metrics)
 * await output.close()
 * ```
 */
export class CloudMonitoringOutput {
  readonly config: TEndpointConfig
  readonly metricOutsideWindow: TStat

  private readonly logger: TLogger
  private readonly utcOffsetMinutes: number
  private readonly transport: Transport
  private readonly tokenManager: TokenManager
  private readonly folderFeature: FolderFeature
  private readonly metricsApi: MetricsApi

  constructor(options: TCloudMonitoringOptions = {}) {
    this.config = resolveEndpointConfig(options)
    this.logger = options.logger ?? defaultLogger
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0

    this.transport = new Transport({
      timeoutInMilliseconds: this.config.timeoutMs,
      fetchImplementation: options.fetchImplementation,
      dispatcher: options.dispatcher,
    })

    const metadataApi = new MetadataApi({ transport: this.transport })
    this.tokenManager = new TokenManager({
      metadataApi,
      tokenUrl: this.config.metadataTokenUrl,
      logger: this.logger,
    })
    this.folderFeature = new FolderFeature({
      api: metadataApi,
      folderUrl: this.config.metadataFolderUrl,
    })
    this.metricsApi = new MetricsApi({
      transport: this.transport,
      tokenProvider: this.tokenManager,
      endpoint: this.config.endpoint,
      service: this.config.service,
    })

    const stats = options.stats ?? new InMemoryStatsRegistry()
    this.metricOutsideWindow = stats.register(STATS_MEASUREMENT, 'metric_outside_window', {})
  }

  /** Looks up the folder id. Only the first successful call reaches the metadata service. */
  public async connect(): Promise<void> {
    this.assertOpen()
    if (this.folderFeature.cachedFolderId === null) {
      this.logger.debug(`Getting folder ID in ${this.config.metadataFolderUrl}`)
    }
    const folderId = await this.folderFeature.resolveFolderId()
    this.logger.info(`Writing to Yandex.Cloud Monitoring URL: ${this.config.endpoint}`)
    this.logger.info(`FolderID: ${folderId}`)
  }

  /**
   * Translates and publishes `metrics` as one batch.
   * Non-numeric fields are logged and dropped; any other failure rejects the whole batch.
   */
  public async write(metrics: THostMetric[], nowMs: number = Date.now()): Promise<TTranslation> {
    this.assertOpen()
    const folderId = this.folderFeature.cachedFolderId
    if (folderId === null) {
      throw new ConfigurationError('connect() must succeed before write()')
    }

    const translation = translate(metrics, { utcOffsetMinutes: this.utcOffsetMinutes })
    for (const { field, reason } of translation.skipped) {
      this.logger.error(`Skipping value of field "${field.key}": ${reason}`)
    }

    const batch: TBatch = Object.freeze({ metrics: translation.points })
    await this.metricsApi.publish(batch, folderId, nowMs)
    return translation
  }

  /**
   * Releases the transport. Requests already in flight are left to finish.
   * The instance cannot be used afterwards.
   */
  public async close(): Promise<void> {
    this.tokenManager.clear()
    await this.transport.close()
  }

  private assertOpen(): void {
    if (this.transport.isClosed) throw new ConfigurationError('Output is closed')
  }
}
