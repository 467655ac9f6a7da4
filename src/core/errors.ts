/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export type TMetadataErrorKind = 'unreachable' | 'malformed'

export type TMetadataErrorOptions = {
  kind: TMetadataErrorKind
  url: string
  statusCode?: number
  cause?: unknown
}

/**
 * Indicates the instance-metadata service could not be used: it answered with a
 * non-2xx status (`unreachable`) or with a body that carries no usable value (`malformed`).
 */
export class MetadataError extends Error {
  readonly kind: TMetadataErrorKind
  readonly url: string
  readonly statusCode?: number

  constructor(message: string, options: TMetadataErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'MetadataError'
    this.kind = options.kind
    this.url = options.url
    this.statusCode = options.statusCode
  }
}

export type TDeliveryErrorOptions = {
  statusCode?: number
  statusText?: string
  cause?: unknown
}

/** Indicates a batch was not accepted by the monitoring endpoint. The whole batch failed. */
export class DeliveryError extends Error {
  readonly statusCode?: number
  readonly statusText?: string

  constructor(message: string, options: TDeliveryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'DeliveryError'
    this.statusCode = options.statusCode
    this.statusText = options.statusText
  }
}

/** Indicates an HTTP request did not complete within the configured timeout. */
export class TimeoutError extends Error {
  constructor(message = 'Operation timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}
