/** A single field of a host metric, in the order the host agent produced it. */
export type THostField = {
  key: string
  value: THostFieldValue
}

export type THostFieldValue = number | bigint | string | boolean

/** The host agent's generic metric, consumed read-only. */
export type THostMetric = {
  name(): string
  fieldList(): THostField[]
  tags(): Record<string, string>
  time(): Date
}

export type TLogger = {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export type TStat = {
  incr(value: number): void
  set(value: number): void
  get(): number
}

/** Host agent self-statistics facility. */
export type TStatsRegistry = {
  register(measurement: string, field: string, tags: Record<string, string>): TStat
}

export type TTokenProvider = {
  /** Returns a bearer token valid at `nowMs`. Implementations cache and refresh lazily. */
  ensureValid(nowMs?: number): Promise<string>
}

export type THttpMethod = 'GET' | 'POST'

export type TRequestOptions = {
  queryString?: Record<string, string | undefined>
  headers?: Record<string, string>
  body?: string
}

export type TTransportResponse = {
  status: number
  statusText: string
  body: Buffer
}
