import type { THostField, THostMetric } from '../../core/types.ts'

/** Value kind understood by the backend. Absent means DGAUGE. */
export type TMetricKind = 'DGAUGE' | 'IGAUGE' | 'COUNTER' | 'RATE'

/** One field of one host metric, in wire form. */
export type TMetricPoint = {
  name: string
  labels: Record<string, string>
  /** RFC3339 timestamp with zone offset */
  ts: string
  value: number
  type?: TMetricKind
}

/** Request body of the data/write endpoint. */
export type TBatch = {
  ts?: string
  labels?: Record<string, string>
  metrics: TMetricPoint[]
}

export type TSkippedField = {
  metric: THostMetric
  field: THostField
  reason: string
}

export type TFieldResult =
  | { outcome: 'point'; point: TMetricPoint }
  | { outcome: 'skipped'; skipped: TSkippedField }

export type TTranslation = {
  results: TFieldResult[]
  points: TMetricPoint[]
  skipped: TSkippedField[]
}
