import type { THostMetric } from '../../core/types.ts'
import { formatRfc3339, toFloat64 } from '../../core/utils.ts'
import type { TFieldResult, TMetricPoint, TSkippedField, TTranslation } from './types.ts'

// `name` is the metric-name attribute of the wire schema and cannot be a label.
const RESERVED_LABEL = 'name'
const RENAMED_RESERVED_LABEL = '_name'

export type TTranslatorOptions = {
  /** Zone the timestamps are written in, minutes east of UTC. @default 0 */
  utcOffsetMinutes?: number
}

export function replaceReservedLabels(tags: Record<string, string>): Record<string, string> {
  const labels: Record<string, string> = {}
  for (const [key, value] of Object.entries(tags)) {
    labels[key === RESERVED_LABEL ? RENAMED_RESERVED_LABEL : key] = value
  }
  return labels
}

/**
 * Flattens host metrics into one point per numeric field, in host order.
 * Fields that cannot be read as a number are reported as skipped, never thrown.
 */
export function translate(metrics: THostMetric[], options: TTranslatorOptions = {}): TTranslation {
  const utcOffsetMinutes = options.utcOffsetMinutes ?? 0
  const results: TFieldResult[] = []
  const points: TMetricPoint[] = []
  const skipped: TSkippedField[] = []

  for (const metric of metrics) {
    const metricName = metric.name()
    const labels = replaceReservedLabels(metric.tags())
    const ts = formatRfc3339(metric.time(), utcOffsetMinutes)

    for (const field of metric.fieldList()) {
      let value: number
      try {
        value = toFloat64(field.value)
      } catch (error) {
        const entry: TSkippedField = {
          metric,
          field,
          reason: error instanceof Error ? error.message : String(error),
        }
        skipped.push(entry)
        results.push({ outcome: 'skipped', skipped: entry })
        continue
      }

      const point: TMetricPoint = {
        name: `${metricName}_${field.key}`,
        labels: { ...labels },
        ts,
        value,
      }
      points.push(point)
      results.push({ outcome: 'point', point })
    }
  }

  return { results, points, skipped }
}
