import type { TStat, TStatsRegistry } from './types.ts'

class Counter implements TStat {
  private value = 0

  incr(value: number): void {
    this.value += value
  }

  set(value: number): void {
    this.value = value
  }

  get(): number {
    return this.value
  }
}

/**
 * Process-local stats registry used when the host agent does not provide one.
 * Registering the same measurement, field and tag set twice returns the same stat.
 */
export class InMemoryStatsRegistry implements TStatsRegistry {
  private readonly stats: Map<string, TStat> = new Map()

  register(measurement: string, field: string, tags: Record<string, string>): TStat {
    const key = this.makeKey(measurement, field, tags)
    const existing = this.stats.get(key)
    if (existing) return existing

    const stat = new Counter()
    this.stats.set(key, stat)
    return stat
  }

  private makeKey(measurement: string, field: string, tags: Record<string, string>): string {
    const tagPart = Object.keys(tags)
      .sort()
      .map((key) => `${key}=${tags[key]}`)
      .join(',')
    return `${measurement}|${field}|${tagPart}`
  }
}
