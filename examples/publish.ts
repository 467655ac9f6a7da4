/**
 * Publishes a single sample metric from a cloud instance.
 *
 * Prerequisites:
 * 1. Run on a VM whose service account may write to Monitoring
 * 2. Optionally set CLOUD_MONITORING_ENDPOINT / CLOUD_MONITORING_SERVICE / CLOUD_MONITORING_TIMEOUT
 *    in the environment or in a .env file
 *
 * Usage:
 *   npx tsx examples/publish.ts
 */

import { config as loadEnv } from 'dotenv'
import { hostname } from 'os'
import { CloudMonitoringOutput } from '../src/client/cloud-monitoring-output.ts'
import { optionsFromEnv } from '../src/core/config.ts'
import type { THostMetric } from '../src/core/types.ts'

loadEnv()

const sample: THostMetric = {
  name: () => 'example',
  fieldList: () => [
    { key: 'uptime', value: process.uptime() },
    { key: 'heap_used', value: process.memoryUsage().heapUsed },
  ],
  tags: () => ({ host: hostname() }),
  time: () => new Date(),
}

async function main(): Promise<void> {
  const output = new CloudMonitoringOutput(optionsFromEnv())
  try {
    await output.connect()
    const { points, skipped } = await output.write([sample])
    console.log(`Published ${points.length} points, skipped ${skipped.length}`)
  } finally {
    await output.close()
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
