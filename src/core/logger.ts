import type { TLogger } from './types.ts'

const PREFIX = '[cloud-monitoring]'

export const logger: TLogger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(PREFIX, message, ...args)
  },

  info(message: string, ...args: unknown[]): void {
    console.info(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(PREFIX, message, ...args)
  },
}
