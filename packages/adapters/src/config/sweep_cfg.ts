import { makeLogger } from '@batch-sweep/logger'
const logger = makeLogger('sweepConfig')

export function getContainerImage(): string | undefined {
  const image = process.env.SWEEP_CONTAINER_IMAGE
  logger.trace(`image: ${image ?? '<unset>'}`)
  return image || undefined
}

function readMs(name: string): number | undefined {
  const raw = process.env[name]
  if (!raw) return undefined

  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer number of milliseconds, got "${raw}"`)
  }
  logger.trace(`${name}: ${value}`)
  return value
}

export function getPollIntervalMs(): number | undefined {
  return readMs('SWEEP_POLL_INTERVAL_MS')
}

export function getMaxWaitMs(): number | undefined {
  return readMs('SWEEP_MAX_WAIT_MS')
}
