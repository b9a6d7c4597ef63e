export const SWEEP_CONSTANTS = {
  POLL_INTERVAL_MS: 60_000,
  MAX_WAIT_MS: 48 * 60 * 60 * 1000,
  POLL_CONCURRENCY: 1,
  TASK_MAX_RETRY_COUNT: 3,
  SOLVER_MAX_ERRORS: 10,
  ARTIFACT_FILE: 'elapsed_time.txt',
}

export const induceDelay = async (ms: number): Promise<void> => {
  await new Promise((resolve) => setTimeout(resolve, ms))
}

export type Sleep = (ms: number) => Promise<void>
export type Clock = () => number

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)

/**
 * Runs the thunks with at most `limit` in flight and returns their results in input order.
 * The first rejection rejects the whole call; thunks not yet started are never started.
 */
export async function allLimit<T>(calls: Array<() => Promise<T>>, limit: number): Promise<T[]> {
  const results: T[] = new Array<T>(calls.length)
  const width = Math.max(1, Math.min(limit, calls.length))
  let next = 0
  let failed = false

  const lane = async (): Promise<void> => {
    while (!failed && next < calls.length) {
      const index = next++
      try {
        results[index] = await calls[index]()
      } catch (err) {
        failed = true
        throw err
      }
    }
  }

  const lanes: Array<Promise<void>> = []
  for (let i = 0; i < width; i++) lanes.push(lane())
  await Promise.all(lanes)
  return results
}
