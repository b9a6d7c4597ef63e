import { z } from 'zod'
import {
  BatchServiceError,
  type BatchService,
  type JobHandle,
  type JobStateType,
  type JobStatus,
} from '@batch-sweep/batch'
import { errorFields, makeLogger, type Logger } from '@batch-sweep/logger'
import {
  SWEEP_CONSTANTS,
  allLimit,
  errorMessage,
  induceDelay,
  type Clock,
  type Sleep,
} from '@batch-sweep/utils'
import { ActiveJobSet } from './activeJobSet.js'

export const TrackerOptionsSchema = z.object({
  pollIntervalMs: z.number().int().nonnegative().default(SWEEP_CONSTANTS.POLL_INTERVAL_MS),
  maxWaitMs: z.number().int().positive().default(SWEEP_CONSTANTS.MAX_WAIT_MS),
  pollConcurrency: z.number().int().positive().default(SWEEP_CONSTANTS.POLL_CONCURRENCY),
})
export type TrackerOptions = z.infer<typeof TrackerOptionsSchema>

export type TerminalOutcome = 'SUCCEEDED' | 'FAILED'
export type TerminalReason = 'succeeded' | 'failed' | 'cancelled'

export interface TrackedJob {
  handle: JobHandle
  outcome: TerminalOutcome
  reason: TerminalReason
  /** Pass in which the terminal state was observed, starting at 1. */
  pass: number
}

export interface TrackingReport {
  succeeded: TrackedJob[]
  failed: TrackedJob[]
  /** Jobs the service stopped knowing about; their outcome was never observed. */
  lost: JobHandle[]
  passes: number
}

/** A poll that failed in transport; the job's real state is unknown, not terminal. */
export class TransientPollError extends Error {
  constructor(
    public readonly handle: JobHandle,
    public readonly consecutiveFailures: number,
    cause: unknown,
  ) {
    super(`poll of ${handle.config.runName} failed: ${errorMessage(cause)}`, { cause })
    this.name = 'TransientPollError'
  }
}

export class TrackingTimeoutError extends Error {
  constructor(
    public readonly remaining: readonly JobHandle[],
    public readonly partial: TrackingReport,
    public readonly elapsedMs: number,
  ) {
    super(`${remaining.length} jobs still active after ${elapsedMs} ms`)
    this.name = 'TrackingTimeoutError'
  }
}

type Observation = { kind: 'status'; status: JobStatus } | { kind: 'error'; cause: unknown }

const FAILURE_REASONS: Partial<Record<JobStateType, TerminalReason>> = {
  FAILED: 'failed',
  CANCELLED: 'cancelled',
}

/**
 * Polls submitted jobs until every one is terminal. Each pass works from a snapshot of
 * the active set; terminal jobs leave the set in the pass that observes them and are
 * never polled again. A poll that fails in transport leaves the job active; only the
 * wait budget bounds how long that can last.
 */
export class JobTracker {
  private logger: Logger
  private readonly options: TrackerOptions
  private readonly sleep: Sleep
  private readonly now: Clock

  constructor(
    private batch: BatchService,
    options: Partial<TrackerOptions> = {},
    deps: { sleep?: Sleep; now?: Clock } = {},
  ) {
    this.options = TrackerOptionsSchema.parse(options)
    this.sleep = deps.sleep ?? induceDelay
    this.now = deps.now ?? Date.now
    this.logger = makeLogger('JobTracker')
  }

  public async track(handles: readonly JobHandle[]): Promise<TrackingReport> {
    const active = new ActiveJobSet(handles)
    const failures = new Map<string, number>()
    const report: TrackingReport = { succeeded: [], failed: [], lost: [], passes: 0 }
    const startedAt = this.now()

    this.logger.info(`Tracking ${active.size} jobs`, {
      pollIntervalMs: this.options.pollIntervalMs,
      maxWaitMs: this.options.maxWaitMs,
    })

    while (active.size > 0) {
      report.passes++
      const pass = active.snapshot()
      const observations = await allLimit(
        pass.map((handle) => () => this.observe(handle)),
        this.options.pollConcurrency,
      )

      pass.forEach((handle, index) => {
        const observation = observations[index]
        const runName = handle.config.runName

        if (observation.kind === 'error') {
          const { cause } = observation
          if (cause instanceof BatchServiceError && cause.code === 'NOT_FOUND') {
            active.remove(runName)
            report.lost.push(handle)
            this.logger.error(`Job ${runName} is no longer known to the batch service.`, {
              jobName: handle.jobName,
              ...errorFields(cause),
            })
            return
          }

          const count = (failures.get(runName) ?? 0) + 1
          failures.set(runName, count)
          const pollError = new TransientPollError(handle, count, cause)
          this.logger.warn(pollError.message, { consecutiveFailures: count })
          return
        }

        failures.delete(runName)
        const { state } = observation.status

        if (state === 'SUCCEEDED') {
          active.remove(runName)
          report.succeeded.push({
            handle,
            outcome: 'SUCCEEDED',
            reason: 'succeeded',
            pass: report.passes,
          })
          this.logger.info(`Job ${runName} completed.`, { jobName: handle.jobName })
          return
        }

        const reason = FAILURE_REASONS[state]
        if (reason) {
          active.remove(runName)
          report.failed.push({ handle, outcome: 'FAILED', reason, pass: report.passes })
          this.logger.warn(`Job ${runName} failed.`, {
            jobName: handle.jobName,
            state,
            events: observation.status.events,
          })
          return
        }

        this.logger.trace(`Job ${runName} is ${state}`)
      })

      if (active.size === 0) break

      const elapsedMs = this.now() - startedAt
      if (elapsedMs + this.options.pollIntervalMs > this.options.maxWaitMs) {
        const remaining = active.snapshot()
        this.logger.error(`Gave up waiting for ${remaining.length} jobs`, { elapsedMs })
        throw new TrackingTimeoutError(remaining, report, elapsedMs)
      }

      this.logger.info(`Still waiting for ${active.size} jobs...`)
      await this.sleep(this.options.pollIntervalMs)
    }

    this.logger.info(`All ${handles.length} jobs reached a terminal state`, {
      succeeded: report.succeeded.length,
      failed: report.failed.length,
      lost: report.lost.length,
      passes: report.passes,
    })
    return report
  }

  private async observe(handle: JobHandle): Promise<Observation> {
    try {
      return { kind: 'status', status: await this.batch.getJob(handle.jobName) }
    } catch (cause) {
      return { kind: 'error', cause }
    }
  }
}
