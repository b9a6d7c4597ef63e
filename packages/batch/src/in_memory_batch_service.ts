import { makeLogger, type Logger } from '@batch-sweep/logger'
import { BatchService, BatchServiceError } from './batchService.js'
import type { JobSpec, JobStateType, JobStatus } from './types.js'

export type BatchCall =
  | { op: 'createJob'; jobId: string }
  | { op: 'getJob'; jobName: string }
  | { op: 'cancelJob'; jobName: string }

export interface InMemoryJob {
  name: string
  spec: JobSpec
  states: JobStateType[]
  pollFailures: number
  cancelled: boolean
}

export interface InMemoryBatchOptions {
  parent?: string
  /** States reported by successive polls; the last one repeats. */
  script?: (spec: JobSpec) => JobStateType[]
  /** Return an error to reject the submission. */
  reject?: (spec: JobSpec) => Error | undefined
  /** Number of polls that fail before the job answers. */
  pollFailures?: (spec: JobSpec) => number
  /** Called once when a job is first reported in a terminal state. */
  onTerminal?: (job: InMemoryJob, state: JobStateType) => void | Promise<void>
}

const TERMINAL: ReadonlySet<JobStateType> = new Set(['SUCCEEDED', 'FAILED', 'CANCELLED'])

const DEFAULT_SCRIPT: JobStateType[] = ['QUEUED', 'RUNNING', 'SUCCEEDED']

export class InMemoryBatchService extends BatchService {
  private logger: Logger = makeLogger('InMemoryBatchService')
  private readonly jobs = new Map<string, InMemoryJob>()
  private readonly finished = new Set<string>()
  private readonly parent: string
  public readonly calls: BatchCall[] = []

  constructor(private options: InMemoryBatchOptions = {}) {
    super()
    this.parent = options.parent ?? 'projects/local/locations/in-memory'
  }

  public job(jobName: string): InMemoryJob | undefined {
    return this.jobs.get(jobName)
  }

  public pollCount(jobName: string): number {
    return this.calls.filter((c) => c.op === 'getJob' && c.jobName === jobName).length
  }

  protected async initialize(): Promise<void> {
    return
  }

  protected async _createJob(spec: JobSpec): Promise<string> {
    this.calls.push({ op: 'createJob', jobId: spec.jobId })

    const rejection = this.options.reject?.(spec)
    if (rejection) throw rejection

    const name = `${this.parent}/jobs/${spec.jobId}`
    if (this.jobs.has(name)) {
      throw new BatchServiceError('ALREADY_EXISTS', `job ${name} already exists`)
    }

    const states = this.options.script?.(spec) ?? DEFAULT_SCRIPT
    if (states.length === 0) {
      throw new BatchServiceError('INVALID_ARGUMENT', `empty state script for ${spec.jobId}`)
    }

    this.jobs.set(name, {
      name,
      spec,
      states: [...states],
      pollFailures: this.options.pollFailures?.(spec) ?? 0,
      cancelled: false,
    })
    this.logger.trace(`created ${name}`)
    return name
  }

  protected async _getJob(jobName: string): Promise<JobStatus> {
    this.calls.push({ op: 'getJob', jobName })

    const job = this.jobs.get(jobName)
    if (!job) throw new BatchServiceError('NOT_FOUND', `job ${jobName} not found`)

    if (job.pollFailures > 0) {
      job.pollFailures--
      throw new BatchServiceError('UNAVAILABLE', `poll of ${jobName} timed out`)
    }

    const state = job.states.length > 1 ? job.states.shift() : job.states[0]
    if (state === undefined) throw new BatchServiceError('UNKNOWN', `no state for ${jobName}`)

    if (TERMINAL.has(state) && !this.finished.has(jobName)) {
      this.finished.add(jobName)
      await this.options.onTerminal?.(job, state)
    }

    return { name: jobName, state, events: [] }
  }

  protected async _cancelJob(jobName: string): Promise<void> {
    this.calls.push({ op: 'cancelJob', jobName })

    const job = this.jobs.get(jobName)
    if (!job) throw new BatchServiceError('NOT_FOUND', `job ${jobName} not found`)

    job.cancelled = true
    job.states = ['CANCELLED']
  }
}
