import type { JobSpec, JobStatus } from './types.js'

export type BatchServiceErrorCode =
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'QUOTA_EXCEEDED'
  | 'PERMISSION_DENIED'
  | 'UNAVAILABLE'
  | 'UNKNOWN'

export class BatchServiceError extends Error {
  constructor(
    public readonly code: BatchServiceErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'BatchServiceError'
  }
}

/**
 * Remote batch-compute service.
 *
 * Throwing contract:
 * - createJob(): throw when the service rejects the spec (quota, shape, auth, duplicate id)
 * - getJob():    throw NOT_FOUND for unknown jobs, anything else for transport failures
 * - cancelJob(): throw NOT_FOUND for unknown jobs
 */
export abstract class BatchService {
  private initialized = false

  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize()
      this.initialized = true
    }
  }

  /** Submits the job and returns its fully qualified resource name. */
  public async createJob(spec: JobSpec): Promise<string> {
    await this.ensureInitialized()
    return this._createJob(spec)
  }

  public async getJob(jobName: string): Promise<JobStatus> {
    await this.ensureInitialized()
    return this._getJob(jobName)
  }

  public async cancelJob(jobName: string): Promise<void> {
    await this.ensureInitialized()
    return this._cancelJob(jobName)
  }

  protected abstract initialize(): Promise<void>

  protected abstract _createJob(spec: JobSpec): Promise<string>

  protected abstract _getJob(jobName: string): Promise<JobStatus>

  protected abstract _cancelJob(jobName: string): Promise<void>
}
