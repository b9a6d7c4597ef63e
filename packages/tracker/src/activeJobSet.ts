import type { JobHandle } from '@batch-sweep/batch'

export type TrackerErrorCode = 'DUPLICATE_RUN' | 'NOT_TRACKED'

export class TrackerError extends Error {
  constructor(
    public readonly code: TrackerErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'TrackerError'
  }
}

/** Jobs still being polled, keyed by run name. Only the tracker loop mutates it. */
export class ActiveJobSet {
  private readonly entries = new Map<string, JobHandle>()

  constructor(handles: Iterable<JobHandle> = []) {
    for (const handle of handles) this.add(handle)
  }

  public add(handle: JobHandle): void {
    const runName = handle.config.runName
    if (this.entries.has(runName)) {
      throw new TrackerError('DUPLICATE_RUN', `run ${runName} is already being tracked`)
    }
    this.entries.set(runName, handle)
  }

  /** Removes a run; removing one that is not tracked is an error. */
  public remove(runName: string): JobHandle {
    const handle = this.entries.get(runName)
    if (!handle) throw new TrackerError('NOT_TRACKED', `run ${runName} is not being tracked`)
    this.entries.delete(runName)
    return handle
  }

  public has(runName: string): boolean {
    return this.entries.has(runName)
  }

  public get size(): number {
    return this.entries.size
  }

  /** Stable view for one polling pass; later mutation of the set does not affect it. */
  public snapshot(): readonly JobHandle[] {
    return Object.freeze(Array.from(this.entries.values()))
  }
}
