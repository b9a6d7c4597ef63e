import { stat } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
  JobSubmitter,
  type BatchService,
  type JobHandle,
  type JobSpec,
} from '@batch-sweep/batch'
import { ResultCollector, type RunResult } from '@batch-sweep/collector'
import { FileSystemMaterializer, type InputMaterializer } from '@batch-sweep/inputs'
import { errorFields, makeLogger, type Logger } from '@batch-sweep/logger'
import { buildMatrix, type RunConfig, type SweepMatrix } from '@batch-sweep/matrix'
import {
  ChartRenderer,
  toReportInput,
  type FigureStatus,
  type ReportRenderer,
} from '@batch-sweep/report'
import type { ObjectStore } from '@batch-sweep/storage'
import {
  JobTracker,
  TrackingTimeoutError,
  type TrackingReport,
} from '@batch-sweep/tracker'
import type { Clock, Sleep } from '@batch-sweep/utils'
import type { StudyConfig } from './config.js'

export class PreconditionError extends Error {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(message)
    this.name = 'PreconditionError'
  }
}

export interface StudyDeps {
  batch: BatchService
  store: ObjectStore
  materializer?: InputMaterializer
  renderer?: ReportRenderer
  sleep?: Sleep
  now?: Clock
  /** Where the jobs run, e.g. `{ project, location }`; echoed when a study starts. */
  target?: Record<string, string>
}

export interface StudyPlan {
  matrix: SweepMatrix
  specs: JobSpec[]
}

export interface StudySummary {
  matrix: SweepMatrix
  tracking: TrackingReport
  results: RunResult[]
  figures: FigureStatus[]
}

/**
 * Runs one sweep end to end: submit every run, wait for all of them, collect timings
 * and render the charts. Owns the lifetime of every component it builds.
 */
export class SweepStudy {
  private logger: Logger
  private readonly submitter: JobSubmitter
  private readonly tracker: JobTracker
  private readonly collector: ResultCollector
  private readonly materializer: InputMaterializer
  private readonly renderer: ReportRenderer
  private orphans: JobHandle[] = []

  constructor(
    private config: StudyConfig,
    private deps: StudyDeps,
  ) {
    this.logger = makeLogger('SweepStudy')
    this.submitter = new JobSubmitter(deps.batch, deps.store, {
      imageUri: config.imageUri,
      machines: config.machines,
      solver: config.solver,
      jobIdSuffix: config.jobIdSuffix,
      taskMaxRetryCount: config.taskMaxRetryCount,
    })
    this.tracker = new JobTracker(deps.batch, config.tracker, {
      sleep: deps.sleep,
      now: deps.now,
    })
    this.collector = new ResultCollector(deps.store)
    this.materializer = deps.materializer ?? new FileSystemMaterializer()
    this.renderer = deps.renderer ?? new ChartRenderer(config.outDir)
  }

  /** Jobs left running on the remote service after the last abort. */
  public get orphaned(): readonly JobHandle[] {
    return this.orphans
  }

  public buildMatrix(): SweepMatrix {
    return buildMatrix(this.config.tables, this.config.structureFile, this.config.jobIdSuffix)
  }

  public plan(): StudyPlan {
    const matrix = this.buildMatrix()
    return { matrix, specs: matrix.all.map((config) => this.submitter.plan(config)) }
  }

  public async run(): Promise<StudySummary> {
    this.orphans = []
    await this.checkPreconditions()
    this.echoConfig()

    const matrix = this.buildMatrix()
    this.logger.info(`Built sweep matrix with ${matrix.all.length} runs`, {
      scaling: matrix.scaling.length,
      comparison: matrix.comparison.length,
    })

    const handles = await this.submitAll(matrix)
    this.logger.info(`Submitted ${handles.length} jobs. Waiting for completion...`)

    const tracking = await this.trackAll(handles)

    this.logger.info('All jobs completed. Collecting results...')
    const { results, figures } = await this.collectAndReport(matrix)

    const withValue = results.filter((r) => r.value !== null).length
    this.logger.info('Sweep study finished', {
      succeeded: tracking.succeeded.length,
      failed: tracking.failed.length,
      lost: tracking.lost.length,
      withValue,
      absent: results.length - withValue,
    })
    return { matrix, tracking, results, figures }
  }

  /** Collects whatever artifacts exist and renders the charts; submits nothing. */
  public async collectAndReport(
    matrix: SweepMatrix = this.buildMatrix(),
  ): Promise<{ results: RunResult[]; figures: FigureStatus[] }> {
    const results = await this.collector.collect(matrix.all)
    this.logger.info('Generating plots...')
    const figures = await this.renderer.render(toReportInput(results))
    return { results, figures }
  }

  private async checkPreconditions(): Promise<void> {
    const path = this.config.structureFile
    let size: number
    try {
      const info = await stat(path)
      if (!info.isFile()) throw new Error('not a regular file')
      size = info.size
    } catch (err) {
      const error = new PreconditionError(
        path,
        `${path} not found. Please ensure the structure file is in the working directory.`,
      )
      this.logger.fatal(error.message, errorFields(err))
      throw error
    }

    if (size === 0) {
      const error = new PreconditionError(path, `${path} is empty`)
      this.logger.fatal(error.message)
      throw error
    }
    this.logger.info(`Loaded structure file ${resolve(path)}`, { bytes: size })
  }

  /** Settings echoed at the start of a run. */
  public describe(): Record<string, unknown> {
    return {
      ...this.deps.target,
      bucket: this.deps.store.bucket,
      imageUri: this.config.imageUri,
      workDir: this.config.workDir,
      outDir: this.config.outDir,
      pollIntervalMs: this.config.tracker.pollIntervalMs,
      cancelOnAbort: this.config.cancelOnAbort,
    }
  }

  private echoConfig(): void {
    this.logger.info('Starting sweep study...', this.describe())
  }

  private async submitAll(matrix: SweepMatrix): Promise<JobHandle[]> {
    const handles: JobHandle[] = []
    let current: RunConfig | undefined

    try {
      for (const study of ['scaling', 'comparison'] as const) {
        this.logger.info(`Submitting ${study} jobs...`, { count: matrix[study].length })
        for (const config of matrix[study]) {
          current = config
          const inputs = await this.materializer.materialize(config, this.config.workDir)
          handles.push(await this.submitter.submit(config, inputs))
        }
      }
    } catch (err) {
      this.logger.error(`Submission aborted at ${current?.runName ?? 'start'}`, {
        submitted: handles.length,
        ...errorFields(err),
      })
      await this.abandon(handles)
      throw err
    }

    return handles
  }

  private async trackAll(handles: JobHandle[]): Promise<TrackingReport> {
    let tracking: TrackingReport
    try {
      tracking = await this.tracker.track(handles)
    } catch (err) {
      if (err instanceof TrackingTimeoutError) {
        await this.abandon(err.remaining)
        this.keepLost(err.partial.lost)
      }
      throw err
    }
    this.keepLost(tracking.lost)
    return tracking
  }

  // Lost jobs cannot be cancelled; their remote fate is unknown.
  private keepLost(lost: readonly JobHandle[]): void {
    if (lost.length === 0) return
    this.orphans = [...this.orphans, ...lost]
    this.logger.warn(`${lost.length} jobs disappeared from the batch service`, {
      jobs: lost.map((h) => h.jobName),
    })
  }

  /** Best-effort cancellation; whatever is not cancelled is remembered as orphaned. */
  private async abandon(handles: readonly JobHandle[]): Promise<void> {
    if (handles.length === 0) {
      this.orphans = []
      return
    }

    if (!this.config.cancelOnAbort) {
      this.orphans = [...handles]
      this.logger.warn(`Leaving ${handles.length} submitted jobs running`, {
        jobs: handles.map((h) => h.jobName),
      })
      return
    }

    const orphans: JobHandle[] = []
    for (const handle of handles) {
      try {
        await this.deps.batch.cancelJob(handle.jobName)
        this.logger.info(`Cancelled job ${handle.config.runName}`)
      } catch (err) {
        orphans.push(handle)
        this.logger.error(`Could not cancel job ${handle.config.runName}`, errorFields(err))
      }
    }
    this.orphans = orphans
  }
}
