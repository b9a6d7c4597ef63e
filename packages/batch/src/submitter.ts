import { basename } from 'node:path'
import { errorFields, makeLogger, type Logger } from '@batch-sweep/logger'
import type { MaterializedInputs } from '@batch-sweep/inputs'
import type { RunConfig } from '@batch-sweep/matrix'
import type { ObjectStore } from '@batch-sweep/storage'
import { errorMessage } from '@batch-sweep/utils'
import { BatchService } from './batchService.js'
import { buildJobSpec, inputsPrefix, type JobSpecOptions } from './jobSpec.js'
import { makeJobHandle, type JobHandle, type JobSpec } from './types.js'

export type SubmissionErrorCode = 'STAGING_FAILED' | 'INVALID_SPEC' | 'REJECTED'

export class SubmissionError extends Error {
  constructor(
    public readonly code: SubmissionErrorCode,
    public readonly runName: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'SubmissionError'
  }
}

export type SubmitterOptions = Omit<JobSpecOptions, 'bucket'>

export class JobSubmitter {
  private logger: Logger

  constructor(
    private batch: BatchService,
    private store: ObjectStore,
    private options: SubmitterOptions,
  ) {
    this.logger = makeLogger('JobSubmitter', { bucket: store.bucket })
  }

  /** The spec `submit` would send, without staging or submitting anything. */
  public plan(config: RunConfig): JobSpec {
    try {
      return buildJobSpec(config, { ...this.options, bucket: this.store.bucket })
    } catch (err) {
      throw new SubmissionError(
        'INVALID_SPEC',
        config.runName,
        `cannot build job spec for ${config.runName}: ${errorMessage(err)}`,
        err,
      )
    }
  }

  public async submit(config: RunConfig, inputs: MaterializedInputs): Promise<JobHandle> {
    const spec = this.plan(config)

    for (const file of inputs.files) {
      const key = `${inputsPrefix(config.runName)}/${basename(file)}`
      try {
        await this.store.uploadFile(key, file)
      } catch (err) {
        throw new SubmissionError(
          'STAGING_FAILED',
          config.runName,
          `failed to stage ${file} for ${config.runName}: ${errorMessage(err)}`,
          err,
        )
      }
    }
    this.logger.debug(`staged ${inputs.files.length} input files`, { runName: config.runName })

    let jobName: string
    try {
      jobName = await this.batch.createJob(spec)
    } catch (err) {
      this.logger.error(`job for ${config.runName} was rejected`, {
        runName: config.runName,
        jobId: spec.jobId,
        ...errorFields(err),
      })
      throw new SubmissionError(
        'REJECTED',
        config.runName,
        `batch service rejected ${config.runName}: ${errorMessage(err)}`,
        err,
      )
    }

    this.logger.info(`Submitted job: ${jobName}`, {
      runName: config.runName,
      machineType: spec.allocation.machineType,
      ranks: spec.taskGroup.task.runnable.environment.SWEEP_RANKS,
    })
    return makeJobHandle(jobName, spec.jobId, config)
  }
}
