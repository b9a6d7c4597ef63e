import { BatchServiceClient, type protos } from '@google-cloud/batch'
import {
  BatchService,
  BatchServiceError,
  JobState,
  type BatchServiceErrorCode,
  type JobSpec,
  type JobStateType,
  type JobStatus,
} from '@batch-sweep/batch'
import { makeLogger, type Logger } from '@batch-sweep/logger'
import { errorMessage } from '@batch-sweep/utils'

type GcpJob = protos.google.cloud.batch.v1.IJob

// gRPC status codes returned by the client library.
const GRPC_CODES: Record<number, BatchServiceErrorCode> = {
  3: 'INVALID_ARGUMENT',
  4: 'UNAVAILABLE',
  5: 'NOT_FOUND',
  6: 'ALREADY_EXISTS',
  7: 'PERMISSION_DENIED',
  8: 'QUOTA_EXCEEDED',
  14: 'UNAVAILABLE',
}

export function toBatchServiceError(err: unknown, context: string): BatchServiceError {
  if (err instanceof BatchServiceError) return err
  const status =
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number'
      ? err.code
      : undefined
  const code = (status !== undefined ? GRPC_CODES[status] : undefined) ?? 'UNKNOWN'
  return new BatchServiceError(code, `${context}: ${errorMessage(err)}`, err)
}

/** Numeric enum values follow the declaration order of `JobState`. */
export function normalizeJobState(state: number | string | null | undefined): JobStateType {
  if (typeof state === 'number') return JobState.options[state] ?? 'STATE_UNSPECIFIED'
  const parsed = JobState.safeParse(state)
  return parsed.success ? parsed.data : 'STATE_UNSPECIFIED'
}

export function toGcpJob(spec: JobSpec): GcpJob {
  const { taskGroup, allocation } = spec
  const { runnable, computeResource, maxRetryCount } = taskGroup.task

  return {
    labels: spec.labels,
    taskGroups: [
      {
        taskCount: taskGroup.taskCount,
        parallelism: taskGroup.parallelism,
        taskSpec: {
          runnables: [
            {
              container: { imageUri: runnable.imageUri, commands: runnable.commands },
              environment: { variables: runnable.environment },
            },
          ],
          computeResource: {
            cpuMilli: computeResource.cpuMilli,
            memoryMib: computeResource.memoryMib,
          },
          maxRetryCount,
        },
      },
    ],
    allocationPolicy: {
      instances: [
        {
          installGpuDrivers: allocation.accelerators.length > 0,
          policy: {
            machineType: allocation.machineType,
            accelerators: allocation.accelerators.map(({ type, count }) => ({ type, count })),
          },
        },
      ],
    },
    logsPolicy: { destination: 'CLOUD_LOGGING' },
  }
}

export class GcpBatchService extends BatchService {
  private readonly client: BatchServiceClient
  private logger: Logger

  /** @param parent `projects/{project}/locations/{location}` */
  constructor(private parent: string) {
    super()
    this.client = new BatchServiceClient()
    this.logger = makeLogger('GcpBatchService', { parent })
  }

  protected async initialize(): Promise<void> {
    await this.client.initialize()
  }

  protected async _createJob(spec: JobSpec): Promise<string> {
    let created: GcpJob
    try {
      ;[created] = await this.client.createJob({
        parent: this.parent,
        jobId: spec.jobId,
        job: toGcpJob(spec),
      })
    } catch (err) {
      throw toBatchServiceError(err, `createJob ${spec.jobId}`)
    }

    if (!created.name) {
      throw new BatchServiceError('UNKNOWN', `createJob ${spec.jobId} returned no job name`)
    }
    this.logger.debug(`created ${created.name}`, { uid: created.uid })
    return created.name
  }

  protected async _getJob(jobName: string): Promise<JobStatus> {
    let job: GcpJob
    try {
      ;[job] = await this.client.getJob({ name: jobName })
    } catch (err) {
      throw toBatchServiceError(err, `getJob ${jobName}`)
    }

    const events = (job.status?.statusEvents ?? []).map(
      (e) => `${e.type ?? 'EVENT'}: ${e.description ?? ''}`,
    )
    return { name: jobName, state: normalizeJobState(job.status?.state), events }
  }

  // Deleting a job terminates its tasks; the operation is not awaited.
  protected async _cancelJob(jobName: string): Promise<void> {
    try {
      const [operation] = await this.client.deleteJob({
        name: jobName,
        reason: 'sweep study aborted',
      })
      this.logger.debug(`delete requested for ${jobName}`, { operation: operation.name })
    } catch (err) {
      throw toBatchServiceError(err, `deleteJob ${jobName}`)
    }
  }

  public async close(): Promise<void> {
    await this.client.close()
  }
}
