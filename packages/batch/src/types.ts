import { z } from 'zod'
import type { RunConfig } from '@batch-sweep/matrix'
import { SWEEP_CONSTANTS } from '@batch-sweep/utils'

export const JobState = z.enum([
  'STATE_UNSPECIFIED',
  'QUEUED',
  'SCHEDULED',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'DELETION_IN_PROGRESS',
  'CANCELLATION_IN_PROGRESS',
  'CANCELLED',
])
export type JobStateType = z.infer<typeof JobState>

export interface JobStatus {
  name: string
  state: JobStateType
  events: string[]
}

/** Remote job name plus the run it belongs to. Frozen once created. */
export interface JobHandle {
  readonly jobName: string
  readonly jobId: string
  readonly config: RunConfig
}

export function makeJobHandle(jobName: string, jobId: string, config: RunConfig): JobHandle {
  return Object.freeze({ jobName, jobId, config })
}

export const AcceleratorSchema = z.object({
  type: z.string().min(1),
  count: z.number().int().positive(),
})

export const MachineShapeSchema = z.object({
  machineType: z.string().min(1),
  cpuMilli: z.number().int().positive(),
  memoryMib: z.number().int().positive(),
  accelerator: AcceleratorSchema.optional(),
  coresPerNode: z.number().int().positive(),
})
export type MachineShape = z.infer<typeof MachineShapeSchema>

export const MachineTableSchema = z.object({
  CPU: MachineShapeSchema,
  GPU: MachineShapeSchema,
})
export type MachineTable = z.infer<typeof MachineTableSchema>

export interface ComputeShape extends MachineShape {
  parallelism: number
}

export const SolverCommandsSchema = z.object({
  driver: z.string().min(1).default('sweep-driver'),
  cpuCommand: z.string().min(1).default('/usr/local/vasp/bin/vasp_std'),
  gpuCommand: z.string().min(1).default('/usr/local/vasp/bin/vasp_gpu'),
  maxErrors: z.number().int().positive().default(SWEEP_CONSTANTS.SOLVER_MAX_ERRORS),
  remoteWorkDir: z.string().min(1).default('/work'),
})
export type SolverCommands = z.infer<typeof SolverCommandsSchema>

/** Provider-neutral job description; adapters map it onto their own request shape. */
export interface JobSpec {
  jobId: string
  labels: Record<string, string>
  taskGroup: {
    taskCount: number
    parallelism: number
    task: {
      runnable: {
        imageUri: string
        commands: string[]
        environment: Record<string, string>
      }
      computeResource: { cpuMilli: number; memoryMib: number }
      maxRetryCount: number
    }
  }
  allocation: {
    machineType: string
    accelerators: Array<{ type: string; count: number }>
  }
}
