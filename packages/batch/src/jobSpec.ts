import { SWEEP_CONSTANTS } from '@batch-sweep/utils'
import { toJobId, type RunConfig } from '@batch-sweep/matrix'
import { computeShape } from './shape.js'
import type { JobSpec, MachineTable, SolverCommands } from './types.js'

export interface JobSpecOptions {
  imageUri: string
  bucket: string
  machines: MachineTable
  solver: SolverCommands
  jobIdSuffix?: string
  taskMaxRetryCount?: number
}

export function artifactKey(runName: string): string {
  return `${runName}/${SWEEP_CONSTANTS.ARTIFACT_FILE}`
}

export function inputsPrefix(runName: string): string {
  return `${runName}/inputs`
}

const shellQuote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`

/**
 * Container script: fetch staged inputs, run the solver under the self-healing
 * driver, then publish the timing artifact the collector looks for.
 */
export function buildRunScript(config: RunConfig, options: JobSpecOptions): string {
  const { solver, bucket } = options
  const runDir = `${solver.remoteWorkDir}/${config.runName}`
  const binary = config.device === 'GPU' ? solver.gpuCommand : solver.cpuCommand

  return [
    'set -euo pipefail',
    `mkdir -p ${shellQuote(runDir)}`,
    `gsutil -m cp ${shellQuote(`gs://${bucket}/${inputsPrefix(config.runName)}/*`)} ${shellQuote(runDir)}/`,
    `cd ${shellQuote(runDir)}`,
    [
      solver.driver,
      `--solver ${shellQuote(binary)}`,
      '--ranks "$SWEEP_RANKS"',
      '--max-errors "$SWEEP_MAX_ERRORS"',
      `--metric-out ${SWEEP_CONSTANTS.ARTIFACT_FILE}`,
    ].join(' '),
    `gsutil cp ${SWEEP_CONSTANTS.ARTIFACT_FILE} ${shellQuote(`gs://${bucket}/${artifactKey(config.runName)}`)}`,
  ].join('\n')
}

export function buildJobSpec(config: RunConfig, options: JobSpecOptions): JobSpec {
  const shape = computeShape(config.device, config.nodes, options.machines)

  return {
    jobId: toJobId(config.runName, options.jobIdSuffix),
    labels: {
      study: config.study,
      device: config.device.toLowerCase(),
      nodes: String(config.nodes),
    },
    taskGroup: {
      taskCount: 1,
      parallelism: 1,
      task: {
        runnable: {
          imageUri: options.imageUri,
          commands: ['bash', '-c', buildRunScript(config, options)],
          environment: {
            SWEEP_RUN_NAME: config.runName,
            SWEEP_RANKS: String(shape.parallelism),
            SWEEP_MAX_ERRORS: String(options.solver.maxErrors),
          },
        },
        computeResource: { cpuMilli: shape.cpuMilli, memoryMib: shape.memoryMib },
        maxRetryCount: options.taskMaxRetryCount ?? SWEEP_CONSTANTS.TASK_MAX_RETRY_COUNT,
      },
    },
    allocation: {
      machineType: shape.machineType,
      accelerators: shape.accelerator ? [shape.accelerator] : [],
    },
  }
}
