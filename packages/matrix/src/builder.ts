import { DEFAULT_GRID_DENSITY } from './defaults.js'
import {
  MatrixError,
  RUN_NAME_PATTERN,
  RunConfigSchema,
  SweepTablesSchema,
  type KpointGridType,
  type RunConfig,
  type SweepMatrix,
  type SweepPointType,
  type SweepTables,
  type SweepTablesInput,
} from './types.js'

// Cloud Batch job ids: lowercase, digits and hyphens, at most 63 characters.
const JOB_ID_PATTERN = /^[a-z]([a-z0-9-]{0,61}[a-z0-9])?$/

export function parseSweepTables(input: SweepTablesInput): SweepTables {
  const parsed = SweepTablesSchema.safeParse(input)
  if (!parsed.success) {
    throw new MatrixError('INVALID_TABLES', 'sweep tables failed validation', parsed.error.issues)
  }
  return parsed.data
}

export function assertValidRunName(runName: string): void {
  if (!RUN_NAME_PATTERN.test(runName)) {
    throw new MatrixError('INVALID_RUN_NAME', `"${runName}" is not a valid run name`)
  }
}

/** Derives the remote job id for a run; `suffix` keeps repeated studies from colliding. */
export function toJobId(runName: string, suffix?: string): string {
  assertValidRunName(runName)
  const slug = runName.toLowerCase().replace(/_/g, '-')
  const jobId = suffix ? `${slug}-${suffix.toLowerCase()}` : slug
  if (!JOB_ID_PATTERN.test(jobId)) {
    throw new MatrixError('INVALID_RUN_NAME', `"${runName}" does not map to a valid job id`, {
      jobId,
    })
  }
  return jobId
}

export function assertUniqueRunNames(configs: RunConfig[], jobIdSuffix?: string): void {
  const names = new Set<string>()
  const jobIds = new Map<string, string>()

  for (const config of configs) {
    if (names.has(config.runName)) {
      throw new MatrixError('DUPLICATE_RUN_NAME', `run name "${config.runName}" appears twice`)
    }
    names.add(config.runName)

    const jobId = toJobId(config.runName, jobIdSuffix)
    const owner = jobIds.get(jobId)
    if (owner !== undefined) {
      throw new MatrixError(
        'DUPLICATE_RUN_NAME',
        `runs "${owner}" and "${config.runName}" map to the same job id "${jobId}"`,
      )
    }
    jobIds.set(jobId, config.runName)
  }
}

export function estimateGridDensity(sweep: SweepPointType): number {
  if (sweep.kind !== 'sampling') return DEFAULT_GRID_DENSITY
  const [kx, ky, kz]: KpointGridType = sweep.kpoints
  return kx * ky * kz * 100
}

export function scalingRunName(device: string, grid: string, nodes: number): string {
  return `run_line_${device}_${grid}_${nodes}`
}

export function comparisonRunName(method: string, systemName: string): string {
  return `run_bar_${method}_${systemName}`
}

export function buildScalingMatrix(tables: SweepTables, structureRef: string): RunConfig[] {
  const configs: RunConfig[] = []
  for (const { label: grid, kpts, nk } of tables.samplingGrids) {
    for (const device of tables.devices) {
      for (const nodes of tables.nodeCounts) {
        configs.push(
          RunConfigSchema.parse({
            runName: scalingRunName(device, grid, nodes),
            study: 'scaling',
            sweep: { kind: 'sampling', label: grid, kpoints: kpts, kpointCount: nk },
            device,
            nodes,
            structureRef,
            systemName: tables.systemName,
          }),
        )
      }
    }
  }
  return configs
}

export function buildComparisonMatrix(tables: SweepTables, structureRef: string): RunConfig[] {
  return tables.methods.map((method) =>
    RunConfigSchema.parse({
      runName: comparisonRunName(method, tables.systemName),
      study: 'comparison',
      sweep: { kind: 'method', label: method },
      device: tables.methodDevice,
      nodes: tables.methodNodes,
      structureRef,
      systemName: tables.systemName,
    }),
  )
}

export function buildMatrix(
  input: SweepTablesInput,
  structureRef: string,
  jobIdSuffix?: string,
): SweepMatrix {
  const tables = parseSweepTables(input)
  const scaling = buildScalingMatrix(tables, structureRef)
  const comparison = buildComparisonMatrix(tables, structureRef)
  const all = [...scaling, ...comparison]
  assertUniqueRunNames(all, jobIdSuffix)
  return { scaling, comparison, all }
}
