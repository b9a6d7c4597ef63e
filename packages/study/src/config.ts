import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { DEFAULT_MACHINES, MachineTableSchema, SolverCommandsSchema } from '@batch-sweep/batch'
import { DEFAULT_SWEEP_TABLES, SweepTablesSchema } from '@batch-sweep/matrix'
import { TrackerOptionsSchema } from '@batch-sweep/tracker'
import { SWEEP_CONSTANTS } from '@batch-sweep/utils'

export const StudyConfigSchema = z.object({
  imageUri: z.string().min(1),
  structureFile: z.string().min(1).default('POSCAR'),
  workDir: z.string().min(1).default('.'),
  outDir: z.string().min(1).default('.'),
  tables: SweepTablesSchema.default(DEFAULT_SWEEP_TABLES),
  machines: MachineTableSchema.default(DEFAULT_MACHINES),
  solver: SolverCommandsSchema.default({}),
  tracker: TrackerOptionsSchema.default({}),
  jobIdSuffix: z
    .string()
    .regex(/^[a-z0-9]{1,12}$/)
    .optional(),
  taskMaxRetryCount: z.number().int().nonnegative().default(SWEEP_CONSTANTS.TASK_MAX_RETRY_COUNT),
  /** Cancel already-submitted jobs when the study aborts; otherwise they are left running. */
  cancelOnAbort: z.boolean().default(false),
})
export type StudyConfig = z.infer<typeof StudyConfigSchema>
export type StudyConfigInput = z.input<typeof StudyConfigSchema>

/** Reads a JSON study file; values in `overrides` win over the file. */
export async function loadStudyConfig(
  path: string | undefined,
  overrides: Partial<StudyConfigInput>,
): Promise<StudyConfig> {
  const fromFile: unknown = path ? JSON.parse(await readFile(path, 'utf8')) : {}
  const base = z.record(z.unknown()).parse(fromFile)
  const merged: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value
  }
  return StudyConfigSchema.parse(merged)
}
