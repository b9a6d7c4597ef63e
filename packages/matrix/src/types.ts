import { z } from 'zod'

export const RUN_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/

export const RunName = z
  .string()
  .regex(RUN_NAME_PATTERN, 'run name must be a letter followed by letters, digits or underscores')
export type RunNameType = z.infer<typeof RunName>

export const DeviceClass = z.enum(['CPU', 'GPU'])
export type DeviceClassType = z.infer<typeof DeviceClass>

export const StudyKind = z.enum(['scaling', 'comparison'])
export type StudyKindType = z.infer<typeof StudyKind>

export const KpointGrid = z.tuple([
  z.number().int().positive(),
  z.number().int().positive(),
  z.number().int().positive(),
])
export type KpointGridType = z.infer<typeof KpointGrid>

export const SweepPoint = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('sampling'),
    label: z.string().min(1),
    kpoints: KpointGrid,
    kpointCount: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('method'),
    label: z.string().min(1),
  }),
])
export type SweepPointType = z.infer<typeof SweepPoint>

export const RunConfigSchema = z.object({
  runName: RunName,
  study: StudyKind,
  sweep: SweepPoint,
  device: DeviceClass,
  nodes: z.number().int().positive(),
  structureRef: z.string().min(1),
  systemName: z.string().min(1),
})
export type RunConfig = z.infer<typeof RunConfigSchema>

export const SamplingGridSchema = z.object({
  label: z.string().regex(/^[A-Za-z0-9]+$/),
  kpts: KpointGrid,
  nk: z.number().int().positive(),
})

export const SweepTablesSchema = z.object({
  // Listed in plotting order.
  samplingGrids: z
    .array(SamplingGridSchema)
    .min(1)
    .refine((grids) => new Set(grids.map((g) => g.label)).size === grids.length, {
      message: 'sampling grid labels must be unique',
    }),
  devices: z.array(DeviceClass).min(1),
  nodeCounts: z.array(z.number().int().positive()).min(1),
  methods: z.array(z.string().regex(/^[A-Za-z0-9]+$/)).default([]),
  methodNodes: z.number().int().positive().default(1),
  methodDevice: DeviceClass.default('GPU'),
  systemName: z.string().regex(/^[A-Za-z0-9]+$/).default('MySystem'),
})
export type SweepTables = z.infer<typeof SweepTablesSchema>
export type SweepTablesInput = z.input<typeof SweepTablesSchema>

export interface SweepMatrix {
  scaling: RunConfig[]
  comparison: RunConfig[]
  all: RunConfig[]
}

export type MatrixErrorCode = 'DUPLICATE_RUN_NAME' | 'INVALID_RUN_NAME' | 'INVALID_TABLES'

export class MatrixError extends Error {
  constructor(
    public readonly code: MatrixErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'MatrixError'
  }
}
