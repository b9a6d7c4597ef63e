import { copyFile, mkdir, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { z } from 'zod'
import { makeLogger, type Logger } from '@batch-sweep/logger'
import { estimateGridDensity, type RunConfig } from '@batch-sweep/matrix'

export const RUN_MANIFEST_FILE = 'run.json'

// Methods that switch the solver to a screened hybrid functional.
const HYBRID_METHODS = new Set(['HSE06'])

export const RunManifestSchema = z.object({
  runName: z.string(),
  study: z.enum(['scaling', 'comparison']),
  structure: z.string(),
  sampling: z.object({
    label: z.string().nullable(),
    gridDensity: z.number().int().positive(),
  }),
  method: z.object({
    label: z.string(),
    hybrid: z.boolean(),
  }),
  relaxation: z.object({
    nsw: z.number().int(),
    ibrion: z.number().int(),
    isif: z.number().int(),
  }),
  device: z.enum(['CPU', 'GPU']),
  nodes: z.number().int().positive(),
})
export type RunManifest = z.infer<typeof RunManifestSchema>

export interface MaterializedInputs {
  dir: string
  files: string[]
}

/**
 * Produces a self-contained input directory for one run. Solver-specific input
 * generation happens inside the container from the manifest and the structure file.
 */
export interface InputMaterializer {
  materialize(config: RunConfig, workDir: string): Promise<MaterializedInputs>
}

export function buildRunManifest(config: RunConfig): RunManifest {
  const method = config.sweep.kind === 'method' ? config.sweep.label : 'PBE'
  return RunManifestSchema.parse({
    runName: config.runName,
    study: config.study,
    structure: basename(config.structureRef),
    sampling: {
      label: config.sweep.kind === 'sampling' ? config.sweep.label : null,
      gridDensity: estimateGridDensity(config.sweep),
    },
    method: { label: method, hybrid: HYBRID_METHODS.has(method) },
    relaxation: { nsw: 50, ibrion: 2, isif: 3 },
    device: config.device,
    nodes: config.nodes,
  })
}

export class FileSystemMaterializer implements InputMaterializer {
  private logger: Logger = makeLogger('FileSystemMaterializer')

  public async materialize(config: RunConfig, workDir: string): Promise<MaterializedInputs> {
    const dir = join(workDir, config.runName)
    await mkdir(dir, { recursive: true })

    const structureFile = join(dir, basename(config.structureRef))
    await copyFile(config.structureRef, structureFile)

    const manifestFile = join(dir, RUN_MANIFEST_FILE)
    await writeFile(manifestFile, JSON.stringify(buildRunManifest(config), null, 2) + '\n')

    this.logger.debug(`materialized inputs for ${config.runName}`, { dir })
    return { dir, files: [structureFile, manifestFile] }
  }
}
