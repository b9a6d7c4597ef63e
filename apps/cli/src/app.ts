import {
  GcpBatchService,
  GcsObjectStore,
  config as adapterConfig,
} from '@batch-sweep/adapters'
import {
  InMemoryBatchService,
  artifactKey,
  type BatchService,
  type JobSpec,
} from '@batch-sweep/batch'
import { makeLogger } from '@batch-sweep/logger'
import { InMemoryObjectStore, type ObjectStore } from '@batch-sweep/storage'
import {
  SweepStudy,
  loadStudyConfig,
  type StudyConfig,
  type StudyDeps,
  type StudyPlan,
  type StudySummary,
} from '@batch-sweep/study'

const logger = makeLogger('App')

const SIMULATED_IMAGE = 'local/sweep-solver:simulated'

export interface CommonOptions {
  config?: string
  workDir?: string
  outDir?: string
  simulate?: boolean
}

export interface RunOptions extends CommonOptions {
  cancelOnAbort?: boolean
}

interface Services {
  batch: BatchService
  store: ObjectStore
  target: Record<string, string>
  close(): Promise<void>
}

/** Wall-clock hours a simulated job reports: sub-linear in ranks, hybrid methods cost more. */
export function simulatedElapsedHours(spec: JobSpec): number {
  const ranks = Number(spec.taskGroup.task.runnable.environment.SWEEP_RANKS) || 1
  const weight = spec.jobId.includes('hse') ? 4 : 1
  return Number(((2 * weight) / Math.pow(ranks, 0.8)).toFixed(4))
}

function simulatedServices(): Services {
  const store = new InMemoryObjectStore('simulated-outputs')
  const batch = new InMemoryBatchService({
    onTerminal: (job, state) => {
      if (state !== 'SUCCEEDED') return
      const runName = job.spec.taskGroup.task.runnable.environment.SWEEP_RUN_NAME
      store.put(artifactKey(runName), `${simulatedElapsedHours(job.spec)}\n`)
    },
  })
  return {
    batch,
    store,
    target: { project: 'simulated', location: 'in-memory' },
    close: async () => undefined,
  }
}

function gcpServices(): Services {
  const project = adapterConfig.getProjectId()
  const location = adapterConfig.getLocation()
  const batch = new GcpBatchService(adapterConfig.toBatchParent(project, location))
  const store = new GcsObjectStore(adapterConfig.getBucketName(), project)
  return { batch, store, target: { project, location }, close: () => batch.close() }
}

export class App {
  public static async loadConfig(opts: RunOptions): Promise<StudyConfig> {
    const image =
      adapterConfig.getContainerImage() ?? (opts.simulate ? SIMULATED_IMAGE : undefined)
    const loaded = await loadStudyConfig(opts.config, {
      imageUri: image,
      workDir: opts.workDir,
      outDir: opts.outDir,
      cancelOnAbort: opts.cancelOnAbort,
    })

    const tracker = { ...loaded.tracker }
    const pollIntervalMs = adapterConfig.getPollIntervalMs()
    if (pollIntervalMs !== undefined) tracker.pollIntervalMs = pollIntervalMs
    const maxWaitMs = adapterConfig.getMaxWaitMs()
    if (maxWaitMs !== undefined) tracker.maxWaitMs = maxWaitMs

    return { ...loaded, tracker }
  }

  public static async run(
    opts: RunOptions,
    overrides: Partial<StudyDeps> = {},
  ): Promise<StudySummary> {
    return App.withStudy(opts, overrides, (study) => study.run())
  }

  public static async plan(opts: CommonOptions): Promise<StudyPlan> {
    return App.withStudy(opts, {}, async (study) => study.plan())
  }

  public static async collect(opts: CommonOptions, overrides: Partial<StudyDeps> = {}) {
    return App.withStudy(opts, overrides, (study) => study.collectAndReport())
  }

  private static async withStudy<T>(
    opts: RunOptions,
    overrides: Partial<StudyDeps>,
    work: (study: SweepStudy) => Promise<T>,
  ): Promise<T> {
    const studyConfig = await App.loadConfig(opts)
    const services = opts.simulate ? simulatedServices() : gcpServices()

    const study = new SweepStudy(studyConfig, {
      batch: services.batch,
      store: services.store,
      target: services.target,
      ...(opts.simulate ? { sleep: async () => undefined } : {}),
      ...overrides,
    })

    try {
      return await work(study)
    } finally {
      if (study.orphaned.length > 0) {
        logger.warn(`${study.orphaned.length} jobs were left behind on the batch service`, {
          jobs: study.orphaned.map((h) => h.jobName),
        })
      }
      await services.close()
    }
  }
}
