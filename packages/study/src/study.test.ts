import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it } from 'vitest'
import {
  BatchServiceError,
  InMemoryBatchService,
  artifactKey,
  SubmissionError,
  type InMemoryBatchOptions,
  type JobStatus,
} from '@batch-sweep/batch'
import type { FigureStatus, ReportInput, ReportRenderer } from '@batch-sweep/report'
import { InMemoryObjectStore } from '@batch-sweep/storage'
import { TrackingTimeoutError } from '@batch-sweep/tracker'

import { StudyConfigSchema, type StudyConfigInput } from './config.js'
import { PreconditionError, SweepStudy } from './study.js'

class RecordingRenderer implements ReportRenderer {
  public inputs: ReportInput[] = []
  async render(input: ReportInput): Promise<FigureStatus[]> {
    this.inputs.push(input)
    return []
  }
}

const FAILING_JOB = 'run-line-cpu-3x3x9-2'

describe('SweepStudy', () => {
  let dir: string
  let store: InMemoryObjectStore
  let renderer: RecordingRenderer
  let sleeps: number[]

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'study-'))
    await writeFile(join(dir, 'POSCAR'), 'Si2\n1.0\n')
    store = new InMemoryObjectStore('outputs')
    renderer = new RecordingRenderer()
    sleeps = []
  })

  const makeStudy = (batch: InMemoryBatchService, overrides: Partial<StudyConfigInput> = {}) => {
    let t = 0
    const config = StudyConfigSchema.parse({
      imageUri: 'registry.example/solver:latest',
      structureFile: join(dir, 'POSCAR'),
      workDir: join(dir, 'work'),
      outDir: dir,
      ...overrides,
    })
    return new SweepStudy(config, {
      batch,
      store,
      renderer,
      sleep: async (ms) => {
        sleeps.push(ms)
        t += ms
      },
      now: () => t,
    })
  }

  // Jobs that succeed publish their artifact the way the container script does.
  const publishingBatch = (options: InMemoryBatchOptions = {}) =>
    new InMemoryBatchService({
      onTerminal: (job, state) => {
        if (state !== 'SUCCEEDED') return
        const runName = job.spec.taskGroup.task.runnable.environment.SWEEP_RUN_NAME
        store.put(artifactKey(runName), '1.25')
      },
      ...options,
    })

  it('runs eight jobs to the end with one failure', async () => {
    const batch = publishingBatch({
      script: (spec) =>
        spec.jobId === FAILING_JOB
          ? ['QUEUED', 'RUNNING', 'FAILED']
          : ['QUEUED', 'RUNNING', 'SUCCEEDED'],
    })

    const summary = await makeStudy(batch).run()

    expect(summary.tracking.succeeded).toHaveLength(7)
    expect(summary.tracking.failed.map((j) => j.handle.config.runName)).toEqual([
      'run_line_CPU_3x3x9_2',
    ])
    expect(summary.results).toHaveLength(8)
    expect(summary.results.filter((r) => r.value === 1.25)).toHaveLength(7)
    expect(summary.results.filter((r) => r.value === null).map((r) => r.config.runName)).toEqual([
      'run_line_CPU_3x3x9_2',
    ])
    expect(sleeps).toEqual([60_000, 60_000])
    expect(renderer.inputs).toHaveLength(1)
    expect(renderer.inputs[0].comparison).toEqual([
      { method: 'PBE', value: 1.25 },
      { method: 'HSE06', value: 1.25 },
    ])
  })

  it('waits out a batch service outage instead of writing a job off', async () => {
    const batch = new InMemoryBatchService({
      pollFailures: (spec) => (spec.jobId === 'run-bar-hse06-mysystem' ? 5 : 0),
      script: () => ['SUCCEEDED'],
      onTerminal: (job) => {
        const runName = job.spec.taskGroup.task.runnable.environment.SWEEP_RUN_NAME
        store.put(artifactKey(runName), runName === 'run_bar_HSE06_MySystem' ? '2.5' : '1')
      },
    })
    const study = makeStudy(batch, { cancelOnAbort: true })

    const summary = await study.run()

    expect(summary.tracking.failed).toEqual([])
    expect(summary.results.at(-1)).toMatchObject({ value: 2.5, source: 'artifact' })
    expect(study.orphaned).toEqual([])
    expect(batch.calls.filter((c) => c.op === 'cancelJob')).toEqual([])
    expect(sleeps).toHaveLength(5)
  })

  it('lists jobs that disappeared from the batch service as orphaned', async () => {
    class VanishingBatch extends InMemoryBatchService {
      protected async _getJob(jobName: string): Promise<JobStatus> {
        if (jobName.endsWith('/run-bar-pbe-mysystem')) {
          throw new BatchServiceError('NOT_FOUND', `job ${jobName} not found`)
        }
        return super._getJob(jobName)
      }
    }
    const batch = new VanishingBatch({ script: () => ['SUCCEEDED'] })
    const study = makeStudy(batch, { cancelOnAbort: true })

    const summary = await study.run()

    expect(summary.tracking.lost.map((h) => h.config.runName)).toEqual(['run_bar_PBE_MySystem'])
    expect(study.orphaned.map((h) => h.config.runName)).toEqual(['run_bar_PBE_MySystem'])
    expect(batch.calls.filter((c) => c.op === 'cancelJob')).toEqual([])
  })

  it('submits everything before the first poll', async () => {
    const batch = publishingBatch()

    await makeStudy(batch).run()

    const ops = batch.calls.map((c) => c.op)
    expect(ops.slice(0, 8)).toEqual(Array.from({ length: 8 }, () => 'createJob'))
    expect(ops.slice(8).every((op) => op === 'getJob')).toBe(true)
    expect(store.keys()).toContain('run_bar_PBE_MySystem/inputs/POSCAR')
  })

  it('aborts on a rejected submission and leaves earlier jobs running', async () => {
    const batch = publishingBatch({
      reject: (spec) =>
        spec.jobId === 'run-line-cpu-2x2x6-2'
          ? new BatchServiceError('QUOTA_EXCEEDED', 'quota exceeded')
          : undefined,
    })
    const study = makeStudy(batch)

    await expect(study.run()).rejects.toBeInstanceOf(SubmissionError)

    expect(batch.calls).toEqual([
      { op: 'createJob', jobId: 'run-line-cpu-2x2x6-1' },
      { op: 'createJob', jobId: 'run-line-cpu-2x2x6-2' },
    ])
    expect(study.orphaned.map((h) => h.config.runName)).toEqual(['run_line_CPU_2x2x6_1'])
  })

  it('cancels earlier jobs on abort when asked to', async () => {
    const batch = publishingBatch({
      reject: (spec) =>
        spec.jobId === 'run-line-cpu-2x2x6-2' ? new Error('permission denied') : undefined,
    })
    const study = makeStudy(batch, { cancelOnAbort: true })

    await expect(study.run()).rejects.toMatchObject({
      code: 'REJECTED',
      runName: 'run_line_CPU_2x2x6_2',
    })

    expect(batch.calls.at(-1)).toEqual({
      op: 'cancelJob',
      jobName: 'projects/local/locations/in-memory/jobs/run-line-cpu-2x2x6-1',
    })
    expect(study.orphaned).toEqual([])
  })

  it('cancels the still-running jobs when tracking times out', async () => {
    const batch = publishingBatch({ script: () => ['RUNNING'] })
    const study = makeStudy(batch, {
      cancelOnAbort: true,
      tracker: { pollIntervalMs: 60_000, maxWaitMs: 100_000 },
    })

    await expect(study.run()).rejects.toBeInstanceOf(TrackingTimeoutError)

    expect(batch.calls.filter((c) => c.op === 'cancelJob')).toHaveLength(8)
    expect(study.orphaned).toEqual([])
    expect(renderer.inputs).toEqual([])
  })

  it('refuses to start without the structure file', async () => {
    const batch = publishingBatch()
    const study = makeStudy(batch, { structureFile: join(dir, 'missing') })

    await expect(study.run()).rejects.toBeInstanceOf(PreconditionError)
    expect(batch.calls).toEqual([])
  })

  it('refuses an empty structure file', async () => {
    await writeFile(join(dir, 'EMPTY'), '')
    const study = makeStudy(publishingBatch(), { structureFile: join(dir, 'EMPTY') })

    await expect(study.run()).rejects.toThrowError(`${join(dir, 'EMPTY')} is empty`)
  })

  it('echoes where the jobs run together with the study settings', () => {
    const config = StudyConfigSchema.parse({ imageUri: 'registry.example/solver:latest' })
    const study = new SweepStudy(config, {
      batch: publishingBatch(),
      store,
      renderer,
      target: { project: 'test-project', location: 'us-east1' },
    })

    expect(study.describe()).toEqual({
      project: 'test-project',
      location: 'us-east1',
      bucket: 'outputs',
      imageUri: 'registry.example/solver:latest',
      workDir: '.',
      outDir: '.',
      pollIntervalMs: 60_000,
      cancelOnAbort: false,
    })
  })

  it('plans job specs without touching the services', () => {
    const batch = publishingBatch()
    const { matrix, specs } = makeStudy(batch).plan()

    expect(matrix.all).toHaveLength(8)
    expect(specs.map((s) => s.jobId)).toEqual([
      'run-line-cpu-2x2x6-1',
      'run-line-cpu-2x2x6-2',
      'run-line-cpu-3x3x9-1',
      'run-line-cpu-3x3x9-2',
      'run-line-cpu-4x4x12-1',
      'run-line-cpu-4x4x12-2',
      'run-bar-pbe-mysystem',
      'run-bar-hse06-mysystem',
    ])
    expect(batch.calls).toEqual([])
    expect(store.calls).toEqual([])
  })

  it('collects existing artifacts without submitting', async () => {
    const batch = publishingBatch()
    store.put('run_line_CPU_2x2x6_1/elapsed_time.txt', '1.2345')

    const { results } = await makeStudy(batch).collectAndReport()

    expect(results[0]).toMatchObject({ value: 1.2345, source: 'artifact' })
    expect(results.slice(1).every((r) => r.value === null)).toBe(true)
    expect(batch.calls).toEqual([])
  })
})
