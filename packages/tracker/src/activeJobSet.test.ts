import { describe, expect, it } from 'vitest'
import { makeJobHandle } from '@batch-sweep/batch'
import type { RunConfig } from '@batch-sweep/matrix'

import { ActiveJobSet } from './activeJobSet.js'

const config = (runName: string): RunConfig => ({
  runName,
  study: 'comparison',
  sweep: { kind: 'method', label: 'PBE' },
  device: 'GPU',
  nodes: 1,
  structureRef: 'POSCAR',
  systemName: 'MySystem',
})

describe('ActiveJobSet', () => {
  it('keeps a pass snapshot stable while entries are removed', () => {
    const a = makeJobHandle('jobs/a', 'a', config('run_a'))
    const b = makeJobHandle('jobs/b', 'b', config('run_b'))
    const set = new ActiveJobSet([a, b])

    const snapshot = set.snapshot()
    for (const handle of snapshot) set.remove(handle.config.runName)

    expect(snapshot).toEqual([a, b])
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(set.size).toBe(0)
  })

  it('removes a run exactly once', () => {
    const set = new ActiveJobSet([makeJobHandle('jobs/a', 'a', config('run_a'))])

    expect(set.remove('run_a').jobName).toBe('jobs/a')
    expect(set.has('run_a')).toBe(false)
    expect(() => set.remove('run_a')).toThrowError('run run_a is not being tracked')
  })

  it('rejects a second handle for the same run', () => {
    const set = new ActiveJobSet([makeJobHandle('jobs/a', 'a', config('run_a'))])
    expect(() => set.add(makeJobHandle('jobs/a2', 'a2', config('run_a')))).toThrowError(
      'run run_a is already being tracked',
    )
  })
})
