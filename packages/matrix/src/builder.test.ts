import { describe, expect, it } from 'vitest'

import {
  assertUniqueRunNames,
  buildMatrix,
  estimateGridDensity,
  parseSweepTables,
  toJobId,
} from './builder.js'
import { DEFAULT_SWEEP_TABLES } from './defaults.js'
import { MatrixError, type RunConfig } from './types.js'

const structureRef = 'POSCAR'

describe('buildMatrix', () => {
  it('expands the default tables in axis order', () => {
    const matrix = buildMatrix(DEFAULT_SWEEP_TABLES, structureRef)

    expect(matrix.scaling.map((c) => c.runName)).toEqual([
      'run_line_CPU_2x2x6_1',
      'run_line_CPU_2x2x6_2',
      'run_line_CPU_3x3x9_1',
      'run_line_CPU_3x3x9_2',
      'run_line_CPU_4x4x12_1',
      'run_line_CPU_4x4x12_2',
    ])
    expect(matrix.comparison.map((c) => c.runName)).toEqual([
      'run_bar_PBE_MySystem',
      'run_bar_HSE06_MySystem',
    ])
    expect(matrix.all).toHaveLength(8)
  })

  it('carries the sweep point, device and node count of every run', () => {
    const { scaling, comparison } = buildMatrix(DEFAULT_SWEEP_TABLES, structureRef)

    expect(scaling[4]).toEqual({
      runName: 'run_line_CPU_4x4x12_1',
      study: 'scaling',
      sweep: { kind: 'sampling', label: '4x4x12', kpoints: [4, 4, 12], kpointCount: 100 },
      device: 'CPU',
      nodes: 1,
      structureRef: 'POSCAR',
      systemName: 'MySystem',
    })
    expect(comparison[1]).toEqual({
      runName: 'run_bar_HSE06_MySystem',
      study: 'comparison',
      sweep: { kind: 'method', label: 'HSE06' },
      device: 'GPU',
      nodes: 1,
      structureRef: 'POSCAR',
      systemName: 'MySystem',
    })
  })

  it('iterates grids, then devices, then node counts', () => {
    const { scaling } = buildMatrix(
      {
        samplingGrids: [{ label: 'coarse', kpts: [1, 1, 1], nk: 1 }],
        devices: ['CPU', 'GPU'],
        nodeCounts: [4, 1],
        methods: [],
      },
      structureRef,
    )

    expect(scaling.map((c) => c.runName)).toEqual([
      'run_line_CPU_coarse_4',
      'run_line_CPU_coarse_1',
      'run_line_GPU_coarse_4',
      'run_line_GPU_coarse_1',
    ])
  })

  it('keeps table order for grid labels made of digits', () => {
    const { scaling } = buildMatrix(
      {
        samplingGrids: [
          { label: 'coarse', kpts: [1, 1, 1], nk: 1 },
          { label: '8', kpts: [2, 2, 2], nk: 8 },
          { label: '100', kpts: [5, 5, 4], nk: 100 },
        ],
        devices: ['CPU'],
        nodeCounts: [1],
      },
      structureRef,
    )

    expect(scaling.map((c) => c.runName)).toEqual([
      'run_line_CPU_coarse_1',
      'run_line_CPU_8_1',
      'run_line_CPU_100_1',
    ])
  })

  it('rejects a grid label listed twice', () => {
    expect(() =>
      buildMatrix(
        {
          ...DEFAULT_SWEEP_TABLES,
          samplingGrids: [
            { label: 'coarse', kpts: [1, 1, 1], nk: 1 },
            { label: 'coarse', kpts: [2, 2, 2], nk: 8 },
          ],
        },
        structureRef,
      ),
    ).toThrowError('sweep tables failed validation')
  })

  it('rejects tables with an empty node-count list', () => {
    expect(() =>
      buildMatrix({ ...DEFAULT_SWEEP_TABLES, nodeCounts: [] }, structureRef),
    ).toThrowError(MatrixError)
  })
})

describe('parseSweepTables', () => {
  it('applies defaults for the comparison axis', () => {
    const tables = parseSweepTables({
      samplingGrids: [{ label: '2x2x6', kpts: [2, 2, 6], nk: 16 }],
      devices: ['GPU'],
      nodeCounts: [1],
    })

    expect(tables.methods).toEqual([])
    expect(tables.methodNodes).toBe(1)
    expect(tables.methodDevice).toBe('GPU')
    expect(tables.systemName).toBe('MySystem')
  })
})

describe('run name checks', () => {
  const config = (runName: string): RunConfig => ({
    runName,
    study: 'comparison',
    sweep: { kind: 'method', label: 'PBE' },
    device: 'GPU',
    nodes: 1,
    structureRef,
    systemName: 'MySystem',
  })

  it('rejects duplicate run names', () => {
    expect(() => assertUniqueRunNames([config('run_a'), config('run_a')])).toThrowError(
      'run name "run_a" appears twice',
    )
  })

  it('rejects names that collide once turned into job ids', () => {
    expect(() => assertUniqueRunNames([config('run_CPU'), config('run_cpu')])).toThrowError(
      'runs "run_CPU" and "run_cpu" map to the same job id "run-cpu"',
    )
  })

  it('maps run names to job ids', () => {
    expect(toJobId('run_line_CPU_2x2x6_1')).toBe('run-line-cpu-2x2x6-1')
    expect(toJobId('run_bar_PBE_MySystem', 'A1b2')).toBe('run-bar-pbe-mysystem-a1b2')
  })

  it('rejects run names that cannot become job ids', () => {
    expect(() => toJobId('run_')).toThrowError('"run_" does not map to a valid job id')
    expect(() => toJobId('1run')).toThrowError('"1run" is not a valid run name')
  })
})

describe('estimateGridDensity', () => {
  it('scales the grid product for sampling points and falls back otherwise', () => {
    expect(
      estimateGridDensity({ kind: 'sampling', label: '2x2x6', kpoints: [2, 2, 6], kpointCount: 16 }),
    ).toBe(2400)
    expect(estimateGridDensity({ kind: 'method', label: 'PBE' })).toBe(1000)
  })
})
