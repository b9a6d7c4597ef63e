import type { SweepTablesInput } from './types.js'

// Small first study sized to fit default quotas; GPU scaling runs are opt-in.
export const DEFAULT_SWEEP_TABLES: SweepTablesInput = {
  samplingGrids: [
    { label: '2x2x6', kpts: [2, 2, 6], nk: 16 },
    { label: '3x3x9', kpts: [3, 3, 9], nk: 72 },
    { label: '4x4x12', kpts: [4, 4, 12], nk: 100 },
  ],
  devices: ['CPU'],
  nodeCounts: [1, 2],
  methods: ['PBE', 'HSE06'],
  methodNodes: 1,
  methodDevice: 'GPU',
  systemName: 'MySystem',
}

export const DEFAULT_GRID_DENSITY = 1000
