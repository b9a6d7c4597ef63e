import type { DeviceClassType } from '@batch-sweep/matrix'
import type { ComputeShape, MachineTable } from './types.js'

// Shapes sized to stay inside default project quotas.
export const DEFAULT_MACHINES: MachineTable = {
  GPU: {
    machineType: 'a2-highgpu-1g',
    cpuMilli: 12_000,
    memoryMib: 87_040,
    accelerator: { type: 'nvidia-tesla-a100', count: 1 },
    coresPerNode: 4,
  },
  CPU: {
    machineType: 'n2-standard-4',
    cpuMilli: 4_000,
    memoryMib: 16_384,
    coresPerNode: 40,
  },
}

export function computeShape(
  device: DeviceClassType,
  nodes: number,
  machines: MachineTable = DEFAULT_MACHINES,
): ComputeShape {
  const machine = machines[device]
  return { ...machine, parallelism: nodes * machine.coresPerNode }
}
