import type { RunResult } from '@batch-sweep/collector'
import type { DeviceClassType } from '@batch-sweep/matrix'

export interface ScalingPoint {
  nodes: number
  value: number | null
}

/** One line of the scaling chart: a device and sampling grid across node counts. */
export interface ScalingSeries {
  key: string
  device: DeviceClassType
  label: string
  points: ScalingPoint[]
}

export interface ComparisonBar {
  method: string
  value: number | null
}

export interface ReportInput {
  scaling: ScalingSeries[]
  comparison: ComparisonBar[]
}

export function toScalingSeries(results: readonly RunResult[]): ScalingSeries[] {
  const byKey = new Map<string, ScalingSeries>()

  for (const { config, value } of results) {
    if (config.study !== 'scaling' || config.sweep.kind !== 'sampling') continue

    const key = `${config.device} - ${config.sweep.label}`
    let series = byKey.get(key)
    if (!series) {
      series = { key, device: config.device, label: config.sweep.label, points: [] }
      byKey.set(key, series)
    }
    series.points.push({ nodes: config.nodes, value })
  }

  return Array.from(byKey.values())
}

export function toComparisonBars(results: readonly RunResult[]): ComparisonBar[] {
  return results
    .filter((r) => r.config.study === 'comparison' && r.config.sweep.kind === 'method')
    .map((r) => ({ method: r.config.sweep.label, value: r.value }))
}

export function toReportInput(results: readonly RunResult[]): ReportInput {
  return { scaling: toScalingSeries(results), comparison: toComparisonBars(results) }
}

/** Points that can be drawn; absent values are dropped together with their node count. */
export function drawablePoints(series: ScalingSeries): Array<{ nodes: number; value: number }> {
  const out: Array<{ nodes: number; value: number }> = []
  for (const { nodes, value } of series.points) {
    if (value !== null) out.push({ nodes, value })
  }
  return out
}

export function drawableBars(bars: readonly ComparisonBar[]): Array<{ method: string; value: number }> {
  const out: Array<{ method: string; value: number }> = []
  for (const { method, value } of bars) {
    if (value !== null) out.push({ method, value })
  }
  return out
}
