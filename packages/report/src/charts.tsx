import recharts from 'recharts'
import { renderToStaticMarkup } from 'react-dom/server'
import type { ReactElement } from 'react'
import { drawableBars, drawablePoints, type ComparisonBar, type ScalingSeries } from './series.js'

const { Bar, BarChart, CartesianGrid, Cell, Customized, LabelList, Line, LineChart, XAxis, YAxis } =
  recharts

const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd']
const SVG_NS = 'http://www.w3.org/2000/svg'

export const SCALING_SIZE = { width: 1000, height: 600 }
export const COMPARISON_SIZE = { width: 800, height: 600 }

function Title({ text, width }: { text: string; width: number }) {
  return (
    <text x={width / 2} y={26} textAnchor="middle" fontSize={18} fontWeight="bold">
      {text}
    </text>
  )
}

interface LegendEntry {
  key: string
  color: string
  dashed: boolean
}

// Legend drawn inside the svg: recharts' own legend is an html overlay.
function SeriesLegend({ entries, x }: { entries: LegendEntry[]; x: number }) {
  return (
    <g className="sweep-legend">
      {entries.map((entry, i) => (
        <g key={entry.key} transform={`translate(${x}, ${60 + i * 22})`}>
          <line
            x1={0}
            y1={0}
            x2={28}
            y2={0}
            stroke={entry.color}
            strokeWidth={2}
            strokeDasharray={entry.dashed ? '6 4' : undefined}
          />
          <text x={36} y={4} fontSize={12}>
            {entry.key}
          </text>
        </g>
      ))}
    </g>
  )
}

function logDomain(values: number[]): [number, number] {
  return [Math.min(...values) / 1.5, Math.max(...values) * 1.5]
}

const formatHours = (label: unknown): string =>
  typeof label === 'number' ? `${label.toFixed(2)}h` : String(label)

export function ScalingChart({ series }: { series: ScalingSeries[] }): ReactElement {
  const { width, height } = SCALING_SIZE
  const lines = series
    .map((s, i) => ({
      series: s,
      data: drawablePoints(s),
      color: PALETTE[i % PALETTE.length],
      dashed: s.device === 'GPU',
    }))
    .filter((line) => line.data.length > 0)

  const nodes = lines.flatMap((line) => line.data.map((p) => p.nodes))
  const times = lines.flatMap((line) => line.data.map((p) => p.value))
  const nodeTicks = Array.from(new Set(nodes)).sort((a, b) => a - b)

  return (
    <LineChart width={width} height={height} margin={{ top: 48, right: 220, bottom: 40, left: 30 }}>
      <CartesianGrid strokeOpacity={0.3} />
      <XAxis
        type="number"
        dataKey="nodes"
        scale="log"
        domain={logDomain(nodes)}
        ticks={nodeTicks}
        allowDataOverflow
        label={{ value: 'Number of Nodes', position: 'insideBottom', offset: -20 }}
      />
      <YAxis
        type="number"
        dataKey="value"
        scale="log"
        domain={logDomain(times)}
        allowDataOverflow
        tickFormatter={(v: number) => v.toPrecision(2)}
        label={{ value: 'Time (hours)', angle: -90, position: 'insideLeft' }}
      />
      {lines.map((line) => (
        <Line
          key={line.series.key}
          data={line.data}
          dataKey="value"
          name={line.series.key}
          stroke={line.color}
          strokeWidth={2}
          strokeDasharray={line.dashed ? '6 4' : undefined}
          dot={{ r: 4, fill: line.color }}
          isAnimationActive={false}
        />
      ))}
      <Customized component={<Title text="Solver Scaling Performance" width={width} />} />
      <Customized
        component={
          <SeriesLegend
            x={width - 200}
            entries={lines.map((line) => ({
              key: line.series.key,
              color: line.color,
              dashed: line.dashed,
            }))}
          />
        }
      />
    </LineChart>
  )
}

export function ComparisonChart({ bars }: { bars: ComparisonBar[] }): ReactElement {
  const { width, height } = COMPARISON_SIZE
  const data = drawableBars(bars)
  const title = `Solver Performance: ${data.map((b) => b.method).join(' vs ')}`

  return (
    <BarChart width={width} height={height} data={data} margin={{ top: 48, right: 30, bottom: 40, left: 30 }}>
      <CartesianGrid vertical={false} strokeOpacity={0.3} />
      <XAxis dataKey="method" label={{ value: 'Method', position: 'insideBottom', offset: -20 }} />
      <YAxis label={{ value: 'Time (hours)', angle: -90, position: 'insideLeft' }} />
      <Bar dataKey="value" fillOpacity={0.7} stroke="#000000" isAnimationActive={false}>
        {data.map((bar, i) => (
          <Cell key={bar.method} fill={PALETTE[i % PALETTE.length]} />
        ))}
        <LabelList dataKey="value" position="top" formatter={formatHours} />
      </Bar>
      <Customized component={<Title text={title} width={width} />} />
    </BarChart>
  )
}

/** Server-renders a chart and returns the standalone svg document. */
export function renderSvg(chart: ReactElement): string {
  const markup = renderToStaticMarkup(chart)
  const start = markup.indexOf('<svg')
  const end = markup.lastIndexOf('</svg>')
  if (start === -1 || end === -1) throw new Error('chart rendered no svg element')

  const svg = markup.slice(start, end + '</svg>'.length)
  return svg.includes('xmlns=') ? svg : svg.replace('<svg', `<svg xmlns="${SVG_NS}"`)
}

export const drawScalingSvg = (series: ScalingSeries[]): string =>
  renderSvg(<ScalingChart series={series} />)

export const drawComparisonSvg = (bars: ComparisonBar[]): string =>
  renderSvg(<ComparisonChart bars={bars} />)
