import { join } from 'node:path'
import sharp from 'sharp'
import { errorFields, makeLogger, type Logger } from '@batch-sweep/logger'
import { errorMessage } from '@batch-sweep/utils'
import { drawComparisonSvg, drawScalingSvg } from './charts.js'
import {
  drawableBars,
  drawablePoints,
  type ComparisonBar,
  type ReportInput,
  type ScalingSeries,
} from './series.js'

export const FIGURE_FILES = {
  scaling: 'figure_a.png',
  comparison: 'figure_b.png',
} as const

export type FigureKind = keyof typeof FIGURE_FILES

export type FigureStatus =
  | { figure: FigureKind; status: 'written'; path: string }
  | { figure: FigureKind; status: 'skipped'; reason: 'no-data' }
  | { figure: FigureKind; status: 'failed'; error: string }

export class RenderError extends Error {
  constructor(
    public readonly figure: FigureKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause })
    this.name = 'RenderError'
  }
}

export interface Rasterizer {
  toPng(svg: string, outPath: string): Promise<void>
}

export class SharpRasterizer implements Rasterizer {
  constructor(private density = 300) {}

  public async toPng(svg: string, outPath: string): Promise<void> {
    await sharp(Buffer.from(svg), { density: this.density })
      .flatten({ background: '#ffffff' })
      .png()
      .toFile(outPath)
  }
}

export interface ChartDrawers {
  scaling(series: ScalingSeries[]): string
  comparison(bars: ComparisonBar[]): string
}

/** Consumes collected results and writes one image per study. */
export interface ReportRenderer {
  render(input: ReportInput): Promise<FigureStatus[]>
}

export class ChartRenderer implements ReportRenderer {
  private logger: Logger

  constructor(
    private outDir: string,
    private rasterizer: Rasterizer = new SharpRasterizer(),
    private drawers: ChartDrawers = { scaling: drawScalingSvg, comparison: drawComparisonSvg },
  ) {
    this.logger = makeLogger('ChartRenderer', { outDir })
  }

  public async render(input: ReportInput): Promise<FigureStatus[]> {
    const scalingHasData = input.scaling.some((s) => drawablePoints(s).length > 0)
    const comparisonHasData = drawableBars(input.comparison).length > 0

    const statuses = [
      await this.renderFigure('scaling', scalingHasData, () => this.drawers.scaling(input.scaling)),
      await this.renderFigure('comparison', comparisonHasData, () =>
        this.drawers.comparison(input.comparison),
      ),
    ]

    const written = statuses.filter((s) => s.status === 'written').map((s) => FIGURE_FILES[s.figure])
    this.logger.info(
      written.length > 0 ? `Plots saved as ${written.join(' and ')}` : 'No plots were written',
    )
    return statuses
  }

  private async renderFigure(
    figure: FigureKind,
    hasData: boolean,
    draw: () => string,
  ): Promise<FigureStatus> {
    if (!hasData) {
      this.logger.warn(`Warning: No valid data available for ${figure} plot`)
      return { figure, status: 'skipped', reason: 'no-data' }
    }

    const path = join(this.outDir, FIGURE_FILES[figure])
    try {
      await this.rasterizer.toPng(draw(), path)
      this.logger.debug(`wrote ${path}`)
      return { figure, status: 'written', path }
    } catch (err) {
      const renderError = new RenderError(
        figure,
        `failed to render ${figure} plot: ${errorMessage(err)}`,
        err,
      )
      this.logger.warn(renderError.message, errorFields(err))
      return { figure, status: 'failed', error: renderError.message }
    }
  }
}
