import { artifactKey } from '@batch-sweep/batch'
import { errorFields, makeLogger, type Logger } from '@batch-sweep/logger'
import type { RunConfig } from '@batch-sweep/matrix'
import type { ObjectStore } from '@batch-sweep/storage'

export type ResultSource = 'artifact' | 'missing' | 'unreadable'

/** `value` is the elapsed solver time in hours, or null when no usable artifact exists. */
export interface RunResult {
  config: RunConfig
  value: number | null
  source: ResultSource
}

export class ArtifactMissingError extends Error {
  constructor(
    public readonly runName: string,
    public readonly key: string,
  ) {
    super(`No ${key} found for ${runName}`)
    this.name = 'ArtifactMissingError'
  }
}

export class ArtifactParseError extends Error {
  constructor(
    public readonly runName: string,
    public readonly text: string,
    problem = 'is not a number',
  ) {
    super(`artifact for ${runName} ${problem}: ${JSON.stringify(text.slice(0, 64))}`)
    this.name = 'ArtifactParseError'
  }
}

// Plain decimal with an optional exponent; no hex, binary or Infinity.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export function parseElapsedHours(runName: string, text: string): number {
  const trimmed = text.trim()
  if (!DECIMAL.test(trimmed)) throw new ArtifactParseError(runName, text)
  const value = Number(trimmed)
  if (!Number.isFinite(value)) throw new ArtifactParseError(runName, text)
  if (value <= 0) throw new ArtifactParseError(runName, text, 'is not a positive duration')
  return value
}

export class ResultCollector {
  private logger: Logger

  constructor(private store: ObjectStore) {
    this.logger = makeLogger('ResultCollector', { bucket: store.bucket })
  }

  /** One result per config, in the given order. Never throws for an individual run. */
  public async collect(configs: readonly RunConfig[]): Promise<RunResult[]> {
    const results: RunResult[] = []
    for (const config of configs) {
      results.push(await this.collectOne(config))
    }

    const present = results.filter((r) => r.value !== null).length
    this.logger.info(`Collected ${present} of ${results.length} results`, {
      absent: results.length - present,
    })
    return results
  }

  public async collectOne(config: RunConfig): Promise<RunResult> {
    const key = artifactKey(config.runName)
    try {
      if (!(await this.store.exists(key))) {
        const missing = new ArtifactMissingError(config.runName, key)
        this.logger.warn(`Warning: ${missing.message}`, { runName: config.runName })
        return { config, value: null, source: 'missing' }
      }

      const value = parseElapsedHours(config.runName, await this.store.downloadText(key))
      this.logger.debug(`read ${key}`, { value })
      return { config, value, source: 'artifact' }
    } catch (err) {
      this.logger.error(`Error reading data for ${config.runName}`, errorFields(err))
      return { config, value: null, source: 'unreadable' }
    }
  }
}
