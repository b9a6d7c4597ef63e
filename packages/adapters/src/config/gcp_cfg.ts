import { makeLogger } from '@batch-sweep/logger'
const logger = makeLogger('gcpConfig')

export const GCP_DEFAULTS = {
  projectId: 'vasp-scaling-analysis',
  location: 'us-east1',
  bucket: 'vasp-scaling-outputs',
} as const

function readOrDefault(name: string, fallback: string): string {
  const value = process.env[name]
  if (value) {
    logger.trace(`${name}: ${value}`)
    return value
  }
  logger.warn(`${name} is not set, using default ${fallback}`)
  return fallback
}

export function getProjectId(): string {
  return readOrDefault('GCP_PROJECT_ID', GCP_DEFAULTS.projectId)
}

export function getLocation(): string {
  return readOrDefault('GCP_LOCATION', GCP_DEFAULTS.location)
}

export function getBucketName(): string {
  return readOrDefault('SWEEP_BUCKET', GCP_DEFAULTS.bucket)
}

/** `projects/{project}/locations/{location}`, the parent of every submitted job. */
export function toBatchParent(projectId: string, location: string): string {
  return `projects/${projectId}/locations/${location}`
}

export function getBatchParent(): string {
  return toBatchParent(getProjectId(), getLocation())
}
