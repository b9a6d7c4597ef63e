import { Storage, type Bucket } from '@google-cloud/storage'
import { makeLogger, type Logger } from '@batch-sweep/logger'
import { ObjectStore, ObjectStoreError } from '@batch-sweep/storage'

function httpStatus(err: unknown): number | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number'
    ? err.code
    : undefined
}

export class GcsObjectStore extends ObjectStore {
  private readonly handle: Bucket
  private logger: Logger

  constructor(bucket: string, projectId?: string) {
    super(bucket)
    this.handle = new Storage({ projectId }).bucket(bucket)
    this.logger = makeLogger('GcsObjectStore', { bucket })
  }

  protected async initialize(): Promise<void> {
    const [exists] = await this.handle.exists()
    if (!exists) {
      throw new ObjectStoreError('NOT_FOUND', `bucket gs://${this.bucket} does not exist`)
    }
    this.logger.trace('bucket reachable')
  }

  protected async _exists(key: string): Promise<boolean> {
    const [exists] = await this.handle.file(key).exists()
    return exists
  }

  protected async _downloadText(key: string): Promise<string> {
    try {
      const [contents] = await this.handle.file(key).download()
      return contents.toString('utf8')
    } catch (err) {
      if (httpStatus(err) === 404) {
        throw new ObjectStoreError('NOT_FOUND', `${this.uri(key)} not found`, err)
      }
      throw new ObjectStoreError('UNREADABLE', `${this.uri(key)} could not be read`, err)
    }
  }

  protected async _uploadFile(key: string, localPath: string): Promise<void> {
    try {
      await this.handle.upload(localPath, { destination: key })
      this.logger.debug(`uploaded ${localPath}`, { key })
    } catch (err) {
      throw new ObjectStoreError(
        'WRITE_FAILED',
        `failed to upload ${localPath} to ${this.uri(key)}`,
        err,
      )
    }
  }
}
