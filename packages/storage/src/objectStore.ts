export type ObjectStoreErrorCode = 'NOT_FOUND' | 'UNREADABLE' | 'WRITE_FAILED' | 'UNKNOWN'

export class ObjectStoreError extends Error {
  constructor(
    public readonly code: ObjectStoreErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ObjectStoreError'
  }
}

/**
 * Bucket-scoped blob access.
 *
 * Throwing contract:
 * - downloadText(): throw NOT_FOUND if the key is absent, UNREADABLE if it cannot be read
 * - uploadFile(): throw WRITE_FAILED when the write is rejected
 */
export abstract class ObjectStore {
  private initialized = false

  constructor(public readonly bucket: string) {}

  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize()
      this.initialized = true
    }
  }

  public async exists(key: string): Promise<boolean> {
    await this.ensureInitialized()
    return this._exists(key)
  }

  public async downloadText(key: string): Promise<string> {
    await this.ensureInitialized()
    return this._downloadText(key)
  }

  /** Uploads a local file; used to stage run inputs next to the run's artifacts. */
  public async uploadFile(key: string, localPath: string): Promise<void> {
    await this.ensureInitialized()
    return this._uploadFile(key, localPath)
  }

  /** `gs://bucket/key` style address handed to remote jobs. */
  public uri(key: string): string {
    return `gs://${this.bucket}/${key}`
  }

  protected abstract initialize(): Promise<void>

  protected abstract _exists(key: string): Promise<boolean>

  protected abstract _downloadText(key: string): Promise<string>

  protected abstract _uploadFile(key: string, localPath: string): Promise<void>
}
