import { readFile } from 'node:fs/promises'
import { ObjectStore, ObjectStoreError } from './objectStore.js'

export type ObjectStoreCall =
  | { op: 'exists'; key: string }
  | { op: 'downloadText'; key: string }
  | { op: 'uploadFile'; key: string; localPath: string }

export class InMemoryObjectStore extends ObjectStore {
  private readonly blobs = new Map<string, string>()
  private readonly unreadable = new Set<string>()
  public readonly calls: ObjectStoreCall[] = []

  constructor(bucket = 'in-memory-bucket') {
    super(bucket)
  }

  /** Seeds a blob without going through the call log. */
  public put(key: string, text: string): void {
    this.blobs.set(key, text)
  }

  public keys(): string[] {
    return Array.from(this.blobs.keys()).sort((a, b) => a.localeCompare(b))
  }

  /** The key keeps reporting as present but every download of it fails. */
  public markUnreadable(key: string): void {
    this.unreadable.add(key)
  }

  protected async initialize(): Promise<void> {
    return
  }

  protected async _exists(key: string): Promise<boolean> {
    this.calls.push({ op: 'exists', key })
    return this.blobs.has(key)
  }

  protected async _downloadText(key: string): Promise<string> {
    this.calls.push({ op: 'downloadText', key })
    if (this.unreadable.has(key)) {
      throw new ObjectStoreError('UNREADABLE', `gs://${this.bucket}/${key} could not be read`)
    }
    const text = this.blobs.get(key)
    if (text === undefined) {
      throw new ObjectStoreError('NOT_FOUND', `gs://${this.bucket}/${key} not found`)
    }
    return text
  }

  protected async _uploadFile(key: string, localPath: string): Promise<void> {
    this.calls.push({ op: 'uploadFile', key, localPath })
    try {
      this.blobs.set(key, await readFile(localPath, 'utf8'))
    } catch (err) {
      throw new ObjectStoreError('WRITE_FAILED', `failed to stage ${localPath} at ${key}`, err)
    }
  }
}
