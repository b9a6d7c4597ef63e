import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { InMemoryObjectStore } from './in_memory_object_store.js'
import { ObjectStoreError } from './objectStore.js'

describe('InMemoryObjectStore', () => {
  it('reports presence and returns stored text', async () => {
    const store = new InMemoryObjectStore('outputs')
    store.put('run_a/elapsed_time.txt', '1.5')

    await expect(store.exists('run_a/elapsed_time.txt')).resolves.toBe(true)
    await expect(store.exists('run_b/elapsed_time.txt')).resolves.toBe(false)
    await expect(store.downloadText('run_a/elapsed_time.txt')).resolves.toBe('1.5')
    expect(store.uri('run_a/elapsed_time.txt')).toBe('gs://outputs/run_a/elapsed_time.txt')
  })

  it('fails downloads of absent and unreadable keys with distinct codes', async () => {
    const store = new InMemoryObjectStore()
    store.put('broken', 'x')
    store.markUnreadable('broken')

    await expect(store.downloadText('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' })
    await expect(store.downloadText('broken')).rejects.toBeInstanceOf(ObjectStoreError)
    await expect(store.downloadText('broken')).rejects.toMatchObject({ code: 'UNREADABLE' })
  })

  it('stages local files under the given key', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'store-'))
    const file = join(dir, 'run.json')
    await writeFile(file, '{"runName":"run_a"}')
    const store = new InMemoryObjectStore()

    await store.uploadFile('run_a/inputs/run.json', file)

    expect(store.keys()).toEqual(['run_a/inputs/run.json'])
    expect(store.calls).toEqual([
      { op: 'uploadFile', key: 'run_a/inputs/run.json', localPath: file },
    ])
  })
})
