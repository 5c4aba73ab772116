/**
 * In-memory file system
 *
 * Flat map of path to bytes. Failures can be queued per operation to exercise
 * the error paths of the atomic-replace protocol; a failed writeFile leaves the
 * first half of the data behind, like an interrupted write.
 */

import type { FileOperation, FileSystem } from './file-system'

function createError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code })
}

export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, Uint8Array>()
  private readonly failures = new Map<FileOperation, Error[]>()
  readonly calls: Array<{ operation: FileOperation | 'exists'; path: string }> = []

  constructor(initial: Record<string, Uint8Array> = {}) {
    for (const [path, data] of Object.entries(initial)) {
      this.files.set(path, new Uint8Array(data))
    }
  }

  /** Make the next call of `operation` reject with `error`. */
  failNext(operation: FileOperation, error: Error): void {
    const queue = this.failures.get(operation) ?? []
    queue.push(error)
    this.failures.set(operation, queue)
  }

  paths(): string[] {
    return [...this.files.keys()].sort()
  }

  async exists(path: string): Promise<boolean> {
    this.calls.push({ operation: 'exists', path })
    return this.files.has(path)
  }

  async readFile(path: string): Promise<Uint8Array> {
    this.record('readFile', path)
    const data = this.files.get(path)
    if (!data) {
      throw createError('ENOENT', `ENOENT: no such file or directory, open '${path}'`)
    }
    // Copy so callers cannot mutate stored state
    return new Uint8Array(data)
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    const error = this.take('writeFile', path)
    if (error) {
      this.files.set(path, data.slice(0, Math.floor(data.length / 2)))
      throw error
    }
    this.files.set(path, new Uint8Array(data))
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    this.record('rename', fromPath)
    const data = this.files.get(fromPath)
    if (!data) {
      throw createError('ENOENT', `ENOENT: no such file or directory, rename '${fromPath}' -> '${toPath}'`)
    }
    this.files.delete(fromPath)
    this.files.set(toPath, data)
  }

  async unlink(path: string): Promise<void> {
    this.record('unlink', path)
    if (!this.files.delete(path)) {
      throw createError('ENOENT', `ENOENT: no such file or directory, unlink '${path}'`)
    }
  }

  private record(operation: FileOperation, path: string): void {
    const error = this.take(operation, path)
    if (error) throw error
  }

  private take(operation: FileOperation, path: string): Error | undefined {
    this.calls.push({ operation, path })
    return this.failures.get(operation)?.shift()
  }
}
