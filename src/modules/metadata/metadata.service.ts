import type { PDFDocument } from 'pdf-lib'
import type { Logger } from 'pino'
import type { MetadataEntry } from '../../types'
import { MetadataErrorCode } from '../../types'
import { MetadataError, describeError, errnoCode } from '../../errors/metadata-error'
import { logger as rootLogger } from '../../logger'
import type { FileSystem } from '../persistence/file-system'
import { nodeFileSystem } from '../persistence/file-system'
import { replaceFileAtomically, wallClockMicros } from '../persistence/atomic-replace'
import type { Clock } from './clock'
import { systemClock } from './clock'
import { loadDocument, serializeDocument } from './document-io'
import { listInfoEntries, putInfoEntry, removeInfoEntry, renameInfoEntry } from './metadata.store'

/** Where a document is read from. */
export type DocumentSource = { kind: 'path'; path: string } | { kind: 'bytes'; bytes: Uint8Array }

/** Edit applied to a loaded document before it is persisted. */
export type DocumentMutation = (doc: PDFDocument) => void

export interface MetadataServiceOptions {
  fileSystem?: FileSystem
  clock?: Clock
  logger?: Logger
  /** Microsecond timestamp source for temp file names */
  micros?: () => number
}

const describeSource = (source: DocumentSource): string =>
  source.kind === 'path' ? source.path : `<buffer ${source.bytes.length} bytes>`

export class MetadataService {
  private readonly fileSystem: FileSystem
  private readonly clock: Clock
  private readonly log: Logger
  private readonly micros: () => number

  constructor(options: MetadataServiceOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem
    this.clock = options.clock ?? systemClock
    this.log = (options.logger ?? rootLogger).child({ module: 'MetadataService' })
    this.micros = options.micros ?? wallClockMicros
  }

  // === Read ===

  async getMetadata(path: string): Promise<MetadataEntry[]> {
    return this.list({ kind: 'path', path })
  }

  async getMetadataFromBytes(bytes: Uint8Array): Promise<MetadataEntry[]> {
    return this.list({ kind: 'bytes', bytes })
  }

  // === Set ===

  /** Write the updated document to `outputPath`; `inputPath` is left untouched. */
  async setMetadata(inputPath: string, outputPath: string, key: string, value: string): Promise<void> {
    await this.transformToPath({ kind: 'path', path: inputPath }, outputPath, this.put(key, value))
  }

  async setMetadataInBytes(bytes: Uint8Array, key: string, value: string): Promise<Uint8Array> {
    return this.transformToBytes({ kind: 'bytes', bytes }, this.put(key, value))
  }

  async updateMetadataInPlace(path: string, key: string, value: string): Promise<void> {
    await this.transformInPlace(path, this.put(key, value))
  }

  /** Buffers have no original to protect, so this is setMetadataInBytes. */
  async updateMetadataInBytes(bytes: Uint8Array, key: string, value: string): Promise<Uint8Array> {
    return this.setMetadataInBytes(bytes, key, value)
  }

  // === Remove / rename ===

  async removeMetadata(path: string, key: string): Promise<void> {
    await this.transformInPlace(path, this.remove(key))
  }

  async removeMetadataInBytes(bytes: Uint8Array, key: string): Promise<Uint8Array> {
    return this.transformToBytes({ kind: 'bytes', bytes }, this.remove(key))
  }

  async renameMetadataKey(path: string, fromKey: string, toKey: string): Promise<void> {
    await this.transformInPlace(path, this.rename(fromKey, toKey))
  }

  async renameMetadataKeyInBytes(bytes: Uint8Array, fromKey: string, toKey: string): Promise<Uint8Array> {
    return this.transformToBytes({ kind: 'bytes', bytes }, this.rename(fromKey, toKey))
  }

  // === Mutations ===

  private put(key: string, value: string): DocumentMutation {
    return (doc) => putInfoEntry(doc, key, value, this.clock)
  }

  private remove(key: string): DocumentMutation {
    return (doc) => {
      if (!removeInfoEntry(doc, key, this.clock)) {
        throw new MetadataError(MetadataErrorCode.ENTRY_NOT_FOUND, `Metadata key not found: ${key}`, {
          details: { key }
        })
      }
    }
  }

  private rename(fromKey: string, toKey: string): DocumentMutation {
    return (doc) => renameInfoEntry(doc, fromKey, toKey, this.clock)
  }

  // === Sources and sinks ===

  private async open(source: DocumentSource): Promise<PDFDocument> {
    const label = describeSource(source)
    const bytes = source.kind === 'path' ? await this.readSource(source.path) : source.bytes
    const doc = await loadDocument(bytes, label)
    this.log.debug({ source: label }, 'Loaded document')
    return doc
  }

  private async readSource(path: string): Promise<Uint8Array> {
    try {
      return await this.fileSystem.readFile(path)
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new MetadataError(MetadataErrorCode.NOT_FOUND, `File not found: ${path}`, {
          cause: err,
          details: { path }
        })
      }
      throw err
    }
  }

  private async list(source: DocumentSource): Promise<MetadataEntry[]> {
    return listInfoEntries(await this.open(source))
  }

  private async transformToBytes(source: DocumentSource, mutate: DocumentMutation): Promise<Uint8Array> {
    const doc = await this.open(source)
    mutate(doc)
    return serializeDocument(doc)
  }

  private async transformToPath(source: DocumentSource, outputPath: string, mutate: DocumentMutation): Promise<void> {
    const doc = await this.open(source)
    mutate(doc)
    try {
      await this.fileSystem.writeFile(outputPath, await serializeDocument(doc))
    } catch (err) {
      throw new MetadataError(MetadataErrorCode.SAVE_FAILED, `Error saving to '${outputPath}': ${describeError(err)}`, {
        cause: err,
        details: { step: 'save', outputPath }
      })
    }
    this.log.debug({ outputPath }, 'Saved document')
  }

  /**
   * Load, mutate and atomically replace `path`. A missing file fails with
   * NOT_FOUND before anything is read or written.
   */
  private async transformInPlace(path: string, mutate: DocumentMutation): Promise<void> {
    if (!(await this.fileSystem.exists(path))) {
      throw new MetadataError(MetadataErrorCode.NOT_FOUND, `Original file not found: ${path}`, {
        details: { path }
      })
    }
    const doc = await this.open({ kind: 'path', path })
    mutate(doc)
    await replaceFileAtomically(this.fileSystem, path, () => serializeDocument(doc), {
      logger: this.log,
      now: this.micros
    })
  }
}
