import type { MetadataEntry } from './types'
import { MetadataService } from './modules/metadata/metadata.service'

export * from './types'
export { MetadataError, isMetadataError, normalizeError } from './errors/metadata-error'
export { MetadataService } from './modules/metadata/metadata.service'
export type { DocumentMutation, DocumentSource, MetadataServiceOptions } from './modules/metadata/metadata.service'
export type { Clock } from './modules/metadata/clock'
export { fixedClock, systemClock } from './modules/metadata/clock'
export { formatPdfDate, PDF_DATE_PATTERN } from './modules/metadata/pdf-date.util'
export {
  MOD_DATE_KEY,
  ensureInfoDictionary,
  findInfoDictionary,
  listInfoEntries,
  putInfoEntry,
  removeInfoEntry,
  renameInfoEntry
} from './modules/metadata/metadata.store'
export { loadDocument, serializeDocument } from './modules/metadata/document-io'
export {
  TAGGED_UTF16BE_PREFIX,
  decodeRawBytes,
  describeInfoValue,
  encodeForLiteralChannel,
  encodeHexWrapped,
  encodeLiteral,
  encodeTaggedUtf16Be
} from './modules/value-codec/value-codec'
export { literalString, toRawInfoValue } from './modules/value-codec/info-value'
export type { FileOperation, FileSystem } from './modules/persistence/file-system'
export { NodeFileSystem, nodeFileSystem } from './modules/persistence/file-system'
export { MemoryFileSystem } from './modules/persistence/memory-file-system'
export { replaceFileAtomically, temporaryPathFor } from './modules/persistence/atomic-replace'

// Default instance on the real file system and clock
export const metadataService = new MetadataService()

export const getMetadata = (path: string): Promise<MetadataEntry[]> => metadataService.getMetadata(path)

export const getMetadataFromBytes = (bytes: Uint8Array): Promise<MetadataEntry[]> =>
  metadataService.getMetadataFromBytes(bytes)

export const setMetadata = (inputPath: string, outputPath: string, key: string, value: string): Promise<void> =>
  metadataService.setMetadata(inputPath, outputPath, key, value)

export const setMetadataInBytes = (bytes: Uint8Array, key: string, value: string): Promise<Uint8Array> =>
  metadataService.setMetadataInBytes(bytes, key, value)

export const updateMetadataInPlace = (path: string, key: string, value: string): Promise<void> =>
  metadataService.updateMetadataInPlace(path, key, value)

export const updateMetadataInBytes = (bytes: Uint8Array, key: string, value: string): Promise<Uint8Array> =>
  metadataService.updateMetadataInBytes(bytes, key, value)

export const removeMetadata = (path: string, key: string): Promise<void> => metadataService.removeMetadata(path, key)

export const removeMetadataInBytes = (bytes: Uint8Array, key: string): Promise<Uint8Array> =>
  metadataService.removeMetadataInBytes(bytes, key)

export const renameMetadataKey = (path: string, fromKey: string, toKey: string): Promise<void> =>
  metadataService.renameMetadataKey(path, fromKey, toKey)

export const renameMetadataKeyInBytes = (bytes: Uint8Array, fromKey: string, toKey: string): Promise<Uint8Array> =>
  metadataService.renameMetadataKeyInBytes(bytes, fromKey, toKey)
