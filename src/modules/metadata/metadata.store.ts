import { PDFDict, PDFName, PDFRef } from 'pdf-lib'
import type { PDFDocument } from 'pdf-lib'
import type { MetadataEntry } from '../../types'
import { MetadataErrorCode } from '../../types'
import { MetadataError } from '../../errors/metadata-error'
import { metadataKeySchema } from '../../schemas/metadata.schema'
import { describeInfoValue, encodeLiteral } from '../value-codec/value-codec'
import { decodeKey, keyToName, literalString, toRawInfoValue } from '../value-codec/info-value'
import type { Clock } from './clock'
import { formatPdfDate } from './pdf-date.util'

export const MOD_DATE_KEY = 'ModDate'

function assertValidKey(key: string): void {
  const result = metadataKeySchema.safeParse(key)
  if (!result.success) {
    throw new MetadataError(MetadataErrorCode.INVALID_KEY, result.error.issues[0]?.message, {
      details: { key }
    })
  }
}

/**
 * The Info dictionary the trailer points at. Undefined when the trailer has no
 * `Info` reference or it does not resolve to a dictionary.
 */
export function findInfoDictionary(doc: PDFDocument): PDFDict | undefined {
  const ref = doc.context.trailerInfo.Info
  if (!(ref instanceof PDFRef)) return undefined
  const object = doc.context.lookup(ref)
  return object instanceof PDFDict ? object : undefined
}

/** Existing Info dictionary, or a fresh empty one registered and linked from the trailer. */
export function ensureInfoDictionary(doc: PDFDocument): PDFDict {
  const existing = findInfoDictionary(doc)
  if (existing) return existing

  const info = PDFDict.withContext(doc.context)
  doc.context.trailerInfo.Info = doc.context.register(info)
  return info
}

function findEntryName(info: PDFDict, key: string): PDFName | undefined {
  return info.keys().find((name) => decodeKey(name) === key)
}

function stampModDate(info: PDFDict, clock: Clock): void {
  info.set(PDFName.of(MOD_DATE_KEY), literalString(encodeLiteral(formatPdfDate(clock.now()))))
}

export function listInfoEntries(doc: PDFDocument): MetadataEntry[] {
  const info = findInfoDictionary(doc)
  if (!info) return []
  return info.entries().map(([name, value]) => ({
    key: decodeKey(name),
    value: describeInfoValue(toRawInfoValue(value))
  }))
}

/**
 * Store `value` as a UTF-8 literal under `key`, then stamp ModDate. The stamp is
 * applied last, so it also wins when `key` is ModDate itself.
 */
export function putInfoEntry(doc: PDFDocument, key: string, value: string, clock: Clock): void {
  assertValidKey(key)
  const info = ensureInfoDictionary(doc)
  info.set(findEntryName(info, key) ?? keyToName(key), literalString(encodeLiteral(value)))
  stampModDate(info, clock)
}

/**
 * Delete `key`. Returns false, leaving the document untouched, when there is no
 * Info dictionary or no such key.
 */
export function removeInfoEntry(doc: PDFDocument, key: string, clock: Clock): boolean {
  assertValidKey(key)
  const info = findInfoDictionary(doc)
  if (!info) return false
  const name = findEntryName(info, key)
  if (!name) return false
  info.delete(name)
  stampModDate(info, clock)
  return true
}

/** Move the stored value object, as is, from one key to another. */
export function renameInfoEntry(doc: PDFDocument, fromKey: string, toKey: string, clock: Clock): void {
  assertValidKey(fromKey)
  assertValidKey(toKey)

  const info = findInfoDictionary(doc)
  const fromName = info ? findEntryName(info, fromKey) : undefined
  const value = fromName ? info?.get(fromName) : undefined
  if (!info || !fromName || !value) {
    throw new MetadataError(MetadataErrorCode.ENTRY_NOT_FOUND, `Metadata key not found: ${fromKey}`, {
      details: { key: fromKey }
    })
  }
  if (findEntryName(info, toKey)) {
    throw new MetadataError(MetadataErrorCode.ENTRY_EXISTS, `Metadata key already exists: ${toKey}`, {
      details: { key: toKey }
    })
  }

  info.delete(fromName)
  info.set(keyToName(toKey), value)
  stampModDate(info, clock)
}
