import { beforeEach, describe, expect, it } from 'vitest'
import { PDFArray, PDFBool, PDFDict, PDFDocument, PDFHexString, PDFName, PDFNull, PDFNumber, PDFRef } from 'pdf-lib'
import { MetadataErrorCode } from '../../../types'
import { MetadataError } from '../../../errors/metadata-error'
import { literalString } from '../../value-codec/info-value'
import { encodeTaggedUtf16Be } from '../../value-codec/value-codec'
import { fixedClock } from '../clock'
import { loadDocument, serializeDocument } from '../document-io'
import {
  MOD_DATE_KEY,
  ensureInfoDictionary,
  findInfoDictionary,
  listInfoEntries,
  putInfoEntry,
  removeInfoEntry,
  renameInfoEntry
} from '../metadata.store'
import { formatPdfDate } from '../pdf-date.util'

const now = new Date('2024-03-01T12:00:00Z')
const clock = fixedClock(now)
const stamp = formatPdfDate(now)

async function reload(doc: PDFDocument): Promise<PDFDocument> {
  return loadDocument(await serializeDocument(doc), 'test')
}

function captureError(fn: () => void): MetadataError {
  try {
    fn()
  } catch (err) {
    if (err instanceof MetadataError) return err
    throw err
  }
  throw new Error('Expected a MetadataError')
}

describe('metadata store', () => {
  let doc: PDFDocument

  beforeEach(async () => {
    doc = await PDFDocument.create({ updateMetadata: false })
  })

  describe('listInfoEntries', () => {
    it('returns no entries when the trailer has no Info', () => {
      expect(findInfoDictionary(doc)).toBeUndefined()
      expect(listInfoEntries(doc)).toEqual([])
    })

    it('treats a direct Info dictionary as absent', () => {
      const direct = PDFDict.withContext(doc.context)
      direct.set(PDFName.of('Author'), literalString(new Uint8Array([0x41])))
      doc.context.trailerInfo.Info = direct
      expect(listInfoEntries(doc)).toEqual([])
    })

    it('treats a dangling Info reference as absent', () => {
      doc.context.trailerInfo.Info = PDFRef.of(999)
      expect(listInfoEntries(doc)).toEqual([])
    })

    it('describes every value kind', () => {
      const info = ensureInfoDictionary(doc)
      info.set(PDFName.of('Title'), literalString(new Uint8Array([0xfe, 0xff, 0x00, 0x48, 0x00, 0x69])))
      info.set(PDFName.of('Subject'), PDFHexString.of('FEFF0041'))
      info.set(PDFName.of('Trapped'), PDFName.of('False'))
      info.set(PDFName.of('Pages'), PDFNumber.of(3))
      info.set(PDFName.of('Ratio'), PDFNumber.of(0.5))
      info.set(PDFName.of('Marked'), PDFBool.True)
      info.set(PDFName.of('Nothing'), PDFNull)
      info.set(PDFName.of('Tags'), PDFArray.withContext(doc.context))

      expect(listInfoEntries(doc)).toEqual([
        { key: 'Title', value: 'Hi' },
        { key: 'Subject', value: 'A' },
        { key: 'Trapped', value: 'False' },
        { key: 'Pages', value: '3' },
        { key: 'Ratio', value: '0.5' },
        { key: 'Marked', value: 'true' },
        { key: 'Nothing', value: 'null' },
        { key: 'Tags', value: '<unprocessed Array>' }
      ])
    })
  })

  describe('putInfoEntry', () => {
    it('creates an indirect Info dictionary and stamps ModDate', () => {
      putInfoEntry(doc, 'Author', 'Jane Doe', clock)

      expect(doc.context.trailerInfo.Info).toBeInstanceOf(PDFRef)
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Author', value: 'Jane Doe' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('overwrites an existing key in place', () => {
      putInfoEntry(doc, 'Title', 'v1', clock)
      putInfoEntry(doc, 'Title', 'v2', clock)

      expect(listInfoEntries(doc)).toEqual([
        { key: 'Title', value: 'v2' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('lets the stamp win over an explicit ModDate', () => {
      putInfoEntry(doc, MOD_DATE_KEY, 'yesterday', clock)
      expect(listInfoEntries(doc)).toEqual([{ key: MOD_DATE_KEY, value: stamp }])
    })

    it('replaces a dangling Info reference with a new dictionary', () => {
      doc.context.trailerInfo.Info = PDFRef.of(999)
      putInfoEntry(doc, 'Author', 'Jane Doe', clock)

      expect(doc.context.trailerInfo.Info).not.toBe(PDFRef.of(999))
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Author', value: 'Jane Doe' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('rejects blank keys', () => {
      expect(captureError(() => putInfoEntry(doc, '', 'x', clock)).code).toBe(MetadataErrorCode.INVALID_KEY)
      expect(captureError(() => putInfoEntry(doc, '   ', 'x', clock)).code).toBe(MetadataErrorCode.INVALID_KEY)
      expect(findInfoDictionary(doc)).toBeUndefined()
    })

    it('matches non-ASCII keys by their decoded text', () => {
      putInfoEntry(doc, 'Autör', 'one', clock)
      putInfoEntry(doc, 'Autör', 'two', clock)
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Autör', value: 'two' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })
  })

  describe('keys containing #', () => {
    it('lists the key exactly as written', () => {
      putInfoEntry(doc, 'Tag#41', 'v', clock)
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Tag#41', value: 'v' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('keeps the key after save and load', async () => {
      putInfoEntry(doc, 'Ref#2A', 'x', clock)
      expect(listInfoEntries(await reload(doc)).map((entry) => entry.key)).toEqual(['Ref#2A', MOD_DATE_KEY])
    })
  })

  describe('removeInfoEntry', () => {
    it('deletes the key and stamps ModDate', () => {
      putInfoEntry(doc, 'Author', 'Jane Doe', clock)
      putInfoEntry(doc, 'Title', 'Report', clock)

      const later = new Date('2024-03-02T08:30:00Z')
      expect(removeInfoEntry(doc, 'Author', fixedClock(later))).toBe(true)
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Title', value: 'Report' },
        { key: MOD_DATE_KEY, value: formatPdfDate(later) }
      ])
    })

    it('returns false and leaves the document alone for a missing key', () => {
      expect(removeInfoEntry(doc, 'Author', clock)).toBe(false)
      expect(findInfoDictionary(doc)).toBeUndefined()
    })
  })

  describe('renameInfoEntry', () => {
    it('moves the stored value object', () => {
      const info = ensureInfoDictionary(doc)
      const value = PDFHexString.of('FEFF0041')
      info.set(PDFName.of('Keywords'), value)

      renameInfoEntry(doc, 'Keywords', 'Tags', clock)

      expect(info.get(PDFName.of('Keywords'))).toBeUndefined()
      expect(info.get(PDFName.of('Tags'))).toBe(value)
      expect(listInfoEntries(doc)).toEqual([
        { key: 'Tags', value: 'A' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('fails when the source key is missing', () => {
      expect(captureError(() => renameInfoEntry(doc, 'Keywords', 'Tags', clock)).code).toBe(
        MetadataErrorCode.ENTRY_NOT_FOUND
      )
    })

    it('fails when the target key exists', () => {
      putInfoEntry(doc, 'Keywords', 'a', clock)
      putInfoEntry(doc, 'Tags', 'b', clock)

      const error = captureError(() => renameInfoEntry(doc, 'Keywords', 'Tags', clock))
      expect(error.code).toBe(MetadataErrorCode.ENTRY_EXISTS)
      expect(error.details).toEqual({ key: 'Tags' })
    })

    it('refuses to rename a key onto itself', () => {
      putInfoEntry(doc, 'Keywords', 'a', clock)
      expect(captureError(() => renameInfoEntry(doc, 'Keywords', 'Keywords', clock)).code).toBe(
        MetadataErrorCode.ENTRY_EXISTS
      )
    })
  })

  describe('after save and load', () => {
    it('keeps UTF-8 literals', async () => {
      putInfoEntry(doc, 'Title', 'Relatório Ação', clock)
      expect(listInfoEntries(await reload(doc))).toEqual([
        { key: 'Title', value: 'Relatório Ação' },
        { key: MOD_DATE_KEY, value: stamp }
      ])
    })

    it('keeps characters that need escaping', async () => {
      const value = 'a (b) \\ c\nline two'
      putInfoEntry(doc, 'Subject', value, clock)
      expect(listInfoEntries(await reload(doc))[0]).toEqual({ key: 'Subject', value })
    })

    it('keeps tagged values verbatim for the decoder', async () => {
      putInfoEntry(doc, 'Title', encodeTaggedUtf16Be('日本語'), clock)
      expect(listInfoEntries(await reload(doc))[0]).toEqual({ key: 'Title', value: '日本語' })
    })

    it('keeps hex strings with a byte-order mark', async () => {
      ensureInfoDictionary(doc).set(PDFName.of('Creator'), PDFHexString.of('FEFF0041'))
      expect(listInfoEntries(await reload(doc))).toEqual([{ key: 'Creator', value: 'A' }])
    })
  })
})
