import { EncryptedPDFError, PDFDict, PDFDocument } from 'pdf-lib'
import { MetadataErrorCode } from '../../types'
import { MetadataError, describeError } from '../../errors/metadata-error'

/**
 * Parse a PDF. pdf-lib is told not to stamp its own Producer/ModDate values.
 *
 * @param source path or label used in error details
 */
export async function loadDocument(bytes: Uint8Array, source: string): Promise<PDFDocument> {
  let doc: PDFDocument
  try {
    doc = await PDFDocument.load(bytes, { updateMetadata: false })
  } catch (err) {
    if (err instanceof EncryptedPDFError) {
      throw new MetadataError(MetadataErrorCode.ENCRYPTED_CONTAINER, undefined, {
        cause: err,
        details: { source }
      })
    }
    // Parser message kept verbatim
    throw new MetadataError(MetadataErrorCode.MALFORMED_CONTAINER, describeError(err), {
      cause: err,
      details: { source }
    })
  }

  // The parser recovers what it can; a document without a catalog is still unusable
  if (!(doc.context.lookup(doc.context.trailerInfo.Root) instanceof PDFDict)) {
    throw new MetadataError(MetadataErrorCode.MALFORMED_CONTAINER, 'Document has no catalog dictionary', {
      details: { source }
    })
  }
  return doc
}

/** Serialize the whole document. Page-less documents stay page-less. */
export async function serializeDocument(doc: PDFDocument): Promise<Uint8Array> {
  return doc.save({ addDefaultPage: false, updateFieldAppearances: false })
}
