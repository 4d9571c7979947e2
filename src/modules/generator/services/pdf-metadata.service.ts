import { PDFDocument } from 'pdf-lib'
import { PROGRAM_NAME } from '../../../version'
import type { DocumentMetadata } from './metadata.util'

/**
 * Inject metadata into a PDF buffer.
 * Replaces the producer/creator strings so no library branding remains.
 */
export async function injectPdfMetadata(pdfBuffer: Buffer, metadata: DocumentMetadata): Promise<Buffer> {
  const doc = await PDFDocument.load(pdfBuffer, { updateMetadata: false })

  doc.setTitle(metadata.title)
  if (metadata.author) doc.setAuthor(metadata.author)
  if (metadata.subject) doc.setSubject(metadata.subject)
  if (metadata.keywords.length) doc.setKeywords(metadata.keywords)

  doc.setProducer(PROGRAM_NAME)
  doc.setCreator(PROGRAM_NAME)

  const bytes = await doc.save()
  return Buffer.from(bytes)
}
